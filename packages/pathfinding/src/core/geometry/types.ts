/**
 * Grid coordinate types.
 * All types are immutable value objects.
 */

/**
 * A grid cell address. Equality is by value, see {@link coordEquals}.
 */
export interface Coord {
  readonly row: number;
  readonly col: number;
}

/**
 * Orthogonal steps in search priority order.
 * Depth-first search breaks cost ties by the index in this list.
 */
export const DIRECTIONS_4 = [
  { row: 0, col: 1 }, // East
  { row: 1, col: 0 }, // South
  { row: 0, col: -1 }, // West
  { row: -1, col: 0 }, // North
] as const;

export function coord(row: number, col: number): Coord {
  return { row, col };
}

export function coordEquals(a: Coord, b: Coord): boolean {
  return a.row === b.row && a.col === b.col;
}

/**
 * Pack an in-bounds coordinate into a single number for set membership.
 *
 * @example
 * ```typescript
 * coordKey({ row: 10, col: 5 }, 100); // 1005
 * ```
 */
export function coordKey(c: Coord, cols: number): number {
  return c.row * cols + c.col;
}

export function manhattan(a: Coord, b: Coord): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}

export function isAdjacent4(a: Coord, b: Coord): boolean {
  return manhattan(a, b) === 1;
}

/**
 * Index of the step from `from` to `to` in {@link DIRECTIONS_4}.
 * Non-adjacent pairs rank after every direction.
 */
export function directionPriority(from: Coord, to: Coord): number {
  const dRow = to.row - from.row;
  const dCol = to.col - from.col;
  const index = DIRECTIONS_4.findIndex(
    (dir) => dir.row === dRow && dir.col === dCol,
  );
  return index === -1 ? DIRECTIONS_4.length : index;
}

export function formatCoord(c: Coord): string {
  return `(${c.row},${c.col})`;
}
