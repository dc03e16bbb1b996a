/**
 * Grid types consumed by the search strategies.
 */

import type { Coord } from "../geometry/types";

/**
 * Entry cost of an impassable cell.
 */
export const BLOCKED = Number.POSITIVE_INFINITY;

/**
 * A cell together with the cost of stepping onto it.
 */
export interface Tile {
  readonly pos: Coord;
  readonly cost: number;
}

/**
 * Read-only view of a weighted grid.
 *
 * This is the whole surface the strategies depend on. Implementations must
 * not change while a search is running. Nothing else is required of them.
 */
export interface SearchGrid {
  readonly rows: number;
  readonly cols: number;

  /**
   * The tile at a coordinate, including its entry cost.
   */
  get(row: number, col: number): Tile;

  /**
   * The up-to-four orthogonally adjacent, in-bounds, passable tiles.
   * Callers must not rely on the order.
   */
  neighbors4(row: number, col: number): readonly Tile[];

  /**
   * `|r1 - r2| + |c1 - c2|`
   */
  manhattan(a: Coord, b: Coord): number;
}
