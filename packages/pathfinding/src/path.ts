/**
 * Route through a grid.
 */

import {
  type Coord,
  coordEquals,
  formatCoord,
  isAdjacent4,
} from "./core/geometry/types";
import type { SearchGrid } from "./core/grid/types";

/**
 * Ordered sequence of coordinates, start first and goal last.
 *
 * An empty path is how every strategy reports that it found no route.
 */
export class Path implements Iterable<Coord> {
  static readonly EMPTY: Path = new Path([]);

  private readonly _coords: readonly Coord[];

  constructor(coords: readonly Coord[]) {
    this._coords = Object.freeze(
      coords.map((c) => ({ row: c.row, col: c.col })),
    );
  }

  get coords(): readonly Coord[] {
    return this._coords;
  }

  /**
   * Number of coordinates, start and goal included.
   */
  get length(): number {
    return this._coords.length;
  }

  /**
   * Number of steps taken.
   */
  get moves(): number {
    return Math.max(0, this._coords.length - 1);
  }

  get first(): Coord | undefined {
    return this._coords[0];
  }

  get last(): Coord | undefined {
    return this._coords[this._coords.length - 1];
  }

  isEmpty(): boolean {
    return this._coords.length === 0;
  }

  includes(c: Coord): boolean {
    return this._coords.some((p) => coordEquals(p, c));
  }

  /**
   * Sum of the entry costs of every cell after the first.
   * The start cell is never entered, so it costs nothing.
   */
  totalCost(grid: Pick<SearchGrid, "get">): number {
    let total = 0;
    for (let i = 1; i < this._coords.length; i++) {
      const c = this._coords[i];
      if (c) total += grid.get(c.row, c.col).cost;
    }
    return total;
  }

  /**
   * Whether every consecutive pair is orthogonally adjacent.
   */
  isContiguous(): boolean {
    for (let i = 1; i < this._coords.length; i++) {
      const prev = this._coords[i - 1];
      const curr = this._coords[i];
      if (!prev || !curr || !isAdjacent4(prev, curr)) return false;
    }
    return true;
  }

  /**
   * Whether no coordinate appears twice.
   */
  isSimple(): boolean {
    const seen = new Set<string>();
    for (const c of this._coords) {
      const key = formatCoord(c);
      if (seen.has(key)) return false;
      seen.add(key);
    }
    return true;
  }

  equals(other: Path): boolean {
    return (
      this._coords.length === other._coords.length &&
      this._coords.every((c, i) => {
        const o = other._coords[i];
        return o !== undefined && coordEquals(c, o);
      })
    );
  }

  [Symbol.iterator](): Iterator<Coord> {
    return this._coords[Symbol.iterator]();
  }

  toString(): string {
    if (this.isEmpty()) return "<empty>";
    return this._coords.map(formatCoord).join(" -> ");
  }

  toJSON(): [number, number][] {
    return this._coords.map((c) => [c.row, c.col]);
  }
}
