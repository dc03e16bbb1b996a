/**
 * Immutable weighted grid backed by a flat Float64Array of entry costs.
 */

import {
  CostCellSchema,
  CostMatrixSchema,
  PathfindingError,
} from "@waypoint/contracts";
import { type Coord, DIRECTIONS_4, manhattan } from "../geometry/types";
import { BLOCKED, type SearchGrid, type Tile } from "./types";

const DEV_MODE = process.env.NODE_ENV !== "production";

/**
 * A cost matrix cell: entry cost, or `null` for a wall.
 */
export type CostCell = number | null;

/**
 * Rectangular grid of entry costs with walls.
 *
 * Walls carry the cost {@link BLOCKED} and are never reported as neighbours.
 * Instances never change after construction; `withCost` returns a copy, so
 * one grid can back any number of concurrent searches.
 */
export class TileGrid implements SearchGrid {
  readonly rows: number;
  readonly cols: number;
  private readonly costs: Float64Array;

  private constructor(rows: number, cols: number, costs: Float64Array) {
    this.rows = rows;
    this.cols = cols;
    this.costs = costs;
  }

  /**
   * Grid where every cell costs the same.
   */
  static uniform(rows: number, cols: number, cost = 1): TileGrid {
    if (
      !Number.isInteger(rows) ||
      !Number.isInteger(cols) ||
      rows <= 0 ||
      cols <= 0
    ) {
      throw PathfindingError.invalidGrid(
        `Invalid grid dimensions: ${rows}x${cols}`,
        { rows, cols },
      );
    }
    const parsed = CostCellSchema.safeParse(cost);
    if (!parsed.success || parsed.data === null) {
      throw PathfindingError.invalidGrid(`Invalid uniform tile cost: ${cost}`, {
        cost,
      });
    }
    const costs = new Float64Array(rows * cols).fill(parsed.data);
    return new TileGrid(rows, cols, costs);
  }

  /**
   * Build a grid from rows of costs, `null` marking walls.
   *
   * @throws PathfindingError `INVALID_GRID` for empty, ragged, negative or
   * non-finite input
   */
  static fromCosts(matrix: readonly (readonly CostCell[])[]): TileGrid {
    const parsed = CostMatrixSchema.safeParse(matrix);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw PathfindingError.invalidGrid(
        `Invalid cost matrix: ${issue?.message ?? "unknown error"}`,
        { path: issue?.path.map(String) ?? [] },
      );
    }

    const rows = parsed.data;
    const cols = rows[0]?.length ?? 0;
    const costs = new Float64Array(rows.length * cols);
    rows.forEach((row, r) => {
      row.forEach((cell, c) => {
        costs[r * cols + c] = cell ?? BLOCKED;
      });
    });
    return new TileGrid(rows.length, cols, costs);
  }

  get cellCount(): number {
    return this.rows * this.cols;
  }

  isInBounds(row: number, col: number): boolean {
    return row >= 0 && row < this.rows && col >= 0 && col < this.cols;
  }

  isPassable(row: number, col: number): boolean {
    return this.costAt(row, col) !== BLOCKED;
  }

  /**
   * Entry cost of a cell; {@link BLOCKED} for walls and out-of-bounds cells.
   */
  costAt(row: number, col: number): number {
    if (!this.isInBounds(row, col)) return BLOCKED;
    return this.costs[row * this.cols + col] ?? BLOCKED;
  }

  /**
   * @throws PathfindingError `OUT_OF_BOUNDS` outside the grid
   */
  get(row: number, col: number): Tile {
    if (!this.isInBounds(row, col)) {
      throw PathfindingError.outOfBounds({ row, col }, this);
    }
    return { pos: { row, col }, cost: this.costAt(row, col) };
  }

  /**
   * Passable orthogonal neighbours, east, south, west, north.
   */
  neighbors4(row: number, col: number): Tile[] {
    const tiles: Tile[] = [];
    for (const dir of DIRECTIONS_4) {
      const r = row + dir.row;
      const c = col + dir.col;
      const cost = this.costAt(r, c);
      if (cost !== BLOCKED) {
        tiles.push({ pos: { row: r, col: c }, cost });
      }
    }
    return tiles;
  }

  manhattan(a: Coord, b: Coord): number {
    return manhattan(a, b);
  }

  /**
   * Copy of this grid with one cell's cost replaced (`null` for a wall).
   * Out-of-bounds writes are ignored.
   */
  withCost(row: number, col: number, cost: CostCell): TileGrid {
    if (!this.isInBounds(row, col)) {
      if (DEV_MODE) {
        console.warn(
          `TileGrid.withCost: (${row},${col}) is outside the ` +
            `${this.rows}x${this.cols} grid, ignoring`,
        );
      }
      return this;
    }
    const parsed = CostCellSchema.safeParse(cost);
    if (!parsed.success) {
      throw PathfindingError.invalidGrid(`Invalid tile cost: ${cost}`, {
        row,
        col,
        cost,
      });
    }
    const costs = new Float64Array(this.costs);
    costs[row * this.cols + col] = parsed.data ?? BLOCKED;
    return new TileGrid(this.rows, this.cols, costs);
  }

  /**
   * Inverse of {@link TileGrid.fromCosts}.
   */
  toCostMatrix(): CostCell[][] {
    const matrix: CostCell[][] = [];
    for (let r = 0; r < this.rows; r++) {
      const row: CostCell[] = [];
      for (let c = 0; c < this.cols; c++) {
        const cost = this.costAt(r, c);
        row.push(cost === BLOCKED ? null : cost);
      }
      matrix.push(row);
    }
    return matrix;
  }
}
