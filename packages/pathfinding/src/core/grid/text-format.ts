/**
 * Plain-text grid format
 *
 * One line per row, one character per cell:
 *
 * ```text
 * S..#
 * .5.#
 * ...G
 * ```
 *
 * `.` costs 1, `0`-`9` cost that digit, `#` is a wall, and `S` / `G` mark
 * the start and goal (both cost 1). Blank lines and surrounding whitespace
 * are ignored.
 */

import { PathfindingError } from "@waypoint/contracts";
import { type Coord, coordEquals } from "../geometry/types";
import { type CostCell, TileGrid } from "./tile-grid";
import { BLOCKED } from "./types";

export interface ParsedGrid {
  readonly grid: TileGrid;
  readonly start?: Coord;
  readonly goal?: Coord;
}

export interface GridCharset {
  readonly wall: string;
  readonly floor: string;
  readonly start: string;
  readonly goal: string;
  readonly path: string;
  /** Cells whose cost has no single-character form */
  readonly unknown: string;
}

export const DEFAULT_CHARSET: GridCharset = {
  wall: "#",
  floor: ".",
  start: "S",
  goal: "G",
  path: "*",
  unknown: "?",
};

/**
 * @throws PathfindingError `INVALID_GRID` naming the offending cell
 */
export function parseGrid(text: string): ParsedGrid {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const width = lines[0]?.length;
  if (width === undefined) {
    throw PathfindingError.invalidGrid("Grid text is empty");
  }

  let start: Coord | undefined;
  let goal: Coord | undefined;
  const matrix: CostCell[][] = [];

  for (const [row, line] of lines.entries()) {
    if (line.length !== width) {
      throw PathfindingError.invalidGrid(
        `Row ${row} has ${line.length} cells, expected ${width}`,
        { row },
      );
    }

    const cells: CostCell[] = [];
    for (const [col, ch] of Array.from(line).entries()) {
      if (ch === DEFAULT_CHARSET.wall) {
        cells.push(null);
      } else if (ch === DEFAULT_CHARSET.floor) {
        cells.push(1);
      } else if (ch === DEFAULT_CHARSET.start || ch === DEFAULT_CHARSET.goal) {
        const isStart = ch === DEFAULT_CHARSET.start;
        if (isStart ? start : goal) {
          throw PathfindingError.invalidGrid(
            `Second ${isStart ? "start" : "goal"} marker at row ${row}, column ${col}`,
            { row, col },
          );
        }
        if (isStart) {
          start = { row, col };
        } else {
          goal = { row, col };
        }
        cells.push(1);
      } else if (ch >= "0" && ch <= "9") {
        cells.push(Number(ch));
      } else {
        throw PathfindingError.invalidGrid(
          `Unknown cell '${ch}' at row ${row}, column ${col}`,
          { row, col, cell: ch },
        );
      }
    }
    matrix.push(cells);
  }

  return {
    grid: TileGrid.fromCosts(matrix),
    ...(start && { start }),
    ...(goal && { goal }),
  };
}

function costChar(cost: number, charset: GridCharset): string {
  if (cost === BLOCKED) return charset.wall;
  if (cost === 1) return charset.floor;
  if (Number.isInteger(cost) && cost >= 0 && cost <= 9) return String(cost);
  return charset.unknown;
}

/**
 * Render a grid in the text format, optionally overlaying a route.
 * The route's first cell is drawn as the start and its last as the goal.
 */
export function renderGrid(
  grid: TileGrid,
  path: readonly Coord[] = [],
  charset: GridCharset = DEFAULT_CHARSET,
): string {
  const first = path[0];
  const last = path[path.length - 1];
  const onPath = new Set(path.map((c) => c.row * grid.cols + c.col));

  const lines: string[] = [];
  for (let row = 0; row < grid.rows; row++) {
    let line = "";
    for (let col = 0; col < grid.cols; col++) {
      const here = { row, col };
      if (first && coordEquals(first, here)) {
        line += charset.start;
      } else if (last && coordEquals(last, here)) {
        line += charset.goal;
      } else if (onPath.has(row * grid.cols + col)) {
        line += charset.path;
      } else {
        line += costChar(grid.costAt(row, col), charset);
      }
    }
    lines.push(line);
  }
  return lines.join("\n");
}
