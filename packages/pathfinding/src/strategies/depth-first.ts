import {
  type Coord,
  coordEquals,
  coordKey,
  directionPriority,
} from "../core/geometry/types";
import type { SearchGrid, Tile } from "../core/grid/types";
import { Path } from "../path";
import { BaseStrategy } from "./base-strategy";
import type { SearchRun } from "./search-run";

/**
 * Depth-first search with backtracking, registered as "DFS".
 *
 * The stack is the route being built. From its top, the cheapest unvisited
 * neighbour is pushed, cost ties going east, south, west, north in that
 * order. A dead end pops the stack. Cells stay visited after being popped,
 * so every cell is pushed at most once and the search always ends.
 */
export class DepthFirstStrategy extends BaseStrategy {
  readonly name = "DFS";

  protected explore(
    grid: SearchGrid,
    start: Coord,
    goal: Coord,
    run: SearchRun,
  ): Path {
    const stack: Coord[] = [start];
    const visited = new Set<number>([coordKey(start, grid.cols)]);

    for (
      let top = stack[stack.length - 1];
      top !== undefined;
      top = stack[stack.length - 1]
    ) {
      if (coordEquals(top, goal)) return new Path(stack);
      run.tick();

      const from = top;
      const candidates = grid
        .neighbors4(from.row, from.col)
        .filter((tile) => !visited.has(coordKey(tile.pos, grid.cols)));
      run.recordExpansion();

      const next = cheapestFirst(from, candidates)[0];
      if (next === undefined) {
        stack.pop();
        continue;
      }

      stack.push(next.pos);
      visited.add(coordKey(next.pos, grid.cols));
      run.recordFrontier(stack.length);
    }

    return Path.EMPTY;
  }
}

function cheapestFirst(from: Coord, tiles: readonly Tile[]): Tile[] {
  return [...tiles].sort((a, b) => {
    if (a.cost !== b.cost) return a.cost < b.cost ? -1 : 1;
    return directionPriority(from, a.pos) - directionPriority(from, b.pos);
  });
}
