import { choice, DEFAULT_MAX_ITERATIONS } from "@waypoint/contracts";
import { type Coord, coordEquals } from "../core/geometry/types";
import type { SearchGrid, Tile } from "../core/grid/types";
import { Path } from "../path";
import { BaseStrategy } from "./base-strategy";
import type { SearchRun } from "./search-run";

/**
 * Greedy local descent, registered as "Example".
 *
 * Each step moves to the neighbour closest to the goal by Manhattan
 * distance, picking uniformly at random among ties. There is no memory of
 * visited cells, so the route may double back on itself, and on a plateau
 * or behind a wall the walk never arrives: the iteration budget, by default
 * `DEFAULT_MAX_ITERATIONS`, is the only thing that ends it
 * (`SEARCH_BUDGET_EXCEEDED`). A cell with no passable
 * neighbour ends the walk with the empty path.
 */
export class GreedyStrategy extends BaseStrategy {
  readonly name = "Example";
  protected readonly defaultMaxIterations = DEFAULT_MAX_ITERATIONS;

  protected explore(
    grid: SearchGrid,
    start: Coord,
    goal: Coord,
    run: SearchRun,
  ): Path {
    const route: Coord[] = [start];
    let current = start;

    while (!coordEquals(current, goal)) {
      run.tick();

      const neighbors = grid.neighbors4(current.row, current.col);
      run.recordExpansion();

      let bestDistance = Number.POSITIVE_INFINITY;
      let tied: Tile[] = [];
      for (const tile of neighbors) {
        const distance = grid.manhattan(tile.pos, goal);
        if (distance < bestDistance) {
          bestDistance = distance;
          tied = [tile];
        } else if (distance === bestDistance) {
          tied.push(tile);
        }
      }

      const next = choice(run.random, tied);
      if (!next) return Path.EMPTY;

      route.push(next.pos);
      current = next.pos;
    }

    return new Path(route);
  }
}
