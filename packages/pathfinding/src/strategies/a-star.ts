import type { Coord } from "../core/geometry/types";
import type { SearchGrid } from "../core/grid/types";
import type { Path } from "../path";
import { BaseStrategy } from "./base-strategy";
import { searchCandidates } from "./best-first";
import type { SearchRun } from "./search-run";

/**
 * A* with the Manhattan heuristic, registered as "AStar".
 *
 * Each candidate carries the Manhattan distance from its last cell to the
 * goal, and the pool is ordered by accumulated cost plus that distance.
 * The result is a cheapest route whenever every passable tile costs at
 * least 1; with cheaper tiles the heuristic can overestimate.
 */
export class AStarStrategy extends BaseStrategy {
  readonly name = "AStar";

  protected explore(
    grid: SearchGrid,
    start: Coord,
    goal: Coord,
    run: SearchRun,
  ): Path {
    return searchCandidates(grid, start, goal, run, (pos) =>
      grid.manhattan(pos, goal),
    );
  }
}
