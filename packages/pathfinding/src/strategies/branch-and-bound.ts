import type { Coord } from "../core/geometry/types";
import type { SearchGrid } from "../core/grid/types";
import type { Path } from "../path";
import { BaseStrategy } from "./base-strategy";
import { searchCandidates } from "./best-first";
import type { SearchRun } from "./search-run";

/**
 * Uninformed branch-and-bound, registered as "BranchAndBound".
 *
 * Always extends the cheapest candidate route (shorter routes first on
 * equal cost). Costs only grow as routes extend, so the first route to
 * reach the goal when selected is a cheapest one. Without a heuristic this
 * is uniform-cost search, and it visits every route cheaper than the answer.
 */
export class BranchAndBoundStrategy extends BaseStrategy {
  readonly name = "BranchAndBound";

  protected explore(
    grid: SearchGrid,
    start: Coord,
    goal: Coord,
    run: SearchRun,
  ): Path {
    return searchCandidates(grid, start, goal, run, () => 0);
  }
}
