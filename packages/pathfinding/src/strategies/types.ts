import type { SearchOptions } from "@waypoint/contracts";
import type { Coord } from "../core/geometry/types";
import type { SearchGrid } from "../core/grid/types";
import type { Path } from "../path";

/**
 * Registry names of the built-in strategies, in registration order.
 */
export const STRATEGY_NAMES = [
  "Example",
  "DFS",
  "BranchAndBound",
  "AStar",
] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

/**
 * Counters collected while a search runs.
 */
export interface SearchStats {
  /** Loop turns taken (greedy steps, DFS pushes and pops, pool selections) */
  readonly iterations: number;
  /** Cells whose neighbours were examined */
  readonly expanded: number;
  /** Largest frontier size observed (DFS stack or candidate pool) */
  readonly maxFrontier: number;
  readonly durationMs: number;
}

export interface SearchOutcome {
  readonly path: Path;
  readonly stats: SearchStats;
}

/**
 * A pathfinding strategy.
 *
 * Instances hold no state between calls: each search owns its frontier,
 * so one instance may serve any number of searches.
 */
export interface SearchStrategy {
  readonly name: StrategyName;

  /**
   * Route from `start` to `goal`, or the empty path when the strategy's
   * search ends without reaching the goal.
   *
   * @throws PathfindingError `OUT_OF_BOUNDS`, `INVALID_OPTIONS`,
   * `SEARCH_BUDGET_EXCEEDED` or `SEARCH_ABORTED`
   */
  findPath(
    grid: SearchGrid,
    start: Coord,
    goal: Coord,
    options?: SearchOptions,
  ): Path;

  /**
   * Same as {@link SearchStrategy.findPath}, also reporting search statistics.
   */
  search(
    grid: SearchGrid,
    start: Coord,
    goal: Coord,
    options?: SearchOptions,
  ): SearchOutcome;
}
