/**
 * Search API
 *
 * Result-returning entry point: selects a strategy by name, runs it, and
 * reports every PathfindingError as an `Err` instead of throwing.
 */

import {
  PathfindingError,
  Result,
  type SearchOptions,
} from "@waypoint/contracts";
import type { Coord } from "./core/geometry/types";
import type { SearchGrid } from "./core/grid/types";
import type { Path } from "./path";
import { createAgent } from "./registry";
import type { SearchStats, StrategyName } from "./strategies";

export const DEFAULT_STRATEGY: StrategyName = "AStar";

export interface FindPathOptions extends SearchOptions {
  /**
   * Registry name of the strategy to run.
   * Default: "AStar"
   */
  readonly strategy?: string;
}

export interface SearchResult {
  readonly strategy: StrategyName;
  readonly path: Path;
  /** False when the strategy returned the empty path */
  readonly found: boolean;
  /** Total entry cost of the path; 0 when nothing was found */
  readonly cost: number;
  readonly stats: SearchStats;
}

/**
 * Find a route from `start` to `goal`.
 *
 * @example
 * ```typescript
 * const { grid, start, goal } = parseGrid(`
 *   S.#
 *   ..#
 *   ..G
 * `);
 * const result = findPath(grid, start, goal, { strategy: "BranchAndBound" });
 * if (result.isOk()) {
 *   console.log(`${result.value.path} costs ${result.value.cost}`);
 * }
 * ```
 */
export function findPath(
  grid: SearchGrid,
  start: Coord,
  goal: Coord,
  options: FindPathOptions = {},
): Result<SearchResult, PathfindingError> {
  const { strategy = DEFAULT_STRATEGY, ...searchOptions } = options;

  return Result.capture((): SearchResult => {
    const agent = createAgent(strategy);
    const { path, stats } = agent.search(grid, start, goal, searchOptions);
    const found = !path.isEmpty();
    return {
      strategy: agent.name,
      path,
      found,
      cost: found ? path.totalCost(grid) : 0,
      stats,
    };
  }, PathfindingError.isPathfindingError);
}
