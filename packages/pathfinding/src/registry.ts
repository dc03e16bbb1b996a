/**
 * Strategy registry
 *
 * Fixed, read-only mapping from strategy name to constructor. Every lookup
 * builds a fresh instance.
 */

import { PathfindingError } from "@waypoint/contracts";
import {
  AStarStrategy,
  BranchAndBoundStrategy,
  DepthFirstStrategy,
  GreedyStrategy,
  type SearchStrategy,
  STRATEGY_NAMES,
  type StrategyName,
} from "./strategies";

const strategies: Readonly<Record<StrategyName, () => SearchStrategy>> =
  Object.freeze({
    Example: () => new GreedyStrategy(),
    DFS: () => new DepthFirstStrategy(),
    BranchAndBound: () => new BranchAndBoundStrategy(),
    AStar: () => new AStarStrategy(),
  });

/**
 * Check whether a strategy is registered under `name` (case-sensitive).
 */
export function hasStrategy(name: string): name is StrategyName {
  return Object.hasOwn(strategies, name);
}

/**
 * Registered strategy names, in registration order.
 */
export function listStrategies(): StrategyName[] {
  return [...STRATEGY_NAMES];
}

/**
 * Instantiate the strategy registered under `name`.
 *
 * @example
 * ```typescript
 * const path = createAgent("AStar").findPath(grid, start, goal);
 * ```
 *
 * @throws PathfindingError `UNKNOWN_STRATEGY`, listing the registered names
 */
export function createAgent(name: string): SearchStrategy {
  if (!hasStrategy(name)) {
    throw PathfindingError.unknownStrategy(name, STRATEGY_NAMES);
  }
  return strategies[name]();
}
