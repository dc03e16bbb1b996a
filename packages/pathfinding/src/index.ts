/**
 * Waypoint - pluggable grid pathfinding
 *
 * Four interchangeable strategies behind one contract: greedy descent
 * ("Example"), depth-first search ("DFS"), branch-and-bound
 * ("BranchAndBound") and A* ("AStar").
 *
 * @example
 * ```typescript
 * import { createAgent, TileGrid } from "@waypoint/pathfinding";
 *
 * const grid = TileGrid.uniform(3, 3);
 * const path = createAgent("AStar").findPath(
 *   grid,
 *   { row: 0, col: 0 },
 *   { row: 2, col: 2 },
 * );
 * console.log(path.toString(), path.totalCost(grid));
 * ```
 */

// Core modules
export * from "./core/data-structures";
export * from "./core/geometry";
export * from "./core/grid";
// Routes
export { Path } from "./path";
// Strategies
export * from "./strategies";
export { createAgent, hasStrategy, listStrategies } from "./registry";
// High-level API
export {
  DEFAULT_STRATEGY,
  type FindPathOptions,
  findPath,
  type SearchResult,
} from "./api";
