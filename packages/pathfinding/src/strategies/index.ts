export { AStarStrategy } from "./a-star";
export { BaseStrategy } from "./base-strategy";
export { type Candidate, compareCandidates } from "./best-first";
export { BranchAndBoundStrategy } from "./branch-and-bound";
export { DepthFirstStrategy } from "./depth-first";
export { GreedyStrategy } from "./greedy";
export { SearchRun } from "./search-run";
export {
  type SearchOutcome,
  type SearchStats,
  type SearchStrategy,
  STRATEGY_NAMES,
  type StrategyName,
} from "./types";
