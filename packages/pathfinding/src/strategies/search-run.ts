import { PathfindingError, type SearchConfig } from "@waypoint/contracts";
import type { SearchStats, StrategyName } from "./types";

/**
 * Per-call bookkeeping: the iteration budget, cancellation and counters.
 *
 * Strategies call {@link SearchRun.tick} once at the top of every loop
 * turn; nothing else in a search can run unbounded.
 */
export class SearchRun {
  private iterations = 0;
  private expanded = 0;
  private maxFrontier = 0;
  private readonly startedAt = performance.now();
  private readonly maxIterations: number;

  /**
   * @param defaultMaxIterations - budget used when the config sets none
   */
  constructor(
    private readonly strategy: StrategyName,
    private readonly config: SearchConfig,
    defaultMaxIterations = Number.POSITIVE_INFINITY,
  ) {
    this.maxIterations = config.maxIterations ?? defaultMaxIterations;
  }

  get random(): () => number {
    return this.config.random;
  }

  /**
   * Account for one loop turn.
   *
   * @throws PathfindingError `SEARCH_ABORTED` once the signal fires,
   * `SEARCH_BUDGET_EXCEEDED` when the turn would exceed `maxIterations`
   */
  tick(): void {
    this.throwIfAborted();
    if (this.iterations >= this.maxIterations) {
      throw PathfindingError.budgetExceeded(this.strategy, this.maxIterations);
    }
    this.iterations++;
  }

  recordExpansion(): void {
    this.expanded++;
  }

  recordFrontier(size: number): void {
    if (size > this.maxFrontier) this.maxFrontier = size;
  }

  stats(): SearchStats {
    return {
      iterations: this.iterations,
      expanded: this.expanded,
      maxFrontier: this.maxFrontier,
      durationMs: performance.now() - this.startedAt,
    };
  }

  private throwIfAborted(): void {
    const signal = this.config.signal;
    if (!signal?.aborted) return;
    throw PathfindingError.aborted(this.strategy, signal.reason ?? null);
  }
}
