/**
 * Error codes for pathfinding operations.
 * Using discriminated union for type-safe error handling.
 */
export type PathfindingErrorCode =
  | "UNKNOWN_STRATEGY"
  | "OUT_OF_BOUNDS"
  | "SEARCH_BUDGET_EXCEEDED"
  | "SEARCH_ABORTED"
  | "INVALID_GRID"
  | "INVALID_OPTIONS";

/**
 * Unified error type for every failing pathfinding operation.
 *
 * An unreachable goal is not an error: strategies report it with an empty
 * path.
 *
 * @example
 * ```typescript
 * throw PathfindingError.outOfBounds({ row: 9, col: 0 }, { rows: 3, cols: 3 });
 * ```
 */
export class PathfindingError extends Error {
  override readonly name = "PathfindingError";

  constructor(
    public readonly code: PathfindingErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PathfindingError);
    }
  }

  static unknownStrategy(
    name: string,
    available: readonly string[],
  ): PathfindingError {
    return new PathfindingError(
      "UNKNOWN_STRATEGY",
      `Unknown strategy '${name}'. Available: ${available.join(", ")}`,
      { name, available: [...available] },
    );
  }

  static outOfBounds(
    position: { readonly row: number; readonly col: number },
    size: { readonly rows: number; readonly cols: number },
  ): PathfindingError {
    return new PathfindingError(
      "OUT_OF_BOUNDS",
      `Cell (${position.row},${position.col}) is outside the ${size.rows}x${size.cols} grid`,
      { row: position.row, col: position.col, rows: size.rows, cols: size.cols },
    );
  }

  static budgetExceeded(
    strategy: string,
    maxIterations: number,
  ): PathfindingError {
    return new PathfindingError(
      "SEARCH_BUDGET_EXCEEDED",
      `${strategy} search exceeded its budget of ${maxIterations} iterations`,
      { strategy, maxIterations },
    );
  }

  static aborted(strategy: string, reason: unknown): PathfindingError {
    return new PathfindingError("SEARCH_ABORTED", `${strategy} search aborted`, {
      strategy,
      reason,
    });
  }

  static invalidGrid(
    message: string,
    details?: Record<string, unknown>,
  ): PathfindingError {
    return new PathfindingError("INVALID_GRID", message, details);
  }

  static invalidOptions(
    message: string,
    details?: Record<string, unknown>,
  ): PathfindingError {
    return new PathfindingError("INVALID_OPTIONS", message, details);
  }

  /**
   * Check if an unknown error is a PathfindingError.
   */
  static isPathfindingError(error: unknown): error is PathfindingError {
    return error instanceof PathfindingError;
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): {
    name: string;
    code: PathfindingErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
