/**
 * A Result type for explicit, type-safe error handling.
 *
 * Search failures that a caller is expected to handle (unknown strategy,
 * out-of-bounds endpoints, exhausted budgets) travel as `Err` values instead
 * of exceptions at the API boundary.
 *
 * @example
 * ```typescript
 * const cost = findPath(grid, start, goal, { strategy: "AStar" })
 *   .map((result) => result.cost)
 *   .getOrElse(Number.POSITIVE_INFINITY);
 * ```
 */
export class Result<T, E> {
  private constructor(
    private readonly _value: T | undefined,
    private readonly _error: E | undefined,
    private readonly _isOk: boolean,
  ) {}

  /**
   * Create a successful Result containing a value.
   */
  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>(value, undefined, true);
  }

  /**
   * Create a failed Result containing an error.
   */
  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>(undefined, error, false);
  }

  /**
   * Run `fn`, capturing errors accepted by `isExpected` as `Err`.
   * Anything else is rethrown untouched.
   */
  static capture<T, E>(
    fn: () => T,
    isExpected: (e: unknown) => e is E,
  ): Result<T, E> {
    try {
      return Result.ok(fn());
    } catch (e) {
      if (isExpected(e)) {
        return Result.err(e);
      }
      throw e;
    }
  }

  isOk(): boolean {
    return this._isOk;
  }

  isErr(): boolean {
    return !this._isOk;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    if (this._isOk) {
      return Result.ok(fn(this._value as T));
    }
    return Result.err(this._error as E);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    if (this._isOk) {
      return Result.ok(this._value as T);
    }
    return Result.err(fn(this._error as E));
  }

  andThen<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    if (this._isOk) {
      return fn(this._value as T);
    }
    return Result.err(this._error as E);
  }

  getOrElse(defaultValue: T): T {
    return this._isOk ? (this._value as T) : defaultValue;
  }

  getOrThrow(): T {
    if (this._isOk) {
      return this._value as T;
    }
    throw this._error;
  }

  match<U>(onOk: (value: T) => U, onErr: (error: E) => U): U {
    return this._isOk ? onOk(this._value as T) : onErr(this._error as E);
  }

  toJSON(): { success: true; value: T } | { success: false; error: E } {
    if (this._isOk) {
      return { success: true, value: this._value as T };
    }
    return { success: false, error: this._error as E };
  }

  get value(): T {
    if (!this._isOk) {
      throw new Error("Cannot access value of Err Result");
    }
    return this._value as T;
  }

  get error(): E {
    if (this._isOk) {
      throw new Error("Cannot access error of Ok Result");
    }
    return this._error as E;
  }
}

export const Ok = Result.ok;
export const Err = Result.err;
