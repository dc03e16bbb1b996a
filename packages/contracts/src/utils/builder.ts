import { type SearchOptions, SearchOptionsSchema } from "../schemas/search";
import { PathfindingError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

/**
 * Search settings with every default applied.
 *
 * `maxIterations` stays unset unless the caller gives one; each strategy
 * then applies its own default budget.
 */
export interface SearchConfig {
  readonly maxIterations?: number;
  readonly signal?: AbortSignal;
  readonly random: () => number;
}

/**
 * Default iteration budget of the greedy strategy.
 *
 * Greedy descent has no failure condition of its own, so this is what stops
 * it at an unreachable goal. The exhaustive strategies always terminate and
 * run unbounded unless the caller sets `maxIterations`.
 */
export const DEFAULT_MAX_ITERATIONS = 250_000;

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  random: Math.random,
};

export function buildSearchConfig(
  input: SearchOptions = {},
): Result<SearchConfig, PathfindingError> {
  const parsed = SearchOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const field = issue.path.map(String).join(".") || "options";
      return `${field}: ${issue.message}`;
    });
    return Err(
      PathfindingError.invalidOptions(
        `Invalid search options: ${issues.join("; ")}`,
        { issues },
      ),
    );
  }

  const options = parsed.data;
  return Ok({
    random: options.random ?? DEFAULT_SEARCH_CONFIG.random,
    ...(options.maxIterations !== undefined && {
      maxIterations: options.maxIterations,
    }),
    ...(options.signal && { signal: options.signal }),
  });
}
