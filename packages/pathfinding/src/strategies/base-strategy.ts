import {
  buildSearchConfig,
  CoordSchema,
  PathfindingError,
  type SearchOptions,
} from "@waypoint/contracts";
import { type Coord, coordEquals } from "../core/geometry/types";
import type { SearchGrid } from "../core/grid/types";
import { Path } from "../path";
import { SearchRun } from "./search-run";
import type {
  SearchOutcome,
  SearchStrategy,
  StrategyName,
} from "./types";

/**
 * Shared entry point for the built-in strategies.
 *
 * Validates options and endpoints, answers `start === goal` directly, and
 * hands everything else to the concrete {@link BaseStrategy.explore}.
 *
 * @abstract
 */
export abstract class BaseStrategy implements SearchStrategy {
  abstract readonly name: StrategyName;

  /**
   * Iteration budget when the caller sets no `maxIterations`.
   * Unbounded, since the exhaustive searches always end on a finite grid.
   */
  protected readonly defaultMaxIterations: number = Number.POSITIVE_INFINITY;

  findPath(
    grid: SearchGrid,
    start: Coord,
    goal: Coord,
    options?: SearchOptions,
  ): Path {
    return this.search(grid, start, goal, options).path;
  }

  search(
    grid: SearchGrid,
    start: Coord,
    goal: Coord,
    options?: SearchOptions,
  ): SearchOutcome {
    const config = buildSearchConfig(options).getOrThrow();
    assertInBounds(grid, start);
    assertInBounds(grid, goal);

    const run = new SearchRun(this.name, config, this.defaultMaxIterations);
    const path = coordEquals(start, goal)
      ? new Path([start])
      : this.explore(grid, start, goal, run);

    return { path, stats: run.stats() };
  }

  /**
   * The search loop proper. Endpoints are in bounds and distinct.
   */
  protected abstract explore(
    grid: SearchGrid,
    start: Coord,
    goal: Coord,
    run: SearchRun,
  ): Path;
}

function assertInBounds(grid: SearchGrid, position: Coord): void {
  const valid =
    CoordSchema.safeParse(position).success &&
    position.row >= 0 &&
    position.row < grid.rows &&
    position.col >= 0 &&
    position.col < grid.cols;

  if (!valid) {
    throw PathfindingError.outOfBounds(position, grid);
  }
}
