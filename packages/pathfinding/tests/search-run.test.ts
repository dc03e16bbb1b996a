import { DEFAULT_MAX_ITERATIONS } from "@waypoint/contracts";
import { describe, expect, it } from "vitest";
import {
  createAgent,
  listStrategies,
  parseGrid,
  SearchRun,
  TileGrid,
} from "../src";
import { errorOf } from "./test-helpers";

const start = { row: 0, col: 0 };
const goal = { row: 2, col: 2 };

describe("SearchRun", () => {
  it("counts ticks up to the budget", () => {
    const run = new SearchRun("DFS", { maxIterations: 2, random: Math.random });
    run.tick();
    run.tick();

    const error = errorOf(() => run.tick());
    expect(error.code).toBe("SEARCH_BUDGET_EXCEEDED");
    expect(error.details).toEqual({ strategy: "DFS", maxIterations: 2 });
    expect(run.stats().iterations).toBe(2);
  });

  it("keeps the largest frontier seen", () => {
    const run = new SearchRun("AStar", {
      maxIterations: DEFAULT_MAX_ITERATIONS,
      random: Math.random,
    });
    run.recordFrontier(3);
    run.recordFrontier(9);
    run.recordFrontier(4);
    run.recordExpansion();

    const stats = run.stats();
    expect(stats.maxFrontier).toBe(9);
    expect(stats.expanded).toBe(1);
    expect(stats.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("runs unbounded when neither config nor default sets a budget", () => {
    const run = new SearchRun("DFS", { random: Math.random });
    for (let i = 0; i < 1000; i++) run.tick();

    expect(run.stats().iterations).toBe(1000);
  });

  it("falls back to the default budget", () => {
    const run = new SearchRun("Example", { random: Math.random }, 3);
    run.tick();
    run.tick();
    run.tick();

    expect(errorOf(() => run.tick()).details).toEqual({
      strategy: "Example",
      maxIterations: 3,
    });
  });

  it("prefers the configured budget over the default", () => {
    const run = new SearchRun(
      "Example",
      { maxIterations: 1, random: Math.random },
      3,
    );
    run.tick();

    expect(errorOf(() => run.tick()).code).toBe("SEARCH_BUDGET_EXCEEDED");
  });

  it("checks the signal before the budget", () => {
    const controller = new AbortController();
    controller.abort();
    const run = new SearchRun("Example", {
      maxIterations: 1,
      signal: controller.signal,
      random: Math.random,
    });

    expect(errorOf(() => run.tick()).code).toBe("SEARCH_ABORTED");
  });
});

describe("cancellation", () => {
  it.each(listStrategies())("%s stops on an aborted signal", (name) => {
    const controller = new AbortController();
    controller.abort(new Error("shutting down"));

    const error = errorOf(() =>
      createAgent(name).findPath(TileGrid.uniform(3, 3), start, goal, {
        signal: controller.signal,
      }),
    );
    expect(error.code).toBe("SEARCH_ABORTED");
    expect(error.message).toBe(`${name} search aborted`);
  });

  it("stops a walk that is already under way", () => {
    const controller = new AbortController();
    let draws = 0;
    const random = () => {
      draws++;
      controller.abort();
      return 0;
    };

    const error = errorOf(() =>
      createAgent("Example").findPath(TileGrid.uniform(3, 3), start, goal, {
        signal: controller.signal,
        random,
      }),
    );
    expect(error.code).toBe("SEARCH_ABORTED");
    expect(draws).toBe(1);
  });

  it("answers start === goal without consuming the budget", () => {
    const controller = new AbortController();
    controller.abort();

    const path = createAgent("AStar").findPath(
      TileGrid.uniform(3, 3),
      start,
      start,
      { signal: controller.signal },
    );
    expect(path.toJSON()).toEqual([[0, 0]]);
  });
});

describe("default budgets", () => {
  // Column 4 is a wall: the 28 cells left of it hold 507 393 self-avoiding
  // routes from the corner, and the goal sits on the other side.
  const walled = TileGrid.fromCosts(
    Array.from({ length: 7 }, () =>
      Array.from({ length: 7 }, (_, col) => (col === 4 ? null : 1)),
    ),
  );

  it.each(["BranchAndBound", "AStar"])(
    "%s exhausts a walled-off goal without a budget",
    (name) => {
      const { path, stats } = createAgent(name).search(
        walled,
        { row: 0, col: 0 },
        { row: 6, col: 6 },
      );

      expect(path.isEmpty()).toBe(true);
      expect(stats.iterations).toBe(507_393);
      expect(stats.iterations).toBeGreaterThan(DEFAULT_MAX_ITERATIONS);
    },
    60_000,
  );

  it("still honours a budget the caller sets", () => {
    const error = errorOf(() =>
      createAgent("BranchAndBound").search(
        walled,
        { row: 0, col: 0 },
        { row: 6, col: 6 },
        { maxIterations: 1000 },
      ),
    );

    expect(error.code).toBe("SEARCH_BUDGET_EXCEEDED");
    expect(error.details).toEqual({
      strategy: "BranchAndBound",
      maxIterations: 1000,
    });
  });

  it("bounds the greedy walk by default", () => {
    const { grid, start: s, goal: g } = parseGrid("S..\n###\n..G");
    if (!s || !g) throw new Error("markers missing");

    const error = errorOf(() => createAgent("Example").findPath(grid, s, g));
    expect(error.message).toBe(
      `Example search exceeded its budget of ${DEFAULT_MAX_ITERATIONS} iterations`,
    );
  });
});
