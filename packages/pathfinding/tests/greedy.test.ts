import { SeededRandom } from "@waypoint/contracts";
import { describe, expect, it } from "vitest";
import { GreedyStrategy, parseGrid, TileGrid } from "../src";
import { errorOf } from "./test-helpers";

const start = { row: 0, col: 0 };
const goal = { row: 2, col: 2 };

describe("GreedyStrategy", () => {
  it("is registered as Example", () => {
    expect(new GreedyStrategy().name).toBe("Example");
  });

  it("breaks ties with the injected random source", () => {
    const grid = TileGrid.uniform(3, 3);
    const greedy = new GreedyStrategy();

    const eastFirst = greedy.findPath(grid, start, goal, {
      random: () => 0,
    });
    const southFirst = greedy.findPath(grid, start, goal, {
      random: () => 0.99,
    });

    expect(eastFirst.toJSON()).toEqual([
      [0, 0],
      [0, 1],
      [0, 2],
      [1, 2],
      [2, 2],
    ]);
    expect(southFirst.toJSON()).toEqual([
      [0, 0],
      [1, 0],
      [2, 0],
      [2, 1],
      [2, 2],
    ]);
  });

  it("reproduces a walk from the same seed", () => {
    const grid = TileGrid.uniform(6, 6);
    const far = { row: 5, col: 5 };
    const greedy = new GreedyStrategy();

    const a = greedy.findPath(grid, start, far, {
      random: new SeededRandom(7).asSource(),
    });
    const b = greedy.findPath(grid, start, far, {
      random: new SeededRandom(7).asSource(),
    });

    expect(a.equals(b)).toBe(true);
    expect(a.moves).toBe(10);
  });

  it("ignores tile costs", () => {
    const { grid } = parseGrid("S9\n..");
    const path = new GreedyStrategy().findPath(
      grid,
      start,
      { row: 0, col: 1 },
      { random: () => 0 },
    );

    expect(path.toJSON()).toEqual([
      [0, 0],
      [0, 1],
    ]);
    expect(path.totalCost(grid)).toBe(9);
  });

  it("returns the empty path from a cell with no passable neighbour", () => {
    const { grid, start: s, goal: g } = parseGrid("S#G");
    if (!s || !g) throw new Error("markers missing");

    expect(new GreedyStrategy().findPath(grid, s, g).isEmpty()).toBe(true);
  });

  it("stops an oscillating walk with SEARCH_BUDGET_EXCEEDED", () => {
    const { grid, start: s, goal: g } = parseGrid(`
      S..
      ###
      ..G
    `);
    if (!s || !g) throw new Error("markers missing");

    const error = errorOf(() =>
      new GreedyStrategy().findPath(grid, s, g, { maxIterations: 50 }),
    );

    expect(error.code).toBe("SEARCH_BUDGET_EXCEEDED");
    expect(error.message).toBe(
      "Example search exceeded its budget of 50 iterations",
    );
  });

  it("counts one iteration per step", () => {
    const grid = TileGrid.uniform(3, 3);
    const greedy = new GreedyStrategy();

    const { path, stats } = greedy.search(grid, start, goal, {
      maxIterations: 4,
    });
    expect(path.moves).toBe(4);
    expect(stats.iterations).toBe(4);

    expect(
      errorOf(() => greedy.search(grid, start, goal, { maxIterations: 3 }))
        .code,
    ).toBe("SEARCH_BUDGET_EXCEEDED");
  });
});
