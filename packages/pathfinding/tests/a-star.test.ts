import { describe, expect, it } from "vitest";
import {
  AStarStrategy,
  BranchAndBoundStrategy,
  parseGrid,
  TileGrid,
} from "../src";
import { expectValidRoute } from "./test-helpers";

const astar = new AStarStrategy();

describe("AStarStrategy", () => {
  it("is registered as AStar", () => {
    expect(astar.name).toBe("AStar");
  });

  it("finds a cheapest route on a uniform grid", () => {
    const grid = TileGrid.uniform(4, 4);
    const start = { row: 0, col: 0 };
    const goal = { row: 3, col: 3 };
    const path = astar.findPath(grid, start, goal);

    expectValidRoute(path, start, goal);
    expect(path.totalCost(grid)).toBe(6);
  });

  it("takes a longer detour around an expensive cell", () => {
    const { grid, start, goal } = parseGrid("S9G\n...");
    if (!start || !goal) throw new Error("markers missing");

    expect(astar.findPath(grid, start, goal).toJSON()).toEqual([
      [0, 0],
      [1, 0],
      [1, 1],
      [1, 2],
      [0, 2],
    ]);
  });

  it("routes around walls", () => {
    const { grid, start, goal } = parseGrid(`
      S...
      ###.
      G...
    `);
    if (!start || !goal) throw new Error("markers missing");

    const path = astar.findPath(grid, start, goal);
    expectValidRoute(path, start, goal);
    expect(path.moves).toBe(8);
    expect(path.totalCost(grid)).toBe(8);
  });

  it("expands fewer routes than branch-and-bound", () => {
    const grid = TileGrid.uniform(5, 5);
    const start = { row: 0, col: 0 };
    const goal = { row: 4, col: 4 };

    const guided = astar.search(grid, start, goal);
    const blind = new BranchAndBoundStrategy().search(grid, start, goal);

    expect(guided.path.totalCost(grid)).toBe(8);
    expect(blind.path.totalCost(grid)).toBe(8);
    expect(guided.stats.expanded).toBeLessThan(blind.stats.expanded);
  });

  it("ignores the cost of a walled start cell", () => {
    const grid = TileGrid.fromCosts([
      [null, 9, 1],
      [1, 1, 1],
    ]);
    const path = astar.findPath(grid, { row: 0, col: 0 }, { row: 0, col: 2 });

    expect(path.toJSON()).toEqual([
      [0, 0],
      [1, 0],
      [1, 1],
      [1, 2],
      [0, 2],
    ]);
    expect(path.totalCost(grid)).toBe(4);
  });

  it("returns the empty path when the goal is walled off", () => {
    const { grid, start, goal } = parseGrid("S.#\n..#\n##G");
    if (!start || !goal) throw new Error("markers missing");

    expect(astar.findPath(grid, start, goal).isEmpty()).toBe(true);
  });
});
