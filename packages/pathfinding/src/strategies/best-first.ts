import { type Coord, coordEquals } from "../core/geometry/types";
import type { SearchGrid } from "../core/grid/types";
import { MinHeap } from "../core/data-structures/min-heap";
import { Path } from "../path";
import {
  extendNode,
  type PathNode,
  rootNode,
  routeContains,
  routeCoords,
} from "./path-node";
import type { SearchRun } from "./search-run";

/**
 * Frontier entry: a candidate route with its accumulated cost `g` and the
 * estimate `h` of the remaining cost, fixed when the candidate is created.
 */
export interface Candidate {
  readonly node: PathNode;
  readonly g: number;
  readonly h: number;
}

/**
 * Orders candidates by `g + h`, then by route length; candidates equal on
 * both leave the heap in insertion order.
 */
export function compareCandidates(a: Candidate, b: Candidate): number {
  const fa = a.g + a.h;
  const fb = b.g + b.h;
  if (fa !== fb) return fa < fb ? -1 : 1;
  return a.node.length - b.node.length;
}

/**
 * Best-first search over self-avoiding routes.
 *
 * Candidates are never merged: the same cell may be reached by several
 * routes at different costs, and only a candidate's own route is excluded
 * when extending it. The first candidate selected whose route ends at the
 * goal is returned; an exhausted pool yields the empty path.
 *
 * `g` starts at 0: the start cell is never entered, so its cost (even
 * `BLOCKED`, when the start is a wall) is not part of any route's cost.
 */
export function searchCandidates(
  grid: SearchGrid,
  start: Coord,
  goal: Coord,
  run: SearchRun,
  estimate: (pos: Coord) => number,
): Path {
  const pool = new MinHeap<Candidate>(compareCandidates);
  pool.push({
    node: rootNode(start),
    g: 0,
    h: estimate(start),
  });
  run.recordFrontier(pool.size);

  while (!pool.isEmpty) {
    run.tick();

    const best = pool.pop();
    if (best === undefined) break;

    const current = best.node.pos;
    if (coordEquals(current, goal)) {
      return new Path(routeCoords(best.node));
    }

    run.recordExpansion();
    for (const tile of grid.neighbors4(current.row, current.col)) {
      if (routeContains(best.node, tile.pos)) continue;
      pool.push({
        node: extendNode(best.node, tile.pos),
        g: best.g + tile.cost,
        h: estimate(tile.pos),
      });
    }
    run.recordFrontier(pool.size);
  }

  return Path.EMPTY;
}
