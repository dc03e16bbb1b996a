import { type Coord, coordEquals } from "../core/geometry/types";

/**
 * Candidate route stored as a predecessor chain.
 *
 * Extending a candidate allocates one node instead of copying the route,
 * and siblings share their common prefix. The coordinate array is built
 * only for the candidate that is finally returned.
 */
export interface PathNode {
  readonly pos: Coord;
  readonly parent: PathNode | null;
  /** Coordinates on the route, this one included */
  readonly length: number;
}

export function rootNode(pos: Coord): PathNode {
  return { pos, parent: null, length: 1 };
}

export function extendNode(parent: PathNode, pos: Coord): PathNode {
  return { pos, parent, length: parent.length + 1 };
}

/**
 * Whether `pos` is already on the route ending at `node`.
 * Walks the chain back to the root.
 */
export function routeContains(node: PathNode, pos: Coord): boolean {
  for (let n: PathNode | null = node; n !== null; n = n.parent) {
    if (coordEquals(n.pos, pos)) return true;
  }
  return false;
}

export function routeCoords(node: PathNode): Coord[] {
  const coords: Coord[] = [];
  for (let n: PathNode | null = node; n !== null; n = n.parent) {
    coords.push(n.pos);
  }
  return coords.reverse();
}
