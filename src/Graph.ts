import type { Edge, NodeId } from "./type";
import { GraphSizeError } from "./errors";
import { assert, assertNodeIndex, isNodeIndex, nullthrows } from "./share";

// Largest valid array length.
export const MAX_SIZE = 2 ** 32 - 1;

/**
 * Undirected graph over the fixed node set `0..size-1`.
 *
 * Each node keeps a set of its neighbours. Every edge is stored from both
 * endpoints, so `t` is in the set of `s` exactly when `s` is in the set of
 * `t`. Self-loops are allowed.
 */
export class Graph {
  private readonly nodes: Array<Set<NodeId>>;

  constructor(size: number) {
    assert(
      Number.isInteger(size) && size >= 0 && size <= MAX_SIZE,
      new GraphSizeError(size)
    );
    this.nodes = Array.from({ length: size }, () => new Set<NodeId>());
  }

  static fromEdges(size: number, edges: Iterable<Edge>): Graph {
    let graph = new Graph(size);
    for (let [s, t] of edges) {
      graph.addEdge(s, t);
    }
    return graph;
  }

  clone(): Graph {
    let copy = new Graph(this.size());
    this.nodes.forEach((neighbours, node) => {
      for (let neighbour of neighbours) {
        copy.nodes[node].add(neighbour);
      }
    });
    return copy;
  }

  size(): number {
    return this.nodes.length;
  }

  hasNode(node: NodeId): boolean {
    return isNodeIndex(node, this.size());
  }

  // Returns a copy; mutating it does not touch the graph.
  getNeighbours(node: NodeId): Set<NodeId> {
    return new Set(this._neighboursOf(node));
  }

  degree(node: NodeId): number {
    return this._neighboursOf(node).size;
  }

  addEdge(s: NodeId, t: NodeId) {
    this._assertHasNodeId(s);
    this._assertHasNodeId(t);
    this.nodes[s].add(t);
    this.nodes[t].add(s);
  }

  removeEdge(s: NodeId, t: NodeId) {
    this._assertHasNodeId(s);
    this._assertHasNodeId(t);
    this.nodes[s].delete(t);
    this.nodes[t].delete(s);
  }

  // Removes every edge incident to `node`, leaving it isolated.
  removeEdges(node: NodeId) {
    for (let neighbour of this.getNeighbours(node)) {
      this.removeEdge(node, neighbour);
    }
  }

  adjacent(s: NodeId, t: NodeId): boolean {
    this._assertHasNodeId(t);
    return this._neighboursOf(s).has(t);
  }

  // Each undirected edge once, as [min, max], ordered by its lower endpoint.
  edges(): Array<Edge> {
    let out: Array<Edge> = [];
    this.nodes.forEach((neighbours, node) => {
      for (let neighbour of neighbours) {
        if (neighbour >= node) {
          out.push([node, neighbour]);
        }
      }
    });
    return out;
  }

  countEdges(): number {
    return this.edges().length;
  }

  // Destructive traversal over a clone: expanding a node first strips all of
  // its edges, so reaching an already visited node means a second path to it.
  // Quadratic in the worst case.
  isCyclic(): boolean {
    let g = this.clone();
    let open: Array<NodeId> = [];
    let visited = new Set<NodeId>();

    for (let root = 0; root < g.size(); root++) {
      if (visited.has(root)) {
        continue;
      }
      visited.add(root);
      open.push(root);

      while (open.length > 0) {
        let current = nullthrows(open.pop());
        let neighbours = g.getNeighbours(current);
        g.removeEdges(current);
        for (let neighbour of neighbours) {
          if (visited.has(neighbour)) {
            return true;
          }
          visited.add(neighbour);
          open.push(neighbour);
        }
      }
    }

    return false;
  }

  isAcyclic(): boolean {
    return !this.isCyclic();
  }

  private _neighboursOf(node: NodeId): Set<NodeId> {
    this._assertHasNodeId(node);
    return this.nodes[node];
  }

  _assertHasNodeId(node: NodeId) {
    assertNodeIndex(node, this.size());
  }
}
