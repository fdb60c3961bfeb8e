import { Graph } from "./Graph";
import { createLogger } from "./logger";
import { defaultRandom, shuffle } from "./random";
import type { Logger } from "pino";
import type { SpanningTreeOptions, SpanningTreeStats } from "./type";

let defaultLogger: Logger | undefined;

// Created on first use, never at import.
function getDefaultLogger(): Logger {
  defaultLogger ??= createLogger("spanning-tree");
  return defaultLogger;
}

/**
 * Builds a random maximal acyclic subgraph of `graph`: a spanning tree when
 * `graph` is connected, a spanning forest otherwise.
 *
 * Edges are tried in shuffled order and an edge is rolled back when it
 * closes a cycle. The result is random over insertion orders, which is not
 * the same as uniform over spanning trees. `graph` is left untouched.
 */
export function makeSpanningTree(
  graph: Graph,
  options: SpanningTreeOptions = {}
): Graph {
  let log = options.logger ?? getDefaultLogger();
  let tree = new Graph(graph.size());
  let edges = shuffle(graph.edges(), options.random ?? defaultRandom);

  let accepted = 0;
  for (let [s, t] of edges) {
    tree.addEdge(s, t);
    if (tree.isCyclic()) {
      tree.removeEdge(s, t);
    } else {
      accepted++;
    }
  }

  let stats: SpanningTreeStats = {
    nodes: tree.size(),
    candidates: edges.length,
    accepted,
    rejected: edges.length - accepted,
  };
  log.debug(stats, "spanning tree built");
  return tree;
}
