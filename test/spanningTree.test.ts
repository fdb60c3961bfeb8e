import { it, assert, describe } from "vitest";
import {
  Graph,
  RandomSourceError,
  createLogger,
  makeSpanningTree,
  seededRandom,
} from "../src";
import type { Edge } from "../src";
import { countComponents, edgeKeys } from "./base/components";

function completeGraph(size: number): Graph {
  const graph = new Graph(size);
  for (let s = 0; s < size; s++) {
    for (let t = s + 1; t < size; t++) {
      graph.addEdge(s, t);
    }
  }
  return graph;
}

function assertSubgraph(tree: Graph, source: Graph) {
  const sourceKeys = edgeKeys(source.edges());
  for (const [s, t] of tree.edges()) {
    assert.isTrue(sourceKeys.has(`${s}-${t}`), `edge ${s}-${t} not in source`);
  }
}

describe("makeSpanningTree", () => {
  it("spans a connected graph with n - 1 edges", () => {
    const source = completeGraph(6);
    source.addEdge(0, 0);
    for (let seed = 0; seed < 25; seed++) {
      const tree = makeSpanningTree(source, { random: seededRandom(seed) });
      assert.equal(tree.size(), 6);
      assert.equal(tree.countEdges(), 5);
      assert.isTrue(tree.isAcyclic());
      assert.equal(countComponents(6, tree.edges()), 1);
      assertSubgraph(tree, source);
    }
  });

  it("builds a spanning forest for a disconnected graph", () => {
    const edges: Edge[] = [
      [0, 1],
      [1, 2],
      [2, 0],
      [3, 4],
      [6, 7],
      [7, 8],
      [8, 9],
      [9, 6],
      [6, 8],
    ];
    const source = Graph.fromEdges(10, edges);
    assert.equal(countComponents(10, edges), 4);

    const tree = makeSpanningTree(source, { random: seededRandom(11) });
    assert.isTrue(tree.isAcyclic());
    assert.equal(tree.countEdges(), 6);
    assert.equal(countComponents(10, tree.edges()), 4);
    assert.equal(tree.degree(5), 0);
    assertSubgraph(tree, source);
  });

  it("keeps a tree as it is", () => {
    const source = Graph.fromEdges(5, [
      [0, 1],
      [1, 2],
      [1, 3],
      [3, 4],
    ]);
    const tree = makeSpanningTree(source, { random: seededRandom(5) });
    assert.sameDeepMembers(tree.edges(), source.edges());
  });

  it("handles empty and single node graphs", () => {
    assert.equal(makeSpanningTree(new Graph(0)).size(), 0);

    const loop = Graph.fromEdges(1, [[0, 0]]);
    const tree = makeSpanningTree(loop);
    assert.equal(tree.size(), 1);
    assert.equal(tree.countEdges(), 0);
  });

  it("leaves the source graph untouched", () => {
    const source = completeGraph(5);
    const before = source.edges();
    const tree = makeSpanningTree(source, { random: seededRandom(1) });
    assert.deepEqual(source.edges(), before);
    tree.removeEdges(0);
    assert.deepEqual(source.edges(), before);
  });

  it("is reproducible for a seed", () => {
    const source = completeGraph(8);
    const a = makeSpanningTree(source, { random: seededRandom(42) });
    const b = makeSpanningTree(source, { random: seededRandom(42) });
    assert.deepEqual(a.edges(), b.edges());
  });

  it("uses Math.random without a random source", () => {
    const source = completeGraph(7);
    const tree = makeSpanningTree(source);
    assert.equal(tree.countEdges(), 6);
    assert.isTrue(tree.isAcyclic());
  });

  it("rejects a random source outside [0, 1)", () => {
    const source = Graph.fromEdges(3, [
      [0, 1],
      [1, 2],
    ]);
    assert.throws(
      () => makeSpanningTree(source, { random: () => 1 }),
      RandomSourceError
    );
  });

  it("logs accepted and rejected edges", () => {
    const lines: string[] = [];
    const logger = createLogger("spanning-tree-test", {
      config: { logLevel: "debug" },
      destination: { write: (line: string) => void lines.push(line) },
    });
    const source = Graph.fromEdges(3, [
      [0, 1],
      [1, 2],
      [2, 0],
    ]);

    makeSpanningTree(source, { random: seededRandom(9), logger });

    assert.lengthOf(lines, 1);
    const record = JSON.parse(lines[0]);
    assert.equal(record.msg, "spanning tree built");
    assert.equal(record.name, "spanning-tree-test");
    assert.equal(record.nodes, 3);
    assert.equal(record.candidates, 3);
    assert.equal(record.accepted, 2);
    assert.equal(record.rejected, 1);
  });
});
