import { describe, it, expect, beforeEach } from "vitest";
import { nodesWithIncreasingDistance, updateDistancesToSink } from "../../src/ceg/distance.js";
import { SituationGraph } from "../../src/ceg/graph-store.js";
import { MalformedGraphError } from "../../src/utils/errors.js";
import { buildGraph, type EdgeTriple } from "../utils/graph-builders.js";

const NODES = ["w0", "w1", "w2", "w3", "w4", "w5", "w∞"];

const EDGES: EdgeTriple[] = [
  ["w0", "w1", "a"],
  ["w0", "w2", "b"],
  ["w1", "w3", "e"],
  ["w1", "w4", "e"],
  ["w2", "w∞", "c"],
  ["w3", "w∞", "d"],
  ["w4", "w5", "c"],
  ["w5", "w∞", "d"],
];

const EXPECTED = {
  w0: 4,
  w1: 3,
  w2: 1,
  w3: 1,
  w4: 2,
  w5: 1,
  "w∞": 0,
};

function storedDistances(graph: SituationGraph): Record<string, number | undefined> {
  return Object.fromEntries(graph.nodes().map((n) => [n.id, n.maxDistToSink]));
}

describe("updateDistancesToSink", () => {
  let graph: SituationGraph;

  beforeEach(() => {
    graph = buildGraph(EDGES, NODES);
  });

  it("stores the longest path length to the sink on every node", () => {
    const distances = updateDistancesToSink(graph);

    expect(Object.fromEntries(distances)).toEqual(EXPECTED);
    expect(storedDistances(graph)).toEqual(EXPECTED);
  });

  it("uses the longest path, not the shortest", () => {
    graph.addEdge("w1", "w∞", "x");
    graph.addEdge("w4", "w∞", "x");

    updateDistancesToSink(graph);

    expect(storedDistances(graph)).toEqual(EXPECTED);
  });

  it("rejects a cycle without writing distances", () => {
    graph.addEdge("w5", "w1", "loop");

    expect(() => updateDistancesToSink(graph)).toThrow("Graph contains a cycle");
    expect(graph.getNode("w0").maxDistToSink).toBeUndefined();
  });

  it("names every node it could not settle when there is a cycle", () => {
    graph.addEdge("w5", "w1", "loop");

    let caught: unknown;
    try {
      updateDistancesToSink(graph);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MalformedGraphError);
    expect(caught).toMatchObject({ details: { nodes: ["w0", "w1", "w4", "w5"] } });
  });

  it("handles a chain of ten thousand nodes", () => {
    const chain = new SituationGraph();
    for (let i = 0; i < 9_999; i++) {
      chain.addEdge(`n${i}`, `n${i + 1}`, "x");
    }
    chain.addEdge("n9999", "end", "x");

    const distances = updateDistancesToSink(chain);

    expect(distances.size).toBe(10_001);
    expect(chain.getNode("n0").maxDistToSink).toBe(10_000);
    expect(chain.getNode("n9999").maxDistToSink).toBe(1);
    expect(chain.getNode("end").maxDistToSink).toBe(0);
  });

  it("rejects a second node without outgoing edges", () => {
    graph.addNode("w∞", { role: "sink" });
    graph.addEdge("w2", "orphan", "z");

    let caught: unknown;
    try {
      updateDistancesToSink(graph);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MalformedGraphError);
    expect(caught).toMatchObject({ details: { sink: "w∞", dangling: ["orphan"] } });
  });

  it("rejects a marked sink with outgoing edges", () => {
    graph.addNode("w5", { role: "sink" });
    expect(() => updateDistancesToSink(graph)).toThrow("Sink w5 has outgoing edges");
  });
});

describe("nodesWithIncreasingDistance", () => {
  it("yields one batch per distance, nearest first", () => {
    const graph = buildGraph(EDGES, NODES);
    updateDistancesToSink(graph);

    expect([...nodesWithIncreasingDistance(graph, 0)]).toEqual([
      ["w∞"],
      ["w2", "w3", "w5"],
      ["w4"],
      ["w1"],
      ["w0"],
    ]);
  });

  it("starts at the requested distance", () => {
    const graph = buildGraph(EDGES, NODES);
    updateDistancesToSink(graph);

    const batches = nodesWithIncreasingDistance(graph, 2);
    expect(batches.next().value).toEqual(["w4"]);
    expect([...batches]).toEqual([["w1"], ["w0"]]);
  });

  it("yields an empty batch for a distance with no nodes", () => {
    const graph = buildGraph(EDGES, NODES);
    for (const node of graph.nodes()) node.maxDistToSink = 0;
    graph.getNode("w0").maxDistToSink = 2;

    expect([...nodesWithIncreasingDistance(graph, 1)]).toEqual([[], ["w0"]]);
  });

  it("requires distances to have been computed", () => {
    const graph = buildGraph(EDGES, NODES);
    expect(() => nodesWithIncreasingDistance(graph)).toThrow("Distance to sink has not been computed");
  });

  it("rejects a negative or fractional start", () => {
    const graph = buildGraph(EDGES, NODES);
    updateDistancesToSink(graph);

    expect(() => nodesWithIncreasingDistance(graph, -1)).toThrow(RangeError);
    expect(() => nodesWithIncreasingDistance(graph, 1.5)).toThrow(RangeError);
  });
});
