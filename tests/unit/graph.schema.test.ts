import { describe, it, expect } from "vitest";
import { Graph } from "../../src/schemas/graph.js";

describe("Graph schema", () => {
  it("fills in defaults for roles, stages and edge data", () => {
    const parsed = Graph.parse({
      nodes: [{ id: "w0" }, { id: "w∞", role: "sink" }],
      edges: [{ source: "w0", destination: "w∞", label: "a" }],
    });

    expect(parsed.nodes).toEqual([
      { id: "w0", role: "situation", stage: null },
      { id: "w∞", role: "sink", stage: null },
    ]);
    expect(parsed.edges[0]?.data).toEqual({});
  });

  it("accepts numeric stage labels as strings", () => {
    const parsed = Graph.parse({ nodes: [{ id: "w1", stage: 3 }], edges: [] });
    expect(parsed.nodes[0]?.stage).toBe("3");
  });

  it("rejects unknown edge attributes", () => {
    const result = Graph.safeParse({
      nodes: [],
      edges: [{ source: "a", destination: "b", label: "x", data: { weight: 1 } }],
    });
    expect(result.success).toBe(false);
  });

  it("rejects probabilities above one and negative counts", () => {
    const edge = (data: Record<string, number>) => ({
      nodes: [],
      edges: [{ source: "a", destination: "b", label: "x", data }],
    });

    expect(Graph.safeParse(edge({ probability: 1.5 })).success).toBe(false);
    expect(Graph.safeParse(edge({ count: -1 })).success).toBe(false);
  });

  it("reports duplicate edges by position", () => {
    const result = Graph.safeParse({
      nodes: [{ id: "a" }, { id: "b" }],
      edges: [
        { source: "a", destination: "b", label: "x" },
        { source: "a", destination: "b", label: "x" },
      ],
    });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues).toEqual([
      expect.objectContaining({ path: ["edges", 1], message: "Duplicate edge: a -> b (x)" }),
    ]);
  });

  it("allows parallel edges with different labels", () => {
    const result = Graph.safeParse({
      nodes: [{ id: "a" }, { id: "b" }],
      edges: [
        { source: "a", destination: "b", label: "x" },
        { source: "a", destination: "b", label: "y" },
      ],
    });
    expect(result.success).toBe(true);
  });
});
