import { describe, it, expect, beforeAll, afterEach } from "vitest";
import { ChainEventGraph } from "../../src/ceg/chain-event-graph.js";
import { SituationGraph } from "../../src/ceg/graph-store.js";
import { EventTree } from "../../src/trees/event-tree.js";
import { StagedTree } from "../../src/trees/staged-tree.js";
import { setTestSink, TelemetryEvents, type TelemetryShape } from "../../src/utils/telemetry.js";
import { expandRecords, loadRecordFixture, type RecordFixture } from "../utils/graph-builders.js";

/**
 * Records -> event tree -> staged tree -> chain event graph, on a
 * four-variable triage study (Severity, Clinic, Wait, Outcome).
 */
describe("chain event graph from records", () => {
  let fixture: RecordFixture;

  beforeAll(() => {
    fixture = loadRecordFixture("triage-study.json");
  });

  afterEach(() => {
    setTestSink(null);
  });

  function build(): { tree: EventTree; staged: StagedTree; ceg: ChainEventGraph } {
    const tree = EventTree.fromRecords(expandRecords(fixture), { variables: fixture.variables });
    const staged = new StagedTree(tree, { stages: fixture.stages });
    const ceg = ChainEventGraph.fromStagedTree(staged).generate();
    return { tree, staged, ceg };
  }

  it("builds the full event tree", () => {
    const { tree } = build();

    expect(tree.graph.nodeCount).toBe(45);
    expect(tree.graph.edgeCount).toBe(44);
    expect(tree.leaves).toHaveLength(24);
    expect(tree.pathOf("s9")).toEqual(["Mild", "North", "Short"]);
    expect(tree.pathOf("s20")).toEqual(["Severe", "East", "Long"]);
    expect(tree.categoriesPerVariable).toEqual({ Severity: 2, Clinic: 3, Wait: 2, Outcome: 2 });
    expect(tree.graph.getEdge("s0", "s1", "Mild")?.data.count).toBe(216);
    expect(tree.graph.getEdge("s0", "s2", "Severe")?.data.count).toBe(172);
  });

  it("collapses the staged tree to its chain event graph", () => {
    const { ceg } = build();

    expect(ceg.graph.nodeIds()).toEqual(["w0", "w1", "w2", "w3", "w4", "w5", "w6", "w7", "w8", "w9", "w∞"]);
    expect(ceg.graph.edgeCount).toBe(22);
    expect(ceg.graph.successors("w1")).toEqual(["w3", "w4"]);
    expect(ceg.graph.successors("w2")).toEqual(["w5"]);
    expect(ceg.graph.successors("w3")).toEqual(["w6", "w7"]);
    expect(ceg.graph.successors("w4")).toEqual(["w6", "w7"]);
    expect(ceg.graph.successors("w5")).toEqual(["w8", "w9"]);
    expect(ceg.graph.successors("w6")).toEqual(["w∞"]);
  });

  it("partitions the nodes by stage", () => {
    const { ceg } = build();

    expect([...ceg.stages]).toEqual([
      ["u9", ["w0"]],
      ["u8", ["w1", "w2"]],
      ["u5", ["w3"]],
      ["u6", ["w4"]],
      ["u7", ["w5"]],
      ["u1", ["w6"]],
      ["u2", ["w7"]],
      ["u3", ["w8"]],
      ["u4", ["w9"]],
      [null, ["w∞"]],
    ]);
  });

  it("sums counts, priors and posteriors of merged edges", () => {
    const { ceg } = build();

    expect(ceg.graph.getEdge("w6", "w∞", "Recovered")?.data).toEqual({
      count: 97,
      prior: 0.375,
      posterior: 97.375,
      probability: 97.375 / 111.75,
    });
    expect(ceg.graph.getEdge("w6", "w∞", "Readmitted")?.data.count).toBe(14);
    expect(ceg.graph.getEdge("w7", "w∞", "Recovered")?.data.count).toBe(76);
    expect(ceg.graph.getEdge("w7", "w∞", "Readmitted")?.data.count).toBe(29);
    expect(ceg.graph.getEdge("w3", "w6", "Short")?.data.count).toBe(86);
    expect(ceg.graph.getEdge("w3", "w7", "Long")?.data.count).toBe(80);
  });

  it("keeps root edges as they were in the tree", () => {
    const { ceg } = build();

    expect(ceg.graph.getEdge("w0", "w1", "Mild")?.data.count).toBe(216);
    expect(ceg.graph.getEdge("w0", "w1", "Mild")?.data.prior).toBe(1.5);
    expect(ceg.graph.getEdge("w0", "w2", "Severe")?.data.count).toBe(172);
  });

  it("reports each merge round and the final shape", () => {
    const events: Array<{ event: string; data: TelemetryShape }> = [];
    const tree = EventTree.fromRecords(expandRecords(fixture), { variables: fixture.variables });
    const staged = new StagedTree(tree, { stages: fixture.stages });
    setTestSink((event, data) => {
      events.push({ event, data });
    });

    ChainEventGraph.fromStagedTree(staged).generate();

    const merges = events.filter((e) => e.event === TelemetryEvents.CegNodesMerged).map((e) => e.data);
    expect(merges).toEqual([
      { groups: 4, absorbed_nodes: 8, representatives: ["s9", "s10", "s15", "s16"] },
      { groups: 2, absorbed_nodes: 3, representatives: ["s3", "s6"] },
    ]);

    const completed = events.find((e) => e.event === TelemetryEvents.CegGenerateCompleted);
    expect(completed?.data).toMatchObject({
      nodes_before: 22,
      edges_before: 44,
      nodes: 11,
      edges: 22,
      absorbed_nodes: 11,
      trimmed_nodes: 0,
    });
  });

  it("regenerates to the same graph after a JSON round trip", () => {
    const { ceg } = build();

    const again = new ChainEventGraph(SituationGraph.fromJSON(ceg.toJSON())).generate();

    expect(again.toJSON()).toEqual(ceg.toJSON());
  });
});
