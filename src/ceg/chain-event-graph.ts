import { getConfig } from "../config/index.js";
import type { GraphT } from "../schemas/graph.js";
import { GenerationStateError, MalformedGraphError, toErrorV1 } from "../utils/errors.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import type { StagedTree } from "../trees/staged-tree.js";
import { nodesWithIncreasingDistance, updateDistancesToSink } from "./distance.js";
import type { SituationGraph, StageLabel } from "./graph-store.js";
import { mergeNodes, nodesCanBeMerged, rehomeEdge, type NodePair } from "./merge.js";
import { relabelNodes, sinkNodeId } from "./relabel.js";
import { trimLeavesFromGraph } from "./trim.js";

export type CegState = "uninitialized" | "distances_computed" | "merging" | "trimmed" | "stable";

export interface ChainEventGraphOptions {
  /** Run generate() from the constructor */
  generate?: boolean;
  /** Give nodes their canonical ids once generated (default true) */
  relabel?: boolean;
  /** Defaults to the configured CEG node prefix */
  nodePrefix?: string;
}

/**
 * Pairs of same-stage nodes in one generation that are mergeable right now
 */
function mergeablePairs(graph: SituationGraph, generation: readonly string[]): NodePair[] {
  const byStage = new Map<StageLabel, string[]>();
  for (const id of generation) {
    if (!graph.hasNode(id)) continue;
    const stage = graph.getNode(id).stage;
    if (stage === null) continue;
    const bucket = byStage.get(stage);
    if (bucket) bucket.push(id);
    else byStage.set(stage, [id]);
  }

  const pairs: NodePair[] = [];
  for (const bucket of byStage.values()) {
    for (let i = 0; i < bucket.length; i++) {
      for (let j = i + 1; j < bucket.length; j++) {
        const u = bucket[i];
        const v = bucket[j];
        if (u === undefined || v === undefined) continue;
        if (nodesCanBeMerged(graph, u, v)) pairs.push([u, v]);
      }
    }
  }
  return pairs;
}

/**
 * Chain event graph over a staged tree.
 *
 * The instance owns a private copy of its input graph; `generate()`
 * collapses it in place into the minimal CEG.
 */
export class ChainEventGraph {
  readonly graph: SituationGraph;
  private _state: CegState = "uninitialized";
  private readonly relabelOnGenerate: boolean;
  private readonly nodePrefix: string;

  constructor(graph: SituationGraph, options: ChainEventGraphOptions = {}) {
    this.graph = graph.clone();
    this.relabelOnGenerate = options.relabel ?? true;
    this.nodePrefix = options.nodePrefix ?? getConfig().ceg.nodePrefix;

    if (options.generate) this.generate();
  }

  /**
   * Start from a staged tree: every leaf is folded into a single sink.
   */
  static fromStagedTree(tree: StagedTree, options: ChainEventGraphOptions = {}): ChainEventGraph {
    const graph = tree.graph.clone();
    const sink = sinkNodeId(options.nodePrefix ?? getConfig().ceg.nodePrefix);
    if (graph.hasNode(sink)) {
      throw new MalformedGraphError(`Sink id ${sink} is already used by the tree`, { sink });
    }

    const leaves = tree.leaves;
    graph.addNode(sink, { role: "sink" });
    graph.getNode(tree.root).role = "root";
    for (const leaf of leaves) {
      for (const edge of graph.inEdges(leaf)) {
        rehomeEdge(graph, edge, edge.source, sink);
      }
      graph.removeNode(leaf);
    }

    return new ChainEventGraph(graph, options);
  }

  get state(): CegState {
    return this._state;
  }

  get rootNode(): string {
    return this.graph.findRoot();
  }

  get sinkNode(): string {
    return this.graph.findSink();
  }

  /**
   * Node ids grouped by stage; unstaged nodes (the sink among them) are
   * listed under `null`. Every node appears exactly once.
   */
  get stages(): Map<StageLabel | null, string[]> {
    const stages = new Map<StageLabel | null, string[]>();
    for (const node of this.graph.nodes()) {
      const members = stages.get(node.stage);
      if (members) members.push(node.id);
      else stages.set(node.stage, [node.id]);
    }
    return stages;
  }

  /**
   * Collapse the graph: dangling branches are trimmed first so distances
   * see a single sink, then generation-by-generation merges run from the
   * sink towards the root, then relabeling. Merging never leaves a node
   * without outgoing edges, so the graph stays trimmed through it.
   * Can run once per instance.
   */
  generate(): this {
    if (this._state !== "uninitialized") {
      throw new GenerationStateError("Chain event graph has already been generated", this._state);
    }

    const startedAt = Date.now();
    const before = { nodes: this.graph.nodeCount, edges: this.graph.edgeCount };
    emit(TelemetryEvents.CegGenerateStarted, before);

    try {
      const trimmed = trimLeavesFromGraph(this.graph);
      updateDistancesToSink(this.graph);
      this._state = "distances_computed";

      const generations = nodesWithIncreasingDistance(this.graph, 1);
      this._state = "merging";
      let absorbed = 0;
      for (const generation of generations) {
        const pairs = mergeablePairs(this.graph, generation);
        if (pairs.length === 0) continue;

        absorbed += mergeNodes(this.graph, pairs).size;
        updateDistancesToSink(this.graph);
      }

      this._state = "trimmed";

      if (this.relabelOnGenerate) {
        relabelNodes(this.graph, { prefix: this.nodePrefix });
      }
      this._state = "stable";

      emit(TelemetryEvents.CegGenerateCompleted, {
        nodes_before: before.nodes,
        edges_before: before.edges,
        nodes: this.graph.nodeCount,
        edges: this.graph.edgeCount,
        absorbed_nodes: absorbed,
        trimmed_nodes: trimmed.length,
        latency_ms: Date.now() - startedAt,
      });
      return this;
    } catch (error) {
      emit(TelemetryEvents.CegGenerateFailed, {
        state: this._state,
        error: toErrorV1(error),
        latency_ms: Date.now() - startedAt,
      });
      throw error;
    }
  }

  toJSON(): GraphT {
    return this.graph.toJSON();
  }
}
