import { z } from "zod";
import { StageAssignmentError } from "../utils/errors.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import type { SituationGraph, StageLabel } from "../ceg/graph-store.js";
import type { EventTree } from "./event-tree.js";

const StagedTreeOptionsSchema = z.object({
  stages: z.record(z.string().min(1), z.array(z.string().min(1))),
  alpha: z.number().positive().optional(),
});

export type StagedTreeOptions = z.input<typeof StagedTreeOptionsSchema>;

/**
 * Event tree whose situations carry an externally supplied stage
 * assignment, with Dirichlet priors, posteriors and stage-level
 * probability estimates written onto every edge.
 *
 * Situations left out of the assignment stay unstaged and pool only their
 * own edges.
 */
export class StagedTree {
  readonly graph: SituationGraph;
  readonly root: string;
  readonly alpha: number;
  private readonly stageMembers: Map<StageLabel, string[]>;

  constructor(readonly eventTree: EventTree, options: StagedTreeOptions) {
    const parsed = StagedTreeOptionsSchema.parse(options);
    this.graph = eventTree.graph.clone();
    this.root = eventTree.root;
    this.stageMembers = this.assignStages(parsed.stages);
    this.alpha = parsed.alpha ?? this.defaultAlpha();

    this.writePriors();
    this.writePosteriors();

    emit(TelemetryEvents.StagedTreeBuilt, {
      stages: this.stageMembers.size,
      staged_situations: [...this.stageMembers.values()].reduce((n, members) => n + members.length, 0),
      alpha: this.alpha,
    });
  }

  get leaves(): string[] {
    return this.graph.nodeIds().filter((id) => this.graph.outDegree(id) === 0);
  }

  /**
   * Declared stages and their situations
   */
  get stages(): Map<StageLabel, string[]> {
    return new Map([...this.stageMembers].map(([label, members]) => [label, [...members]]));
  }

  getStage(node: string): StageLabel | null {
    return this.graph.getNode(node).stage;
  }

  private assignStages(stages: Record<string, string[]>): Map<StageLabel, string[]> {
    const members = new Map<StageLabel, string[]>();
    const owner = new Map<string, StageLabel>();

    for (const [label, nodes] of Object.entries(stages)) {
      let labels: string | null = null;
      for (const node of nodes) {
        this.graph.getNode(node);
        if (this.graph.outDegree(node) === 0) {
          throw new StageAssignmentError(`Leaf ${node} cannot be staged`, { stage: label, node });
        }
        const previous = owner.get(node);
        if (previous !== undefined) {
          throw new StageAssignmentError(`Node ${node} is assigned to more than one stage`, {
            node,
            stages: [previous, label],
          });
        }

        const outgoing = this.graph
          .outEdges(node)
          .map((e) => e.label)
          .sort()
          .join("\u0000");
        if (labels !== null && labels !== outgoing) {
          throw new StageAssignmentError(`Stage ${label} mixes situations with different outgoing labels`, {
            stage: label,
            node,
          });
        }
        labels = outgoing;
        owner.set(node, label);
      }
      if (nodes.length > 0) members.set(label, [...nodes]);
    }

    for (const [node, label] of owner) this.graph.setStage(node, label);
    return members;
  }

  /**
   * Largest number of outgoing edges of any situation
   */
  private defaultAlpha(): number {
    return Math.max(1, ...this.graph.nodeIds().map((id) => this.graph.outDegree(id)));
  }

  /**
   * Root edges share alpha equally; each edge below splits the prior of
   * the edge leading into its source.
   */
  private writePriors(): void {
    const queue: Array<{ node: string; mass: number }> = [{ node: this.root, mass: this.alpha }];
    for (let head = 0; head < queue.length; head++) {
      const item = queue[head];
      if (item === undefined) break;
      const edges = this.graph.outEdges(item.node);
      for (const edge of edges) {
        const prior = item.mass / edges.length;
        edge.data = { ...edge.data, prior };
        queue.push({ node: edge.destination, mass: prior });
      }
    }
  }

  /**
   * Posterior = prior + count per edge; probability is the pooled
   * posterior of the edge's label over the stage, normalised.
   */
  private writePosteriors(): void {
    const pools: string[][] = [...this.stageMembers.values()];
    for (const id of this.graph.nodeIds()) {
      if (this.graph.outDegree(id) > 0 && this.graph.getNode(id).stage === null) pools.push([id]);
    }

    for (const pool of pools) {
      const pooled = new Map<string, number>();
      for (const member of pool) {
        for (const edge of this.graph.outEdges(member)) {
          const posterior = (edge.data.prior ?? 0) + (edge.data.count ?? 0);
          edge.data = { ...edge.data, posterior };
          pooled.set(edge.label, (pooled.get(edge.label) ?? 0) + posterior);
        }
      }

      const total = [...pooled.values()].reduce((sum, value) => sum + value, 0);
      for (const member of pool) {
        for (const edge of this.graph.outEdges(member)) {
          const probability = total > 0 ? (pooled.get(edge.label) ?? 0) / total : 0;
          edge.data = { ...edge.data, probability };
        }
      }
    }
  }
}
