import { Graph as GraphSchema, type GraphT, type NodeRoleT } from "../schemas/graph.js";
import { getConfig } from "../config/index.js";
import {
  CegError,
  MalformedGraphError,
  UnknownEdgeError,
  UnknownNodeError,
} from "../utils/errors.js";
import { copyEdgeData, type EdgeAttributes } from "./edge-data.js";

export type NodeRole = NodeRoleT;
export type StageLabel = string;

/**
 * A situation in an event tree or chain event graph.
 */
export interface SituationNode {
  readonly id: string;
  role: NodeRole;
  stage: StageLabel | null;
  /** Longest path length (in edges) to the sink; unset until computed */
  maxDistToSink?: number;
}

/**
 * A labelled transition. `(source, destination, label)` identifies it.
 */
export interface Transition {
  readonly source: string;
  readonly destination: string;
  readonly label: string;
  data: EdgeAttributes;
}

export type EdgeKey = readonly [source: string, destination: string, label: string];

export interface NodeAttributes {
  role?: NodeRole;
  stage?: StageLabel | null;
  maxDistToSink?: number;
}

function attributesOf(node: SituationNode): NodeAttributes {
  const attributes: NodeAttributes = { role: node.role, stage: node.stage };
  if (node.maxDistToSink !== undefined) attributes.maxDistToSink = node.maxDistToSink;
  return attributes;
}

function slot(node: string, label: string): string {
  return `${node}\u0000${label}`;
}

/**
 * Directed multigraph over situations.
 *
 * Parallel edges between the same ordered pair are told apart by label.
 * Nodes, and each node's outgoing and incoming edges, keep insertion order
 * so every traversal over the store is deterministic.
 */
export class SituationGraph {
  private readonly nodeMap = new Map<string, SituationNode>();
  // node -> (destination, label) -> edge
  private readonly outgoing = new Map<string, Map<string, Transition>>();
  // node -> (source, label) -> edge
  private readonly incoming = new Map<string, Map<string, Transition>>();
  private edgeTotal = 0;

  get nodeCount(): number {
    return this.nodeMap.size;
  }

  get edgeCount(): number {
    return this.edgeTotal;
  }

  /**
   * Add a node, or update the attributes of an existing one.
   */
  addNode(id: string, attributes: NodeAttributes = {}): SituationNode {
    const existing = this.nodeMap.get(id);
    if (existing) {
      if (attributes.role !== undefined) existing.role = attributes.role;
      if (attributes.stage !== undefined) existing.stage = attributes.stage;
      if (attributes.maxDistToSink !== undefined) existing.maxDistToSink = attributes.maxDistToSink;
      return existing;
    }

    const node: SituationNode = {
      id,
      role: attributes.role ?? "situation",
      stage: attributes.stage ?? null,
    };
    if (attributes.maxDistToSink !== undefined) node.maxDistToSink = attributes.maxDistToSink;

    this.nodeMap.set(id, node);
    this.outgoing.set(id, new Map());
    this.incoming.set(id, new Map());
    return node;
  }

  hasNode(id: string): boolean {
    return this.nodeMap.has(id);
  }

  getNode(id: string): SituationNode {
    const node = this.nodeMap.get(id);
    if (!node) throw new UnknownNodeError(id);
    return node;
  }

  nodes(): SituationNode[] {
    return [...this.nodeMap.values()];
  }

  nodeIds(): string[] {
    return [...this.nodeMap.keys()];
  }

  setStage(id: string, stage: StageLabel | null): void {
    this.getNode(id).stage = stage;
  }

  /**
   * Remove a node together with every edge touching it.
   */
  removeNode(id: string): void {
    this.getNode(id);
    for (const edge of this.outEdges(id)) this.detach(edge);
    for (const edge of this.inEdges(id)) this.detach(edge);
    this.nodeMap.delete(id);
    this.outgoing.delete(id);
    this.incoming.delete(id);
  }

  /**
   * Add an edge, creating missing endpoints. Re-adding an existing
   * `(source, destination, label)` updates its attributes instead.
   */
  addEdge(source: string, destination: string, label: string, data: EdgeAttributes = {}): Transition {
    if (!this.hasNode(source)) this.addNode(source);
    if (!this.hasNode(destination)) this.addNode(destination);

    const existing = this.getEdge(source, destination, label);
    if (existing) {
      existing.data = { ...existing.data, ...data };
      return existing;
    }

    const edge: Transition = { source, destination, label, data: copyEdgeData(data) };
    this.outMap(source).set(slot(destination, label), edge);
    this.inMap(destination).set(slot(source, label), edge);
    this.edgeTotal += 1;
    return edge;
  }

  hasEdge(source: string, destination: string, label: string): boolean {
    return this.getEdge(source, destination, label) !== undefined;
  }

  getEdge(source: string, destination: string, label: string): Transition | undefined {
    return this.outgoing.get(source)?.get(slot(destination, label));
  }

  removeEdge(source: string, destination: string, label: string): Transition {
    this.getNode(source);
    this.getNode(destination);
    const edge = this.getEdge(source, destination, label);
    if (!edge) throw new UnknownEdgeError(source, destination, label);
    this.detach(edge);
    return edge;
  }

  outEdges(id: string): Transition[] {
    return [...this.outMap(id).values()];
  }

  inEdges(id: string): Transition[] {
    return [...this.inMap(id).values()];
  }

  outDegree(id: string): number {
    return this.outMap(id).size;
  }

  inDegree(id: string): number {
    return this.inMap(id).size;
  }

  /**
   * Distinct successor ids, in edge insertion order
   */
  successors(id: string): string[] {
    return [...new Set(this.outEdges(id).map((e) => e.destination))];
  }

  predecessors(id: string): string[] {
    return [...new Set(this.inEdges(id).map((e) => e.source))];
  }

  edges(): Transition[] {
    const all: Transition[] = [];
    for (const edges of this.outgoing.values()) {
      all.push(...edges.values());
    }
    return all;
  }

  edgeKeys(): EdgeKey[] {
    return this.edges().map((e) => [e.source, e.destination, e.label] as const);
  }

  /**
   * The node marked as root, else the only node without incoming edges.
   */
  findRoot(): string {
    return this.resolveTerminal("root", (id) => this.inDegree(id) === 0);
  }

  /**
   * The node marked as sink, else the only node without outgoing edges.
   */
  findSink(): string {
    return this.resolveTerminal("sink", (id) => this.outDegree(id) === 0);
  }

  clone(): SituationGraph {
    const copy = new SituationGraph();
    for (const node of this.nodeMap.values()) {
      copy.addNode(node.id, attributesOf(node));
    }
    for (const edge of this.edges()) {
      copy.addEdge(edge.source, edge.destination, edge.label, edge.data);
    }
    return copy;
  }

  /**
   * Rename nodes in place. Nodes named in `mapping` come first, in the
   * mapping's iteration order; the rest keep their id and relative order.
   */
  relabel(mapping: ReadonlyMap<string, string>): void {
    for (const id of mapping.keys()) this.getNode(id);

    const order = [...mapping.keys(), ...this.nodeIds().filter((id) => !mapping.has(id))];
    const rename = (id: string): string => mapping.get(id) ?? id;

    const renamed = new Set(order.map(rename));
    if (renamed.size !== order.length) {
      throw new MalformedGraphError("Relabeling would merge distinct nodes", {
        mapping: Object.fromEntries(mapping),
      });
    }

    const nodes = order.map((id) => this.getNode(id));
    const edges = order.flatMap((id) => this.outEdges(id));

    this.nodeMap.clear();
    this.outgoing.clear();
    this.incoming.clear();
    this.edgeTotal = 0;

    for (const node of nodes) {
      this.addNode(rename(node.id), attributesOf(node));
    }
    for (const edge of edges) {
      this.addEdge(rename(edge.source), rename(edge.destination), edge.label, edge.data);
    }
  }

  toJSON(): GraphT {
    return {
      nodes: this.nodes().map((node) => ({ id: node.id, role: node.role, stage: node.stage })),
      edges: this.edges().map((edge) => ({
        source: edge.source,
        destination: edge.destination,
        label: edge.label,
        data: copyEdgeData(edge.data),
      })),
    };
  }

  /**
   * Build a graph from untrusted input. Validates shape and size caps.
   */
  static fromJSON(input: unknown): SituationGraph {
    const parsed = GraphSchema.parse(input);
    const { maxNodes, maxEdges } = getConfig().graph;

    if (parsed.nodes.length > maxNodes || parsed.edges.length > maxEdges) {
      throw new CegError("Graph exceeds configured size caps", "BAD_INPUT", {
        nodes: parsed.nodes.length,
        edges: parsed.edges.length,
        max_nodes: maxNodes,
        max_edges: maxEdges,
      });
    }

    const graph = new SituationGraph();
    for (const node of parsed.nodes) {
      graph.addNode(node.id, { role: node.role, stage: node.stage });
    }
    for (const edge of parsed.edges) {
      if (!graph.hasNode(edge.source)) throw new UnknownNodeError(edge.source);
      if (!graph.hasNode(edge.destination)) throw new UnknownNodeError(edge.destination);
      graph.addEdge(edge.source, edge.destination, edge.label, edge.data);
    }
    return graph;
  }

  private resolveTerminal(role: "root" | "sink", isCandidate: (id: string) => boolean): string {
    const marked = this.nodes().filter((n) => n.role === role).map((n) => n.id);
    if (marked.length > 1) {
      throw new MalformedGraphError(`Graph has more than one ${role} node`, { [role]: marked });
    }
    const [only] = marked;
    if (only !== undefined) return only;

    const candidates = this.nodeIds().filter(isCandidate);
    const [candidate] = candidates;
    if (candidate === undefined) {
      throw new MalformedGraphError(`Graph has no ${role} node`);
    }
    if (candidates.length > 1) {
      throw new MalformedGraphError(`Graph has more than one ${role}-like node`, { candidates });
    }
    return candidate;
  }

  private detach(edge: Transition): void {
    const removed = this.outMap(edge.source).delete(slot(edge.destination, edge.label));
    this.inMap(edge.destination).delete(slot(edge.source, edge.label));
    if (removed) this.edgeTotal -= 1;
  }

  private outMap(id: string): Map<string, Transition> {
    const edges = this.outgoing.get(id);
    if (!edges) throw new UnknownNodeError(id);
    return edges;
  }

  private inMap(id: string): Map<string, Transition> {
    const edges = this.incoming.get(id);
    if (!edges) throw new UnknownNodeError(id);
    return edges;
  }
}
