import { IneligibleMergeError } from "../utils/errors.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { mergeEdgeData } from "./edge-data.js";
import type { EdgeKey, SituationGraph, Transition } from "./graph-store.js";

export type NodePair = readonly [string, string];

/**
 * Sorted `label -> destination` entries of a node's outgoing edges
 */
function outgoingSignature(graph: SituationGraph, id: string): string[] {
  return graph
    .outEdges(id)
    .map((edge) => `${edge.label}\u0000${edge.destination}`)
    .sort();
}

/**
 * Two distinct nodes can be merged when they share a stage and every
 * outgoing label leads to the very same destination from both.
 * Unstaged nodes never merge.
 */
export function nodesCanBeMerged(graph: SituationGraph, u: string, v: string): boolean {
  const first = graph.getNode(u);
  const second = graph.getNode(v);
  if (u === v) return false;
  if (first.stage === null || first.stage !== second.stage) return false;

  const a = outgoingSignature(graph, u);
  const b = outgoingSignature(graph, v);
  return a.length === b.length && a.every((entry, i) => entry === b[i]);
}

/**
 * Move an edge to new endpoints. When an edge with the same
 * `(source, destination, label)` is already there, the two merge with the
 * resident edge as first operand.
 */
export function rehomeEdge(
  graph: SituationGraph,
  edge: Transition,
  source: string,
  destination: string
): Transition {
  graph.removeEdge(edge.source, edge.destination, edge.label);
  const resident = graph.getEdge(source, destination, edge.label);
  if (resident) {
    resident.data = mergeEdgeData(resident.data, edge.data);
    return resident;
  }
  return graph.addEdge(source, destination, edge.label, edge.data);
}

/**
 * Connected components of the pair graph, each listed in graph order.
 */
function mergeGroups(graph: SituationGraph, pairs: readonly NodePair[]): string[][] {
  const parent = new Map<string, string>();

  const find = (id: string): string => {
    let root = id;
    for (let next = parent.get(root); next !== undefined && next !== root; next = parent.get(root)) {
      root = next;
    }
    // path compression
    for (let current = id; current !== root; ) {
      const next = parent.get(current) ?? root;
      parent.set(current, root);
      current = next;
    }
    return root;
  };

  for (const [u, v] of pairs) {
    if (!parent.has(u)) parent.set(u, u);
    if (!parent.has(v)) parent.set(v, v);
    const ru = find(u);
    const rv = find(v);
    if (ru !== rv) parent.set(rv, ru);
  }

  const groups = new Map<string, string[]>();
  for (const id of graph.nodeIds()) {
    if (!parent.has(id)) continue;
    const root = find(id);
    const group = groups.get(root);
    if (group) group.push(id);
    else groups.set(root, [id]);
  }
  return [...groups.values()];
}

/**
 * Collapse every connected component of `pairs` into one node.
 *
 * The representative is the member that comes first in graph order.
 * Edges into and out of absorbed members are re-homed onto it; colliding
 * edges merge via `mergeEdgeData`. All pairs are checked before anything is
 * changed, so an ineligible pair leaves the graph untouched.
 *
 * @returns absorbed node id -> representative id
 */
export function mergeNodes(graph: SituationGraph, pairs: Iterable<NodePair>): Map<string, string> {
  const pairList = [...pairs];
  for (const pair of pairList) {
    if (!nodesCanBeMerged(graph, pair[0], pair[1])) {
      throw new IneligibleMergeError(pair);
    }
  }

  const absorbed = new Map<string, string>();
  const groups = mergeGroups(graph, pairList);
  for (const [representative, ...members] of groups) {
    if (representative === undefined) continue;
    for (const member of members) absorbed.set(member, representative);
  }
  const resolve = (id: string): string => absorbed.get(id) ?? id;

  for (const [member, representative] of absorbed) {
    for (const edge of graph.inEdges(member)) {
      rehomeEdge(graph, edge, resolve(edge.source), representative);
    }
    for (const edge of graph.outEdges(member)) {
      rehomeEdge(graph, edge, representative, resolve(edge.destination));
    }

    const role = graph.getNode(member).role;
    if (role !== "situation") graph.getNode(representative).role = role;
    graph.removeNode(member);
  }

  if (absorbed.size > 0) {
    emit(TelemetryEvents.CegNodesMerged, {
      groups: groups.length,
      absorbed_nodes: absorbed.size,
      representatives: groups.map((group) => group[0]),
    });
  }
  return absorbed;
}

/**
 * Move the outgoing edges of two source nodes onto `newNode`.
 *
 * `newNode` is created when missing, taking `oldNode1`'s stage. Edges of
 * `oldNode1` move first, so on a collision its data is the first operand.
 * Incoming edges and the old nodes themselves are left in place.
 *
 * @returns the resulting edges, one triple per distinct edge on `newNode`
 */
export function mergeAndAddEdges(
  graph: SituationGraph,
  newNode: string,
  oldNode1: string,
  oldNode2: string
): EdgeKey[] {
  const template = graph.getNode(oldNode1);
  graph.getNode(oldNode2);
  if (!graph.hasNode(newNode)) {
    graph.addNode(newNode, { stage: template.stage });
  }

  const results = new Map<Transition, EdgeKey>();
  for (const old of [oldNode1, oldNode2]) {
    for (const edge of graph.outEdges(old)) {
      const merged = rehomeEdge(graph, edge, newNode, edge.destination);
      results.set(merged, [merged.source, merged.destination, merged.label]);
    }
  }
  return [...results.values()];
}
