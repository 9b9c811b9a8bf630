import { MalformedGraphError } from "../utils/errors.js";
import type { SituationGraph } from "./graph-store.js";

/**
 * Record on every node the length of the longest path to the sink.
 *
 * The sink is at distance 0 and every other node sits one step above its
 * farthest successor. Nodes are settled from the sink upwards once all of
 * their successors are settled, so the pass is iterative and depth does not
 * matter. Rejects graphs with a cycle or with a second sink-like node
 * before writing any distance.
 */
export function updateDistancesToSink(graph: SituationGraph): Map<string, number> {
  const sink = graph.findSink();
  if (graph.outDegree(sink) > 0) {
    throw new MalformedGraphError(`Sink ${sink} has outgoing edges`, { sink });
  }

  const dangling = graph.nodeIds().filter((id) => id !== sink && graph.outDegree(id) === 0);
  if (dangling.length > 0) {
    throw new MalformedGraphError("Graph has more than one sink-like node", { sink, dangling });
  }

  // successors not yet settled, per node
  const pending = new Map<string, number>();
  for (const id of graph.nodeIds()) {
    pending.set(id, graph.successors(id).length);
  }

  const distances = new Map<string, number>([[sink, 0]]);
  const queue = [sink];
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (current === undefined) break;
    const distance = distances.get(current) ?? 0;

    for (const parent of graph.predecessors(current)) {
      distances.set(parent, Math.max(distances.get(parent) ?? 0, distance + 1));
      const remaining = (pending.get(parent) ?? 0) - 1;
      pending.set(parent, remaining);
      if (remaining === 0) queue.push(parent);
    }
  }

  if (queue.length < graph.nodeCount) {
    const settled = new Set(queue);
    const unresolved = graph.nodeIds().filter((id) => !settled.has(id));
    throw new MalformedGraphError("Graph contains a cycle", { nodes: unresolved });
  }

  for (const [id, distance] of distances) {
    graph.getNode(id).maxDistToSink = distance;
  }
  return distances;
}

/**
 * Batches of node ids grouped by distance to the sink, nearest first.
 *
 * The k-th batch holds exactly the nodes at distance `start + k`, in graph
 * insertion order. The index is built when this is called, so every node
 * must already carry a distance; the returned generator is single-pass.
 */
export function nodesWithIncreasingDistance(
  graph: SituationGraph,
  start = 0
): Generator<string[], void, undefined> {
  if (!Number.isInteger(start) || start < 0) {
    throw new RangeError(`start must be a non-negative integer, got ${start}`);
  }

  const index = new Map<number, string[]>();
  let maxDistance = -1;
  for (const node of graph.nodes()) {
    const distance = node.maxDistToSink;
    if (distance === undefined) {
      throw new MalformedGraphError("Distance to sink has not been computed", { node: node.id });
    }
    const batch = index.get(distance);
    if (batch) batch.push(node.id);
    else index.set(distance, [node.id]);
    maxDistance = Math.max(maxDistance, distance);
  }

  return generations(index, start, maxDistance);
}

function* generations(
  index: ReadonlyMap<number, string[]>,
  start: number,
  maxDistance: number
): Generator<string[], void, undefined> {
  for (let distance = start; distance <= maxDistance; distance++) {
    yield [...(index.get(distance) ?? [])];
  }
}
