import { emit, TelemetryEvents } from "../utils/telemetry.js";
import type { SituationGraph } from "./graph-store.js";

/**
 * Remove every node other than the sink that has no outgoing edges, then
 * repeat, since a removal can leave its parent dangling.
 *
 * @returns removed node ids, in removal order
 */
export function trimLeavesFromGraph(graph: SituationGraph): string[] {
  const sink = graph.findSink();
  const removed: string[] = [];

  for (;;) {
    const leaves = graph.nodeIds().filter((id) => id !== sink && graph.outDegree(id) === 0);
    if (leaves.length === 0) break;

    for (const leaf of leaves) graph.removeNode(leaf);
    removed.push(...leaves);
  }

  if (removed.length > 0) {
    emit(TelemetryEvents.CegLeavesTrimmed, { removed_nodes: removed.length });
  }
  return removed;
}
