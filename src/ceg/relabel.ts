import { getConfig } from "../config/index.js";
import type { SituationGraph } from "./graph-store.js";

export const SINK_SUFFIX = "∞";

export interface RelabelOptions {
  /** Defaults to the configured CEG node prefix */
  prefix?: string;
}

export function sinkNodeId(prefix: string = getConfig().ceg.nodePrefix): string {
  return `${prefix}${SINK_SUFFIX}`;
}

/**
 * Give every node its canonical id: the root becomes `<prefix>0`, the sink
 * `<prefix>∞`, and the rest `<prefix>1..n` in breadth-first discovery order
 * from the root, following edges in insertion order.
 *
 * @returns old id -> new id
 */
export function relabelNodes(graph: SituationGraph, options: RelabelOptions = {}): Map<string, string> {
  const prefix = options.prefix ?? getConfig().ceg.nodePrefix;
  const root = graph.findRoot();
  const sink = graph.findSink();

  const mapping = new Map<string, string>([[root, `${prefix}0`]]);
  const seen = new Set<string>([root, sink]);
  const queue = [root];
  let ordinal = 1;

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (current === undefined) break;
    for (const next of graph.successors(current)) {
      if (seen.has(next)) continue;
      seen.add(next);
      mapping.set(next, `${prefix}${ordinal++}`);
      queue.push(next);
    }
  }

  // unreachable from the root; only possible in hand-built graphs
  for (const id of graph.nodeIds()) {
    if (seen.has(id)) continue;
    mapping.set(id, `${prefix}${ordinal++}`);
  }

  mapping.set(sink, sinkNodeId(prefix));
  graph.relabel(mapping);
  return mapping;
}
