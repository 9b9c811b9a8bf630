export { ChainEventGraph, type CegState, type ChainEventGraphOptions } from "./chain-event-graph.js";
export { nodesWithIncreasingDistance, updateDistancesToSink } from "./distance.js";
export {
  EDGE_ATTRIBUTE_KEYS,
  isAdditive,
  mergeEdgeData,
  type EdgeAttributeKey,
  type EdgeAttributes,
} from "./edge-data.js";
export {
  SituationGraph,
  type EdgeKey,
  type NodeAttributes,
  type NodeRole,
  type SituationNode,
  type StageLabel,
  type Transition,
} from "./graph-store.js";
export { mergeAndAddEdges, mergeNodes, nodesCanBeMerged, type NodePair } from "./merge.js";
export { relabelNodes, sinkNodeId, SINK_SUFFIX, type RelabelOptions } from "./relabel.js";
export { trimLeavesFromGraph } from "./trim.js";
