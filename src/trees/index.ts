export { EventTree, type CategoricalRecord, type EventTreeOptions, type RecordValue } from "./event-tree.js";
export { StagedTree, type StagedTreeOptions } from "./staged-tree.js";
