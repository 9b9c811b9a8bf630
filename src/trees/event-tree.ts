import { z } from "zod";
import { getConfig } from "../config/index.js";
import { CegError } from "../utils/errors.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { SituationGraph } from "../ceg/graph-store.js";

export type RecordValue = string | number | boolean | null | undefined;
export type CategoricalRecord = Readonly<Record<string, RecordValue>>;

const EventTreeOptionsSchema = z.object({
  variables: z.array(z.string().min(1)).min(1).optional(),
  samplingZeroPaths: z.array(z.array(z.string().min(1)).min(1)).default([]),
  situationPrefix: z.string().min(1).optional(),
});

export type EventTreeOptions = z.input<typeof EventTreeOptionsSchema>;

function toLabel(value: RecordValue): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number" && Number.isNaN(value)) return null;
  const label = String(value).trim();
  return label === "" ? null : label;
}

function pathKey(path: readonly string[]): string {
  return JSON.stringify(path);
}

/**
 * Event tree built from categorical records.
 *
 * Each record contributes the sequence of its non-missing values, in
 * variable order, as a root-to-leaf path. Every prefix of a path is a
 * situation, and an edge's `count` is the number of records sharing the
 * prefix it ends.
 */
export class EventTree {
  private constructor(
    readonly graph: SituationGraph,
    readonly root: string,
    readonly variables: readonly string[],
    readonly samplingZeroPaths: readonly (readonly string[])[],
    readonly categoriesPerVariable: Readonly<Record<string, number>>,
    private readonly paths: ReadonlyMap<string, readonly string[]>
  ) {}

  static fromRecords(records: readonly CategoricalRecord[], options: EventTreeOptions = {}): EventTree {
    const parsed = EventTreeOptionsSchema.parse(options);
    const variables = parsed.variables ?? Object.keys(records[0] ?? {});
    if (variables.length === 0) {
      throw new CegError("Event tree needs at least one variable", "BAD_INPUT");
    }
    const prefix = parsed.situationPrefix ?? getConfig().ceg.situationPrefix;

    const counts = new Map<string, { path: string[]; count: number }>();
    const labelOrder = new Map<string, number>();
    const categories = new Map<string, Set<string>>(variables.map((v) => [v, new Set<string>()]));

    const register = (path: string[], increment: number): void => {
      for (let depth = 1; depth <= path.length; depth++) {
        const prefixPath = path.slice(0, depth);
        const key = pathKey(prefixPath);
        const entry = counts.get(key);
        if (entry) entry.count += increment;
        else counts.set(key, { path: prefixPath, count: increment });
      }
      for (const label of path) {
        if (!labelOrder.has(label)) labelOrder.set(label, labelOrder.size);
      }
    };

    for (const record of records) {
      const path: string[] = [];
      for (const variable of variables) {
        const label = toLabel(record[variable]);
        if (label === null) continue;
        categories.get(variable)?.add(label);
        path.push(label);
      }
      if (path.length > 0) register(path, 1);
    }

    for (const path of parsed.samplingZeroPaths) {
      register(path, 0);
    }

    const rank = (label: string): number => labelOrder.get(label) ?? Number.MAX_SAFE_INTEGER;
    const ordered = [...counts.values()].sort((a, b) => {
      if (a.path.length !== b.path.length) return a.path.length - b.path.length;
      for (let i = 0; i < a.path.length; i++) {
        const diff = rank(a.path[i] ?? "") - rank(b.path[i] ?? "");
        if (diff !== 0) return diff;
      }
      return 0;
    });

    const graph = new SituationGraph();
    const root = `${prefix}0`;
    graph.addNode(root, { role: "root" });

    const ids = new Map<string, string>([[pathKey([]), root]]);
    const paths = new Map<string, readonly string[]>([[root, []]]);
    ordered.forEach(({ path, count }, index) => {
      const id = `${prefix}${index + 1}`;
      const parent = ids.get(pathKey(path.slice(0, -1))) ?? root;
      const label = path[path.length - 1] ?? "";
      ids.set(pathKey(path), id);
      paths.set(id, path);
      graph.addEdge(parent, id, label, { count });
    });

    const categoriesPerVariable = Object.fromEntries(
      variables.map((v) => [v, categories.get(v)?.size ?? 0])
    );

    const tree = new EventTree(
      graph,
      root,
      variables,
      parsed.samplingZeroPaths,
      categoriesPerVariable,
      paths
    );

    emit(TelemetryEvents.EventTreeBuilt, {
      records: records.length,
      situations: tree.situations.length,
      leaves: tree.leaves.length,
      edges: graph.edgeCount,
    });
    return tree;
  }

  /**
   * Non-leaf nodes, root included
   */
  get situations(): string[] {
    return this.graph.nodeIds().filter((id) => this.graph.outDegree(id) > 0);
  }

  get leaves(): string[] {
    return this.graph.nodeIds().filter((id) => this.graph.outDegree(id) === 0);
  }

  /**
   * Observed count per edge, keyed `source|destination|label`
   */
  get edgeCounts(): Map<string, number> {
    return new Map(
      this.graph
        .edges()
        .map((e) => [`${e.source}|${e.destination}|${e.label}`, e.data.count ?? 0] as const)
    );
  }

  /**
   * Labels along the path from the root to `node`
   */
  pathOf(node: string): readonly string[] {
    this.graph.getNode(node);
    return this.paths.get(node) ?? [];
  }

  nodeForPath(path: readonly string[]): string | undefined {
    for (const [id, candidate] of this.paths) {
      if (pathKey(candidate) === pathKey(path)) return id;
    }
    return undefined;
  }
}
