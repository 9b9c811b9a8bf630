import { z } from "zod";

export const NodeRole = z.enum(["root", "situation", "sink"]);

/**
 * Stage labels are strings; numeric labels are accepted at the boundary
 * and converted so that `2` and `"2"` name the same stage.
 */
export const StageLabel = z.union([z.string().min(1), z.number()]).transform((value) => String(value));

export const EdgeAttributes = z
  .object({
    count: z.number().nonnegative().optional(),
    prior: z.number().nonnegative().optional(),
    posterior: z.number().nonnegative().optional(),
    probability: z.number().min(0).max(1).optional(),
  })
  .strict();

export const Node = z.object({
  id: z.string().min(1),
  role: NodeRole.default("situation"),
  stage: StageLabel.nullable().default(null),
});

export const Edge = z.object({
  source: z.string().min(1),
  destination: z.string().min(1),
  label: z.string().min(1),
  data: EdgeAttributes.default({}),
});

export const Graph = z
  .object({
    nodes: z.array(Node),
    edges: z.array(Edge),
  })
  .superRefine((graph, ctx) => {
    const seen = new Set<string>();
    graph.nodes.forEach((node, index) => {
      if (seen.has(node.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["nodes", index, "id"],
          message: `Duplicate node id: ${node.id}`,
        });
      }
      seen.add(node.id);
    });

    const edgeKeys = new Set<string>();
    graph.edges.forEach((edge, index) => {
      const key = `${edge.source}::${edge.destination}::${edge.label}`;
      if (edgeKeys.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["edges", index],
          message: `Duplicate edge: ${edge.source} -> ${edge.destination} (${edge.label})`,
        });
      }
      edgeKeys.add(key);
    });
  });

export type NodeRoleT = z.infer<typeof NodeRole>;
export type EdgeAttributesT = z.infer<typeof EdgeAttributes>;
export type NodeT = z.infer<typeof Node>;
export type EdgeT = z.infer<typeof Edge>;
export type GraphT = z.infer<typeof Graph>;
export type GraphInputT = z.input<typeof Graph>;
