/**
 * Edge attribute bundle carried by every transition.
 *
 * `count`, `prior` and `posterior` are tallies and add up when parallel
 * edges are merged. `probability` is a derived ratio and is never summed.
 */

export const EDGE_ATTRIBUTE_KEYS = ["count", "prior", "posterior", "probability"] as const;

export type EdgeAttributeKey = (typeof EDGE_ATTRIBUTE_KEYS)[number];

export type EdgeAttributes = Partial<Record<EdgeAttributeKey, number>>;

const NON_ADDITIVE_KEYS: ReadonlySet<EdgeAttributeKey> = new Set<EdgeAttributeKey>(["probability"]);

export function isAdditive(key: EdgeAttributeKey): boolean {
  return !NON_ADDITIVE_KEYS.has(key);
}

/**
 * Merge the attributes of two edges that collapse into one.
 *
 * Argument order is part of the contract: the result has the union of both
 * key sets, additive keys are summed with a missing key counting as 0, and
 * `probability` is taken from `first`. Only when `first` has no probability
 * is `second`'s used.
 */
export function mergeEdgeData(first: EdgeAttributes, second: EdgeAttributes): EdgeAttributes {
  const merged: EdgeAttributes = {};
  for (const key of EDGE_ATTRIBUTE_KEYS) {
    const a = first[key];
    const b = second[key];
    if (a === undefined && b === undefined) continue;

    merged[key] = isAdditive(key) ? (a ?? 0) + (b ?? 0) : (a ?? b);
  }
  return merged;
}

export function copyEdgeData(data: EdgeAttributes): EdgeAttributes {
  return { ...data };
}
