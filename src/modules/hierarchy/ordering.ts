/**
 * Anything that can report the highest sibling order under a parent
 * (parentId null = top level of the scope).
 */
export interface SiblingOrderSource {
  maxSiblingOrder(scopeId: number, parentId: number | null): Promise<number>;
}

/**
 * max(existing sibling order) + 1; 1 for the first sibling.
 * Read-then-write without a lock: concurrent siblings can get the same value.
 */
export const nextSiblingOrder = async (
  source: SiblingOrderSource,
  scopeId: number,
  parentId: number | null
): Promise<number> => {
  const max = await source.maxSiblingOrder(scopeId, parentId);
  return Math.max(max, 0) + 1;
};

/**
 * An explicit order from the caller wins over the allocated one
 */
export const resolveSiblingOrder = async (
  requested: number | null | undefined,
  source: SiblingOrderSource,
  scopeId: number,
  parentId: number | null
): Promise<number> =>
  requested ?? nextSiblingOrder(source, scopeId, parentId);
