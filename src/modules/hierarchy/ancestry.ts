import { PathNode, PathStyle } from './hierarchy.types';
import { isInSubtree, parsePath, subtreePrefix } from './materialized-path';

/**
 * Parameters of a scoped descendant scan:
 *   WHERE scope = $scope AND (path = selfPath OR path LIKE pattern) [AND id <> excludeId]
 */
export interface DescendantScan {
  selfPath: string;
  pattern: string;
  excludeId: number | null;
}

export const descendantScan = (
  style: PathStyle,
  node: PathNode,
  nodeId: number,
  includeSelf: boolean
): DescendantScan => ({
  selfPath: node.path,
  // Paths hold digits and the delimiter only, so no LIKE escaping is needed
  pattern: `${subtreePrefix(style, node.path)}%`,
  excludeId: includeSelf ? null : nodeId,
});

/**
 * In-memory counterpart of descendantScan
 */
export const matchesDescendantScan = (
  style: PathStyle,
  scan: DescendantScan,
  candidate: PathNode,
  candidateId: number
): boolean =>
  isInSubtree(style, scan.selfPath, candidate.path) && candidateId !== scan.excludeId;

/**
 * Ids on the path from the root down to the node, root first
 */
export const ancestorIds = (style: PathStyle, path: string, includeSelf: boolean): number[] => {
  const ids = parsePath(style, path);
  return includeSelf ? ids : ids.slice(0, -1);
};

export const sortByDepth = <T extends PathNode>(nodes: readonly T[]): T[] =>
  [...nodes].sort((a, b) => a.depth - b.depth);

/**
 * Breadcrumb for a node: decompose its path, batch-fetch, order root-first
 */
export const collectAncestors = async <T extends PathNode>(
  style: PathStyle,
  node: PathNode,
  includeSelf: boolean,
  fetchByIds: (ids: number[]) => Promise<T[]>
): Promise<T[]> => {
  const ids = ancestorIds(style, node.path, includeSelf);
  if (ids.length === 0) {
    return [];
  }
  return sortByDepth(await fetchByIds(ids));
};
