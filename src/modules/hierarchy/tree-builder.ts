import { TreeAccessors } from './hierarchy.types';

export type TreeNode<T> = T & { children: TreeNode<T>[] };

/**
 * Turns a flat, scope-filtered list into a forest in one pass.
 *
 * Input must list every parent before its children (path order, or depth
 * then sibling order). A node whose parent id equals rootParentId becomes a
 * root; a node whose parent has not been seen yet is dropped.
 */
export const buildForest = <T extends object>(
  items: readonly T[],
  accessors: TreeAccessors<T>,
  rootParentId: number | null = null
): TreeNode<T>[] => {
  const index = new Map<number, TreeNode<T>>();
  const roots: TreeNode<T>[] = [];

  for (const item of items) {
    const node: TreeNode<T> = { ...item, children: [] };
    index.set(accessors.id(item), node);

    const parentId = accessors.parentId(item);
    if (parentId === rootParentId) {
      roots.push(node);
      continue;
    }

    const parent = parentId === null ? undefined : index.get(parentId);
    if (parent) {
      parent.children.push(node);
    }
  }

  return roots;
};

/**
 * Pre-order walk; parents come out before their children
 */
export const flattenForest = <T extends object>(forest: readonly TreeNode<T>[]): TreeNode<T>[] => {
  const out: TreeNode<T>[] = [];
  const visit = (node: TreeNode<T>) => {
    out.push(node);
    node.children.forEach(visit);
  };
  forest.forEach(visit);
  return out;
};

export const countForest = <T extends object>(forest: readonly TreeNode<T>[]): number =>
  forest.reduce((total, node) => total + 1 + countForest(node.children), 0);

/**
 * Drops every node that fails `keep` unless one of its descendants is kept
 */
export const pruneForest = <T extends object>(
  forest: readonly TreeNode<T>[],
  keep: (node: T) => boolean
): TreeNode<T>[] =>
  forest.flatMap((node): TreeNode<T>[] => {
    const children = pruneForest(node.children, keep);
    if (!keep(node) && children.length === 0) {
      return [];
    }
    const kept: TreeNode<T> = { ...node, children };
    return [kept];
  });
