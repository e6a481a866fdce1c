import { AppError } from '../../utils/errors';
import { ParentState, PathStyle } from './hierarchy.types';

/**
 * Checks a prospective parent before anything is written and returns the
 * depth the new node will have.
 */
export const assertCanAttach = (
  style: PathStyle,
  parentId: number | null,
  parent: ParentState | null
): number => {
  if (parentId === null) {
    return style.rootDepth;
  }

  if (!parent) {
    throw AppError.parentNotFound(parentId);
  }

  if (parent.deleted) {
    throw style.entity === 'comment'
      ? AppError.replyToDeleted(parentId)
      : AppError.parentDeleted(parentId);
  }

  const depth = parent.depth + 1;
  if (depth > style.maxDepth) {
    throw AppError.maxDepthExceeded(depth, style.maxDepth);
  }

  return depth;
};

export const canHaveChildren = (style: PathStyle, node: { depth: number }): boolean =>
  node.depth < style.maxDepth;

export const assertDepthInRange = (style: PathStyle, depth: number): void => {
  if (!Number.isInteger(depth) || depth < style.rootDepth || depth > style.maxDepth) {
    throw AppError.invalidDepth(depth, style.rootDepth, style.maxDepth);
  }
};
