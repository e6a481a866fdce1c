import { AppError } from '../../utils/errors';

/**
 * Fixed text a soft-deleted comment is left with. The original text is not kept.
 */
export const DELETED_COMMENT_CONTENT = 'This comment has been deleted.';

export interface CategoryRemovalState {
  childCount: number;
  productCount: number;
}

/**
 * Categories: soft and hard delete are both refused while the node has a
 * child (deleted children count) or products.
 */
export const assertCategoryRemovable = ({ childCount, productCount }: CategoryRemovalState): void => {
  if (childCount > 0) {
    throw AppError.hasChildren(childCount);
  }
  if (productCount > 0) {
    throw AppError.hasProducts(productCount);
  }
};

export type CommentDeleteMode = 'soft' | 'hard';

/**
 * Comments: soft delete is always allowed; hard delete needs an admin.
 * A hard delete asked for by anyone else degrades to a soft delete.
 */
export const resolveCommentDeleteMode = (hardRequested: boolean, isAdmin: boolean): CommentDeleteMode =>
  hardRequested && isAdmin ? 'hard' : 'soft';

export const assertRestorable = (deleted: boolean): void => {
  if (!deleted) {
    throw AppError.alreadyActive();
  }
};

export const assertNotDeleted = (deleted: boolean): void => {
  if (deleted) {
    throw AppError.alreadyDeleted();
  }
};

/**
 * Active = shown and not soft-deleted
 */
export const isCategoryActive = (category: { use_display: boolean; deleted_at: Date | null }): boolean =>
  category.use_display && category.deleted_at === null;
