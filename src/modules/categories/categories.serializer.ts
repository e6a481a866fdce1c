import { Category } from '../../connections/db/models/category.model';
import { CATEGORY_PATH_STYLE, TreeNode, canHaveChildren, isCategoryActive, parsePath } from '../hierarchy';

export interface CategoryResponse extends Category {
  is_root: boolean;
  is_active: boolean;
  can_have_children: boolean;
  path_ids: number[];
}

export interface CategoryTreeResponse extends CategoryResponse {
  children: CategoryTreeResponse[];
}

export const toCategoryResponse = (category: Category): CategoryResponse => ({
  ...category,
  is_root: category.parent_id === null,
  is_active: isCategoryActive(category),
  can_have_children: canHaveChildren(CATEGORY_PATH_STYLE, category),
  path_ids: parsePath(CATEGORY_PATH_STYLE, category.path),
});

export const toCategoryTreeResponse = (node: TreeNode<Category>): CategoryTreeResponse => {
  const { children, ...category } = node;
  return {
    ...toCategoryResponse(category),
    children: children.map(toCategoryTreeResponse),
  };
};
