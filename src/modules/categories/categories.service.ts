import {
  Category,
  CategoryListFilter,
  CategoryPatch,
  CreateCategoryInput,
  UpdateCategoryInput,
} from '../../connections/db/models/category.model';
import { AppError } from '../../utils/errors';
import { auditLog, logger } from '../../utils/logging';
import {
  CATEGORY_PATH_STYLE,
  ParentState,
  TreeAccessors,
  TreeNode,
  assertCanAttach,
  assertCategoryRemovable,
  assertDepthInRange,
  assertNotDeleted,
  assertRestorable,
  buildForest,
  collectAncestors,
  countForest,
  createWithMaterializedPath,
  descendantScan,
  resolveSiblingOrder,
  sortByDepth,
} from '../hierarchy';
import { CategoryRepository } from './categories.repository';

export const FULL_NAME_SEPARATOR = ' > ';

export const categoryAccessors: TreeAccessors<Category> = {
  id: category => category.category_id,
  parentId: category => category.parent_id,
};

const toParentState = (category: Category): ParentState => ({
  depth: category.depth,
  path: category.path,
  deleted: category.deleted_at !== null,
});

/**
 * 'Clothing > Pants > Jeans' from the ancestors (root first) and the node's own name
 */
export const buildFullName = (ancestors: readonly Pick<Category, 'name'>[], name: string): string =>
  [...ancestors.map(ancestor => ancestor.name), name].join(FULL_NAME_SEPARATOR);

export interface CategoryTreeQuery {
  parentId?: number;
  useDisplay?: boolean;
}

export class CategoryService {
  constructor(private readonly repo: CategoryRepository) {}

  async create(shopId: number, input: CreateCategoryInput): Promise<Category> {
    const parentId = input.parent_id ?? null;

    const category = await this.repo.transaction(async tx => {
      if (input.category_code && (await tx.codeExists(shopId, input.category_code))) {
        throw AppError.duplicateCode(input.category_code);
      }

      const parent = parentId === null ? null : await tx.findById(shopId, parentId);
      assertCanAttach(CATEGORY_PATH_STYLE, parentId, parent && toParentState(parent));

      const ancestors = parent
        ? await collectAncestors(CATEGORY_PATH_STYLE, parent, true, ids => tx.findByIds(shopId, ids))
        : [];
      const displayOrder = await resolveSiblingOrder(input.display_order, tx, shopId, parentId);

      return createWithMaterializedPath(CATEGORY_PATH_STYLE, parent?.path ?? null, {
        insert: (path, depth) =>
          tx.insert({
            shop_id: shopId,
            parent_id: parentId,
            depth,
            path,
            name: input.name,
            full_name: buildFullName(ancestors, input.name),
            display_order: displayOrder,
            use_display: input.use_display ?? true,
            category_code: input.category_code ?? null,
            description: input.description ?? null,
            image_url: input.image_url ?? null,
            hash_tags: input.hash_tags ?? null,
            meta_keywords: input.meta_keywords ?? null,
          }),
        idOf: row => row.category_id,
        patchPath: (row, path) => tx.updatePath(shopId, row.category_id, path),
      });
    });

    logger.info('Category created', {
      shopId,
      categoryId: category.category_id,
      path: category.path,
      depth: category.depth,
    });
    return category;
  }

  async get(shopId: number, categoryId: number): Promise<Category> {
    const category = await this.repo.findById(shopId, categoryId);
    if (!category) {
      throw AppError.notFound('Category not found', { shopId, categoryId });
    }
    return category;
  }

  async getByCode(shopId: number, code: string): Promise<Category> {
    const category = await this.repo.findByCode(shopId, code);
    if (!category) {
      throw AppError.notFound('Category not found', { shopId, code });
    }
    return category;
  }

  getRoots(shopId: number, useDisplay: boolean = true): Promise<Category[]> {
    return this.repo.findRoots(shopId, { useDisplay });
  }

  getChildren(shopId: number, parentId: number, useDisplay: boolean = true): Promise<Category[]> {
    return this.repo.findChildren(shopId, parentId, { useDisplay });
  }

  async getDescendants(
    shopId: number,
    categoryId: number,
    includeSelf: boolean = false,
    useDisplay: boolean = false
  ): Promise<Category[]> {
    const category = await this.get(shopId, categoryId);
    const scan = descendantScan(CATEGORY_PATH_STYLE, category, categoryId, includeSelf);
    return this.repo.findDescendants(shopId, scan, { useDisplay });
  }

  /**
   * Whole forest of the shop, or the subtree rooted at `parentId`
   */
  async getTree(shopId: number, query: CategoryTreeQuery = {}): Promise<TreeNode<Category>[]> {
    const filter: CategoryListFilter = { useDisplay: query.useDisplay ?? true };

    let rows: Category[];
    let rootParentId: number | null = null;
    if (query.parentId !== undefined) {
      const root = await this.get(shopId, query.parentId);
      if (root.deleted_at !== null) {
        throw AppError.notFound('Category not found', { shopId, categoryId: query.parentId });
      }
      rows = await this.repo.findDescendants(
        shopId,
        descendantScan(CATEGORY_PATH_STYLE, root, root.category_id, true),
        filter
      );
      rootParentId = root.parent_id;
    } else {
      rows = await this.repo.findAll(shopId, filter);
    }

    const forest = buildForest(rows, categoryAccessors, rootParentId);
    const placed = countForest(forest);
    if (placed < rows.length) {
      // Children of hidden categories have no parent in the result
      logger.debug('Category tree dropped unreachable nodes', { shopId, dropped: rows.length - placed });
    }
    return forest;
  }

  async getBreadcrumb(shopId: number, categoryId: number): Promise<Category[]> {
    const category = await this.get(shopId, categoryId);
    return collectAncestors(CATEGORY_PATH_STYLE, category, true, ids => this.repo.findByIds(shopId, ids));
  }

  async getByDepth(shopId: number, depth: number, useDisplay: boolean = true): Promise<Category[]> {
    assertDepthInRange(CATEGORY_PATH_STYLE, depth);
    return this.repo.findAll(shopId, { depth, useDisplay });
  }

  async search(shopId: number, keyword: string, depth?: number, useDisplay: boolean = true): Promise<Category[]> {
    if (depth !== undefined) {
      assertDepthInRange(CATEGORY_PATH_STYLE, depth);
    }
    return this.repo.findAll(shopId, { keyword, depth, useDisplay });
  }

  /**
   * Renaming rewrites full_name for the node and its whole subtree
   */
  async update(shopId: number, categoryId: number, input: UpdateCategoryInput): Promise<Category> {
    const updated = await this.repo.transaction(async tx => {
      const category = await tx.findById(shopId, categoryId);
      if (!category) {
        throw AppError.notFound('Category not found', { shopId, categoryId });
      }
      assertNotDeleted(category.deleted_at !== null);

      if (input.category_code && (await tx.codeExists(shopId, input.category_code, categoryId))) {
        throw AppError.duplicateCode(input.category_code);
      }

      const patch: CategoryPatch = { ...input };
      const renamed = input.name !== undefined && input.name !== category.name;
      if (renamed && input.name !== undefined) {
        const ancestors = await collectAncestors(CATEGORY_PATH_STYLE, category, false, ids =>
          tx.findByIds(shopId, ids)
        );
        patch.full_name = buildFullName(ancestors, input.name);
      }

      const result = await tx.update(shopId, categoryId, patch);
      if (!result) {
        throw AppError.notFound('Category not found', { shopId, categoryId });
      }

      if (renamed) {
        await this.refreshDescendantNames(tx, result);
      }
      return result;
    });

    logger.info('Category updated', { shopId, categoryId, fields: Object.keys(input) });
    return updated;
  }

  private async refreshDescendantNames(tx: CategoryRepository, root: Category): Promise<void> {
    const scan = descendantScan(CATEGORY_PATH_STYLE, root, root.category_id, false);
    const descendants = sortByDepth(await tx.findDescendants(root.shop_id, scan, { includeDeleted: true }));

    const names = new Map<number, string>([[root.category_id, root.full_name ?? root.name]]);
    for (const descendant of descendants) {
      const parentName = descendant.parent_id === null ? undefined : names.get(descendant.parent_id);
      if (parentName === undefined) {
        continue;
      }
      const fullName = `${parentName}${FULL_NAME_SEPARATOR}${descendant.name}`;
      names.set(descendant.category_id, fullName);
      if (fullName !== descendant.full_name) {
        await tx.updateFullName(root.shop_id, descendant.category_id, fullName);
      }
    }
  }

  /**
   * Soft delete by default. Both modes are refused while children or products remain.
   */
  async delete(shopId: number, categoryId: number, hardDelete: boolean = false): Promise<Category> {
    const category = await this.get(shopId, categoryId);
    const childCount = await this.repo.countChildren(shopId, categoryId);
    assertCategoryRemovable({ childCount, productCount: category.product_count });

    if (hardDelete) {
      await this.repo.hardDelete(shopId, categoryId);
      auditLog('category.hard_delete', { shopId, categoryId, path: category.path, name: category.name });
      return category;
    }

    assertNotDeleted(category.deleted_at !== null);
    await this.repo.softDelete(shopId, categoryId);
    logger.info('Category soft deleted', { shopId, categoryId });
    return this.get(shopId, categoryId);
  }

  async restore(shopId: number, categoryId: number): Promise<Category> {
    const category = await this.get(shopId, categoryId);
    assertRestorable(category.deleted_at !== null);
    await this.repo.restore(shopId, categoryId);
    auditLog('category.restore', { shopId, categoryId });
    return this.get(shopId, categoryId);
  }

  async toggleDisplay(shopId: number, categoryId: number): Promise<Category> {
    await this.get(shopId, categoryId);
    await this.repo.toggleDisplay(shopId, categoryId);
    return this.get(shopId, categoryId);
  }

  async adjustProductCount(shopId: number, categoryId: number, delta: number): Promise<Category> {
    await this.get(shopId, categoryId);
    const category = await this.repo.adjustProductCount(shopId, categoryId, delta);
    if (!category) {
      throw AppError.notFound('Category not found', { shopId, categoryId });
    }
    return category;
  }
}
