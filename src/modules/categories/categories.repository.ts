import { Queryable, pool, withTransaction } from '../../connections/db/connection';
import {
  Category,
  CategoryListFilter,
  CategoryPatch,
  NewCategoryRecord,
} from '../../connections/db/models/category.model';
import { DescendantScan, SiblingOrderSource } from '../hierarchy';
import { SqlQuery, WhereBuilder, escapeLike } from '../../utils/sql';

/**
 * Storage for shop_categories. Every lookup is scoped by shop.
 */
export interface CategoryRepository extends SiblingOrderSource {
  transaction<T>(work: (repo: CategoryRepository) => Promise<T>): Promise<T>;
  insert(record: NewCategoryRecord): Promise<Category>;
  updatePath(shopId: number, categoryId: number, path: string): Promise<Category>;
  findById(shopId: number, categoryId: number): Promise<Category | null>;
  findByCode(shopId: number, code: string): Promise<Category | null>;
  findByIds(shopId: number, categoryIds: number[]): Promise<Category[]>;
  findRoots(shopId: number, filter?: CategoryListFilter): Promise<Category[]>;
  findChildren(shopId: number, parentId: number, filter?: CategoryListFilter): Promise<Category[]>;
  findDescendants(shopId: number, scan: DescendantScan, filter?: CategoryListFilter): Promise<Category[]>;
  findAll(shopId: number, filter?: CategoryListFilter): Promise<Category[]>;
  countChildren(shopId: number, categoryId: number): Promise<number>;
  codeExists(shopId: number, code: string, excludeCategoryId?: number): Promise<boolean>;
  update(shopId: number, categoryId: number, patch: CategoryPatch): Promise<Category | null>;
  updateFullName(shopId: number, categoryId: number, fullName: string): Promise<void>;
  softDelete(shopId: number, categoryId: number): Promise<boolean>;
  hardDelete(shopId: number, categoryId: number): Promise<boolean>;
  restore(shopId: number, categoryId: number): Promise<boolean>;
  toggleDisplay(shopId: number, categoryId: number): Promise<boolean>;
  adjustProductCount(shopId: number, categoryId: number, delta: number): Promise<Category | null>;
}

const CATEGORY_COLUMNS = `shop_id, category_id, parent_id, depth, path, name, full_name,
  display_order, use_display, category_code, description, image_url, product_count,
  hash_tags, meta_keywords, created_at, updated_at, deleted_at`;

// Parents always come before children
const TREE_ORDER = 'ORDER BY depth ASC, display_order ASC, category_id ASC';

const applyListFilter = (where: WhereBuilder, filter: CategoryListFilter): void => {
  if (!filter.includeDeleted) {
    where.add('deleted_at IS NULL');
  }
  if (filter.useDisplay) {
    where.add('use_display = TRUE');
  }
  if (filter.depth !== undefined) {
    where.add('depth = ?', filter.depth);
  }
  if (filter.keyword) {
    const pattern = `%${escapeLike(filter.keyword)}%`;
    where.add('(name ILIKE ? OR full_name ILIKE ?)', pattern, pattern);
  }
};

export const buildCategoryListQuery = (shopId: number, filter: CategoryListFilter = {}): SqlQuery => {
  const where = new WhereBuilder().add('shop_id = ?', shopId);
  applyListFilter(where, filter);
  return {
    text: `SELECT ${CATEGORY_COLUMNS} FROM shop_categories ${where.toSql()} ${TREE_ORDER}`,
    values: where.values,
  };
};

export const buildChildrenQuery = (
  shopId: number,
  parentId: number | null,
  filter: CategoryListFilter = {}
): SqlQuery => {
  const where = new WhereBuilder().add('shop_id = ?', shopId);
  if (parentId === null) {
    where.add('parent_id IS NULL');
  } else {
    where.add('parent_id = ?', parentId);
  }
  applyListFilter(where, filter);
  return {
    text: `SELECT ${CATEGORY_COLUMNS} FROM shop_categories ${where.toSql()} ORDER BY display_order ASC, category_id ASC`,
    values: where.values,
  };
};

export const buildDescendantsQuery = (
  shopId: number,
  scan: DescendantScan,
  filter: CategoryListFilter = {}
): SqlQuery => {
  const where = new WhereBuilder()
    .add('shop_id = ?', shopId)
    .add('(path = ? OR path LIKE ?)', scan.selfPath, scan.pattern);
  if (scan.excludeId !== null) {
    where.add('category_id <> ?', scan.excludeId);
  }
  applyListFilter(where, filter);
  return {
    text: `SELECT ${CATEGORY_COLUMNS} FROM shop_categories ${where.toSql()} ${TREE_ORDER}`,
    values: where.values,
  };
};

const UPDATABLE_FIELDS = [
  'name',
  'full_name',
  'display_order',
  'use_display',
  'category_code',
  'description',
  'image_url',
  'hash_tags',
  'meta_keywords',
] as const;

/**
 * Returns null when the patch carries no field to write
 */
export const buildCategoryUpdateQuery = (
  shopId: number,
  categoryId: number,
  patch: CategoryPatch
): SqlQuery | null => {
  const sets: string[] = [];
  const values: unknown[] = [];

  for (const field of UPDATABLE_FIELDS) {
    const value = patch[field];
    if (value === undefined) {
      continue;
    }
    values.push(field === 'hash_tags' && value !== null ? JSON.stringify(value) : value);
    sets.push(`${field} = $${values.length}`);
  }

  if (sets.length === 0) {
    return null;
  }

  values.push(shopId, categoryId);
  return {
    text: `UPDATE shop_categories
       SET ${sets.join(', ')}, updated_at = NOW()
       WHERE shop_id = $${values.length - 1} AND category_id = $${values.length}
       RETURNING ${CATEGORY_COLUMNS}`,
    values,
  };
};

const affected = (rowCount: number | null): boolean => (rowCount ?? 0) > 0;

export class PgCategoryRepository implements CategoryRepository {
  constructor(
    private readonly db: Queryable = pool,
    private readonly inTransaction: boolean = false
  ) {}

  async transaction<T>(work: (repo: CategoryRepository) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      return work(this);
    }
    return withTransaction(client => work(new PgCategoryRepository(client, true)));
  }

  async insert(record: NewCategoryRecord): Promise<Category> {
    const result = await this.db.query<Category>(
      `INSERT INTO shop_categories (
         shop_id, parent_id, depth, path, name, full_name, display_order, use_display,
         category_code, description, image_url, hash_tags, meta_keywords
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
       RETURNING ${CATEGORY_COLUMNS}`,
      [
        record.shop_id,
        record.parent_id,
        record.depth,
        record.path,
        record.name,
        record.full_name,
        record.display_order,
        record.use_display,
        record.category_code,
        record.description,
        record.image_url,
        record.hash_tags ? JSON.stringify(record.hash_tags) : null,
        record.meta_keywords,
      ]
    );
    return result.rows[0];
  }

  async updatePath(shopId: number, categoryId: number, path: string): Promise<Category> {
    const result = await this.db.query<Category>(
      `UPDATE shop_categories SET path = $1, updated_at = NOW()
       WHERE shop_id = $2 AND category_id = $3
       RETURNING ${CATEGORY_COLUMNS}`,
      [path, shopId, categoryId]
    );
    return result.rows[0];
  }

  async findById(shopId: number, categoryId: number): Promise<Category | null> {
    const result = await this.db.query<Category>(
      `SELECT ${CATEGORY_COLUMNS} FROM shop_categories WHERE shop_id = $1 AND category_id = $2`,
      [shopId, categoryId]
    );
    return result.rows[0] ?? null;
  }

  async findByCode(shopId: number, code: string): Promise<Category | null> {
    const result = await this.db.query<Category>(
      `SELECT ${CATEGORY_COLUMNS} FROM shop_categories
       WHERE shop_id = $1 AND category_code = $2 AND deleted_at IS NULL`,
      [shopId, code]
    );
    return result.rows[0] ?? null;
  }

  async findByIds(shopId: number, categoryIds: number[]): Promise<Category[]> {
    if (categoryIds.length === 0) {
      return [];
    }
    const result = await this.db.query<Category>(
      `SELECT ${CATEGORY_COLUMNS} FROM shop_categories
       WHERE shop_id = $1 AND category_id = ANY($2::int[])
       ORDER BY depth ASC`,
      [shopId, categoryIds]
    );
    return result.rows;
  }

  async findRoots(shopId: number, filter: CategoryListFilter = {}): Promise<Category[]> {
    const query = buildChildrenQuery(shopId, null, filter);
    return (await this.db.query<Category>(query.text, query.values)).rows;
  }

  async findChildren(shopId: number, parentId: number, filter: CategoryListFilter = {}): Promise<Category[]> {
    const query = buildChildrenQuery(shopId, parentId, filter);
    return (await this.db.query<Category>(query.text, query.values)).rows;
  }

  async findDescendants(shopId: number, scan: DescendantScan, filter: CategoryListFilter = {}): Promise<Category[]> {
    const query = buildDescendantsQuery(shopId, scan, filter);
    return (await this.db.query<Category>(query.text, query.values)).rows;
  }

  async findAll(shopId: number, filter: CategoryListFilter = {}): Promise<Category[]> {
    const query = buildCategoryListQuery(shopId, filter);
    return (await this.db.query<Category>(query.text, query.values)).rows;
  }

  async maxSiblingOrder(shopId: number, parentId: number | null): Promise<number> {
    const result = await this.db.query<{ max_order: number }>(
      `SELECT COALESCE(MAX(display_order), 0) AS max_order FROM shop_categories
       WHERE shop_id = $1 AND parent_id IS NOT DISTINCT FROM $2`,
      [shopId, parentId]
    );
    return Number(result.rows[0]?.max_order ?? 0);
  }

  async countChildren(shopId: number, categoryId: number): Promise<number> {
    // Deleted children count too
    const result = await this.db.query<{ count: string }>(
      'SELECT COUNT(*) AS count FROM shop_categories WHERE shop_id = $1 AND parent_id = $2',
      [shopId, categoryId]
    );
    return parseInt(result.rows[0]?.count ?? '0');
  }

  async codeExists(shopId: number, code: string, excludeCategoryId?: number): Promise<boolean> {
    const where = new WhereBuilder()
      .add('shop_id = ?', shopId)
      .add('category_code = ?', code);
    if (excludeCategoryId !== undefined) {
      where.add('category_id <> ?', excludeCategoryId);
    }
    const result = await this.db.query(`SELECT 1 FROM shop_categories ${where.toSql()} LIMIT 1`, where.values);
    return result.rows.length > 0;
  }

  async update(shopId: number, categoryId: number, patch: CategoryPatch): Promise<Category | null> {
    const query = buildCategoryUpdateQuery(shopId, categoryId, patch);
    if (!query) {
      return this.findById(shopId, categoryId);
    }
    const result = await this.db.query<Category>(query.text, query.values);
    return result.rows[0] ?? null;
  }

  async updateFullName(shopId: number, categoryId: number, fullName: string): Promise<void> {
    await this.db.query(
      `UPDATE shop_categories SET full_name = $1, updated_at = NOW()
       WHERE shop_id = $2 AND category_id = $3`,
      [fullName, shopId, categoryId]
    );
  }

  async softDelete(shopId: number, categoryId: number): Promise<boolean> {
    const result = await this.db.query(
      `UPDATE shop_categories SET deleted_at = NOW(), updated_at = NOW()
       WHERE shop_id = $1 AND category_id = $2 AND deleted_at IS NULL`,
      [shopId, categoryId]
    );
    return affected(result.rowCount);
  }

  async hardDelete(shopId: number, categoryId: number): Promise<boolean> {
    const result = await this.db.query(
      'DELETE FROM shop_categories WHERE shop_id = $1 AND category_id = $2',
      [shopId, categoryId]
    );
    return affected(result.rowCount);
  }

  async restore(shopId: number, categoryId: number): Promise<boolean> {
    const result = await this.db.query(
      `UPDATE shop_categories SET deleted_at = NULL, updated_at = NOW()
       WHERE shop_id = $1 AND category_id = $2 AND deleted_at IS NOT NULL`,
      [shopId, categoryId]
    );
    return affected(result.rowCount);
  }

  async toggleDisplay(shopId: number, categoryId: number): Promise<boolean> {
    const result = await this.db.query(
      `UPDATE shop_categories SET use_display = NOT use_display, updated_at = NOW()
       WHERE shop_id = $1 AND category_id = $2`,
      [shopId, categoryId]
    );
    return affected(result.rowCount);
  }

  async adjustProductCount(shopId: number, categoryId: number, delta: number): Promise<Category | null> {
    // Never below zero
    const result = await this.db.query<Category>(
      `UPDATE shop_categories
       SET product_count = GREATEST(product_count + $1, 0), updated_at = NOW()
       WHERE shop_id = $2 AND category_id = $3
       RETURNING ${CATEGORY_COLUMNS}`,
      [delta, shopId, categoryId]
    );
    return result.rows[0] ?? null;
  }
}
