import { CategoryRepository } from '../../src/modules/categories/categories.repository';
import {
  Category,
  CategoryListFilter,
  CategoryPatch,
  NewCategoryRecord,
} from '../../src/connections/db/models/category.model';
import { CATEGORY_PATH_STYLE, DescendantScan, matchesDescendantScan } from '../../src/modules/hierarchy';

type Method = keyof CategoryRepository;

const byTreeOrder = (a: Category, b: Category) =>
  a.depth - b.depth || a.display_order - b.display_order || a.category_id - b.category_id;

/**
 * In-process stand-in for PgCategoryRepository. Ids come from one sequence
 * shared by all shops and are not reused after a rollback, like SERIAL.
 */
export class MemoryCategoryRepository implements CategoryRepository {
  rows = new Map<string, Category>();
  private sequence = 0;
  private inTransaction = false;
  private readonly failures = new Set<Method>();

  /** Makes the next call of `method` throw */
  failNext(method: Method): void {
    this.failures.add(method);
  }

  all(): Category[] {
    return [...this.rows.values()].sort(byTreeOrder);
  }

  private key(shopId: number, categoryId: number): string {
    return `${shopId}:${categoryId}`;
  }

  private check(method: Method): void {
    if (this.failures.delete(method)) {
      throw new Error(`${method} failed`);
    }
  }

  private list(shopId: number, predicate: (row: Category) => boolean, filter: CategoryListFilter): Category[] {
    const keyword = filter.keyword?.toLowerCase();
    return this.all().filter(
      row =>
        row.shop_id === shopId &&
        predicate(row) &&
        (filter.includeDeleted || row.deleted_at === null) &&
        (!filter.useDisplay || row.use_display) &&
        (filter.depth === undefined || row.depth === filter.depth) &&
        (!keyword ||
          row.name.toLowerCase().includes(keyword) ||
          (row.full_name ?? '').toLowerCase().includes(keyword))
    );
  }

  async transaction<T>(work: (repo: CategoryRepository) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      return work(this);
    }
    const snapshot = new Map([...this.rows].map(([key, row]) => [key, { ...row }]));
    this.inTransaction = true;
    try {
      return await work(this);
    } catch (error) {
      this.rows = snapshot;
      throw error;
    } finally {
      this.inTransaction = false;
    }
  }

  async insert(record: NewCategoryRecord): Promise<Category> {
    this.check('insert');
    const now = new Date();
    const row: Category = {
      ...record,
      category_id: ++this.sequence,
      product_count: 0,
      created_at: now,
      updated_at: now,
      deleted_at: null,
    };
    this.rows.set(this.key(row.shop_id, row.category_id), row);
    return { ...row };
  }

  async updatePath(shopId: number, categoryId: number, path: string): Promise<Category> {
    this.check('updatePath');
    const row = this.rows.get(this.key(shopId, categoryId));
    if (!row) {
      throw new Error(`No category ${shopId}:${categoryId}`);
    }
    row.path = path;
    return { ...row };
  }

  async findById(shopId: number, categoryId: number): Promise<Category | null> {
    const row = this.rows.get(this.key(shopId, categoryId));
    return row ? { ...row } : null;
  }

  async findByCode(shopId: number, code: string): Promise<Category | null> {
    return this.list(shopId, row => row.category_code === code, {})[0] ?? null;
  }

  async findByIds(shopId: number, categoryIds: number[]): Promise<Category[]> {
    return this.list(shopId, row => categoryIds.includes(row.category_id), { includeDeleted: true });
  }

  async findRoots(shopId: number, filter: CategoryListFilter = {}): Promise<Category[]> {
    return this.list(shopId, row => row.parent_id === null, filter);
  }

  async findChildren(shopId: number, parentId: number, filter: CategoryListFilter = {}): Promise<Category[]> {
    return this.list(shopId, row => row.parent_id === parentId, filter);
  }

  async findDescendants(shopId: number, scan: DescendantScan, filter: CategoryListFilter = {}): Promise<Category[]> {
    return this.list(
      shopId,
      row => matchesDescendantScan(CATEGORY_PATH_STYLE, scan, row, row.category_id),
      filter
    );
  }

  async findAll(shopId: number, filter: CategoryListFilter = {}): Promise<Category[]> {
    return this.list(shopId, () => true, filter);
  }

  async maxSiblingOrder(shopId: number, parentId: number | null): Promise<number> {
    const siblings = this.list(shopId, row => row.parent_id === parentId, { includeDeleted: true });
    return siblings.reduce((max, row) => Math.max(max, row.display_order), 0);
  }

  async countChildren(shopId: number, categoryId: number): Promise<number> {
    return this.list(shopId, row => row.parent_id === categoryId, { includeDeleted: true }).length;
  }

  async codeExists(shopId: number, code: string, excludeCategoryId?: number): Promise<boolean> {
    return (
      this.list(shopId, row => row.category_code === code && row.category_id !== excludeCategoryId, {
        includeDeleted: true,
      }).length > 0
    );
  }

  async update(shopId: number, categoryId: number, patch: CategoryPatch): Promise<Category | null> {
    this.check('update');
    const row = this.rows.get(this.key(shopId, categoryId));
    if (!row) {
      return null;
    }
    const updated: Category = {
      ...row,
      name: patch.name ?? row.name,
      full_name: patch.full_name ?? row.full_name,
      display_order: patch.display_order ?? row.display_order,
      use_display: patch.use_display ?? row.use_display,
      category_code: patch.category_code === undefined ? row.category_code : patch.category_code,
      description: patch.description === undefined ? row.description : patch.description,
      image_url: patch.image_url === undefined ? row.image_url : patch.image_url,
      hash_tags: patch.hash_tags === undefined ? row.hash_tags : patch.hash_tags,
      meta_keywords: patch.meta_keywords === undefined ? row.meta_keywords : patch.meta_keywords,
      updated_at: new Date(),
    };
    this.rows.set(this.key(shopId, categoryId), updated);
    return { ...updated };
  }

  async updateFullName(shopId: number, categoryId: number, fullName: string): Promise<void> {
    this.check('updateFullName');
    const row = this.rows.get(this.key(shopId, categoryId));
    if (row) {
      row.full_name = fullName;
    }
  }

  async softDelete(shopId: number, categoryId: number): Promise<boolean> {
    const row = this.rows.get(this.key(shopId, categoryId));
    if (!row || row.deleted_at !== null) {
      return false;
    }
    row.deleted_at = new Date();
    return true;
  }

  async hardDelete(shopId: number, categoryId: number): Promise<boolean> {
    return this.rows.delete(this.key(shopId, categoryId));
  }

  async restore(shopId: number, categoryId: number): Promise<boolean> {
    const row = this.rows.get(this.key(shopId, categoryId));
    if (!row || row.deleted_at === null) {
      return false;
    }
    row.deleted_at = null;
    return true;
  }

  async toggleDisplay(shopId: number, categoryId: number): Promise<boolean> {
    const row = this.rows.get(this.key(shopId, categoryId));
    if (!row) {
      return false;
    }
    row.use_display = !row.use_display;
    return true;
  }

  async adjustProductCount(shopId: number, categoryId: number, delta: number): Promise<Category | null> {
    const row = this.rows.get(this.key(shopId, categoryId));
    if (!row) {
      return null;
    }
    row.product_count = Math.max(row.product_count + delta, 0);
    return { ...row };
  }
}
