import { describe, it, expect, beforeEach } from 'vitest';
import { CategoryService, buildFullName } from '../src/modules/categories/categories.service';
import { ERROR_CODE } from '../src/utils/errors';
import { MemoryCategoryRepository } from './helpers/memory-category.repository';
import { rejectAppError } from './helpers/errors';
import { OTHER_SHOP_ID, SHOP_ID, seedCatalog } from './fixtures/categories.samples';

let repo: MemoryCategoryRepository;
let service: CategoryService;

beforeEach(() => {
  repo = new MemoryCategoryRepository();
  service = new CategoryService(repo);
});

describe('CategoryService.create', () => {
  it('creates a root and a child with materialized paths', async () => {
    const clothing = await service.create(SHOP_ID, { name: 'Clothing' });
    const pants = await service.create(SHOP_ID, { name: 'Pants', parent_id: clothing.category_id });

    expect(clothing).toMatchObject({ category_id: 1, parent_id: null, depth: 1, path: '1/', full_name: 'Clothing' });
    expect(pants).toMatchObject({
      category_id: 2,
      parent_id: 1,
      depth: 2,
      path: '1/2/',
      full_name: 'Clothing > Pants',
    });
  });

  it('allocates display order per sibling group', async () => {
    const { clothing, shirts, shoes } = await seedCatalog(service);

    expect(clothing.display_order).toBe(1);
    expect(shoes.display_order).toBe(2);
    expect(shirts.display_order).toBe(2);
  });

  it('keeps an explicit display order', async () => {
    const category = await service.create(SHOP_ID, { name: 'Sale', display_order: 10 });
    expect(category.display_order).toBe(10);
  });

  it('defaults the optional fields', async () => {
    const category = await service.create(SHOP_ID, { name: 'Bags' });
    expect(category).toMatchObject({
      use_display: true,
      category_code: null,
      description: null,
      hash_tags: null,
      product_count: 0,
      deleted_at: null,
    });
  });

  it('stops at depth 4', async () => {
    const a = await service.create(SHOP_ID, { name: 'A' });
    const b = await service.create(SHOP_ID, { name: 'B', parent_id: a.category_id });
    const c = await service.create(SHOP_ID, { name: 'C', parent_id: b.category_id });
    const d = await service.create(SHOP_ID, { name: 'D', parent_id: c.category_id });

    const error = await rejectAppError(service.create(SHOP_ID, { name: 'E', parent_id: d.category_id }));

    expect(d).toMatchObject({ depth: 4, path: '1/2/3/4/', full_name: 'A > B > C > D' });
    expect(error.code).toBe(ERROR_CODE.MAX_DEPTH_EXCEEDED);
    expect(repo.all()).toHaveLength(4);
  });

  it('rejects a parent that does not exist in the shop', async () => {
    const clothing = await service.create(SHOP_ID, { name: 'Clothing' });

    const error = await rejectAppError(
      service.create(OTHER_SHOP_ID, { name: 'Pants', parent_id: clothing.category_id })
    );

    expect(error.code).toBe(ERROR_CODE.PARENT_NOT_FOUND);
    expect(error.statusCode).toBe(404);
  });

  it('rejects a soft-deleted parent', async () => {
    const clothing = await service.create(SHOP_ID, { name: 'Clothing' });
    await service.delete(SHOP_ID, clothing.category_id);

    const error = await rejectAppError(service.create(SHOP_ID, { name: 'Pants', parent_id: clothing.category_id }));

    expect(error.code).toBe(ERROR_CODE.PARENT_DELETED);
  });

  it('rejects a code already used in the shop', async () => {
    await service.create(SHOP_ID, { name: 'Clothing', category_code: 'clothing' });

    const error = await rejectAppError(service.create(SHOP_ID, { name: 'Apparel', category_code: 'clothing' }));
    const elsewhere = await service.create(OTHER_SHOP_ID, { name: 'Clothing', category_code: 'clothing' });

    expect(error.code).toBe(ERROR_CODE.DUPLICATE_CODE);
    expect(error.statusCode).toBe(409);
    expect(elsewhere.category_code).toBe('clothing');
  });

  it('keeps the code of a soft-deleted category reserved', async () => {
    const old = await service.create(SHOP_ID, { name: 'Old', category_code: 'shoes' });
    await service.delete(SHOP_ID, old.category_id);

    const error = await rejectAppError(service.create(SHOP_ID, { name: 'New', category_code: 'shoes' }));
    expect(error.code).toBe(ERROR_CODE.DUPLICATE_CODE);

    const restored = await service.restore(SHOP_ID, old.category_id);
    expect(restored.category_code).toBe('shoes');
    expect(repo.all().filter(row => row.category_code === 'shoes')).toHaveLength(1);
  });

  it('leaves nothing behind when the path patch fails', async () => {
    repo.failNext('updatePath');

    await expect(service.create(SHOP_ID, { name: 'Clothing' })).rejects.toThrow('updatePath failed');
    expect(repo.all()).toEqual([]);

    const retry = await service.create(SHOP_ID, { name: 'Clothing' });
    expect(retry).toMatchObject({ category_id: 2, path: '2/' });
    expect(repo.all().map(row => row.path)).toEqual(['2/']);
  });
});

describe('CategoryService reads', () => {
  it('builds the whole forest in display order', async () => {
    await seedCatalog(service);

    const forest = await service.getTree(SHOP_ID);

    expect(forest.map(node => node.name)).toEqual(['Clothing', 'Shoes']);
    expect(forest[0].children.map(node => node.name)).toEqual(['Pants', 'Shirts']);
    expect(forest[0].children[0].children.map(node => node.name)).toEqual(['Jeans']);
  });

  it('builds a subtree rooted at a category', async () => {
    const { pants } = await seedCatalog(service);

    const forest = await service.getTree(SHOP_ID, { parentId: pants.category_id });

    expect(forest).toHaveLength(1);
    expect(forest[0].name).toBe('Pants');
    expect(forest[0].children.map(node => node.name)).toEqual(['Jeans']);
  });

  it('hides the subtree of a hidden category', async () => {
    const { pants } = await seedCatalog(service);
    await service.toggleDisplay(SHOP_ID, pants.category_id);

    const visible = await service.getTree(SHOP_ID);
    const everything = await service.getTree(SHOP_ID, { useDisplay: false });

    expect(visible[0].children.map(node => node.name)).toEqual(['Shirts']);
    expect(everything[0].children.map(node => node.name)).toEqual(['Pants', 'Shirts']);
  });

  it('returns an empty forest for an empty shop', async () => {
    expect(await service.getTree(SHOP_ID)).toEqual([]);
  });

  it('lists descendants by depth', async () => {
    const { clothing } = await seedCatalog(service);

    const without = await service.getDescendants(SHOP_ID, clothing.category_id);
    const withSelf = await service.getDescendants(SHOP_ID, clothing.category_id, true);

    expect(without.map(row => row.name)).toEqual(['Pants', 'Shirts', 'Jeans']);
    expect(withSelf.map(row => row.name)).toEqual(['Clothing', 'Pants', 'Shirts', 'Jeans']);
  });

  it('builds a breadcrumb root first', async () => {
    const { jeans } = await seedCatalog(service);

    const breadcrumb = await service.getBreadcrumb(SHOP_ID, jeans.category_id);

    expect(breadcrumb.map(row => row.name)).toEqual(['Clothing', 'Pants', 'Jeans']);
    expect(jeans.full_name).toBe('Clothing > Pants > Jeans');
  });

  it('lists roots, children and a depth level', async () => {
    const { clothing } = await seedCatalog(service);

    expect((await service.getRoots(SHOP_ID)).map(row => row.name)).toEqual(['Clothing', 'Shoes']);
    expect((await service.getChildren(SHOP_ID, clothing.category_id)).map(row => row.name)).toEqual([
      'Pants',
      'Shirts',
    ]);
    expect((await service.getByDepth(SHOP_ID, 2)).map(row => row.name)).toEqual(['Pants', 'Shirts']);
  });

  it('rejects a depth outside 1..4', async () => {
    const error = await rejectAppError(service.getByDepth(SHOP_ID, 5));
    expect(error.code).toBe(ERROR_CODE.INVALID_DEPTH);
  });

  it('rejects a search depth outside 1..4', async () => {
    await seedCatalog(service);

    expect((await rejectAppError(service.search(SHOP_ID, 'pan', 0))).code).toBe(ERROR_CODE.INVALID_DEPTH);
    expect((await rejectAppError(service.search(SHOP_ID, 'pan', 5))).code).toBe(ERROR_CODE.INVALID_DEPTH);
  });

  it('searches names and full names', async () => {
    await seedCatalog(service);

    const results = await service.search(SHOP_ID, 'pan');

    expect(results.map(row => row.name)).toEqual(['Pants', 'Jeans']);
    expect((await service.search(SHOP_ID, 'pan', 3)).map(row => row.name)).toEqual(['Jeans']);
  });

  it('finds by code and reports a missing one', async () => {
    await seedCatalog(service);

    expect((await service.getByCode(SHOP_ID, 'clothing')).name).toBe('Clothing');
    expect((await rejectAppError(service.getByCode(SHOP_ID, 'nope'))).code).toBe(ERROR_CODE.NOT_FOUND);
  });
});

describe('CategoryService.update', () => {
  it('renames the whole subtree', async () => {
    const { clothing, pants, jeans, shirts } = await seedCatalog(service);

    const updated = await service.update(SHOP_ID, clothing.category_id, { name: 'Apparel' });

    expect(updated.full_name).toBe('Apparel');
    expect((await service.get(SHOP_ID, pants.category_id)).full_name).toBe('Apparel > Pants');
    expect((await service.get(SHOP_ID, jeans.category_id)).full_name).toBe('Apparel > Pants > Jeans');
    expect((await service.get(SHOP_ID, shirts.category_id)).full_name).toBe('Apparel > Shirts');
  });

  it('renames a middle node using its ancestors', async () => {
    const { pants, jeans } = await seedCatalog(service);

    const updated = await service.update(SHOP_ID, pants.category_id, { name: 'Trousers' });

    expect(updated.full_name).toBe('Clothing > Trousers');
    expect((await service.get(SHOP_ID, jeans.category_id)).full_name).toBe('Clothing > Trousers > Jeans');
  });

  it('rolls the rename back when a descendant update fails', async () => {
    const { clothing, pants } = await seedCatalog(service);
    repo.failNext('updateFullName');

    await expect(service.update(SHOP_ID, clothing.category_id, { name: 'Apparel' })).rejects.toThrow(
      'updateFullName failed'
    );

    expect((await service.get(SHOP_ID, clothing.category_id)).name).toBe('Clothing');
    expect((await service.get(SHOP_ID, pants.category_id)).full_name).toBe('Clothing > Pants');
  });

  it('updates other fields without touching paths', async () => {
    const { pants } = await seedCatalog(service);

    const updated = await service.update(SHOP_ID, pants.category_id, {
      description: 'All kinds of pants',
      hash_tags: ['denim'],
      display_order: 7,
    });

    expect(updated).toMatchObject({
      path: '1/2/',
      full_name: 'Clothing > Pants',
      description: 'All kinds of pants',
      hash_tags: ['denim'],
      display_order: 7,
    });
  });

  it('rejects a code held by another category', async () => {
    const { pants } = await seedCatalog(service);

    const error = await rejectAppError(service.update(SHOP_ID, pants.category_id, { category_code: 'clothing' }));

    expect(error.code).toBe(ERROR_CODE.DUPLICATE_CODE);
  });

  it('rejects updating a deleted category', async () => {
    const { shoes } = await seedCatalog(service);
    await service.delete(SHOP_ID, shoes.category_id);

    const error = await rejectAppError(service.update(SHOP_ID, shoes.category_id, { name: 'Boots' }));

    expect(error.code).toBe(ERROR_CODE.ALREADY_DELETED);
  });
});

describe('CategoryService delete and restore', () => {
  it('refuses to delete a category with children in either mode', async () => {
    const { clothing } = await seedCatalog(service);

    const soft = await rejectAppError(service.delete(SHOP_ID, clothing.category_id));
    const hard = await rejectAppError(service.delete(SHOP_ID, clothing.category_id, true));

    expect(soft.code).toBe(ERROR_CODE.HAS_CHILDREN);
    expect(hard.code).toBe(ERROR_CODE.HAS_CHILDREN);
    expect(soft.details).toEqual({ childCount: 2 });
  });

  it('counts soft-deleted children', async () => {
    const { pants, jeans } = await seedCatalog(service);
    await service.delete(SHOP_ID, jeans.category_id);

    const error = await rejectAppError(service.delete(SHOP_ID, pants.category_id));

    expect(error.code).toBe(ERROR_CODE.HAS_CHILDREN);
  });

  it('refuses to delete a category with products', async () => {
    const { shoes } = await seedCatalog(service);
    await service.adjustProductCount(SHOP_ID, shoes.category_id, 3);

    const error = await rejectAppError(service.delete(SHOP_ID, shoes.category_id));

    expect(error.code).toBe(ERROR_CODE.HAS_PRODUCTS);
    expect(error.details).toEqual({ productCount: 3 });
  });

  it('soft deletes, hides and restores a leaf', async () => {
    const { shoes } = await seedCatalog(service);

    const deleted = await service.delete(SHOP_ID, shoes.category_id);
    expect(deleted.deleted_at).toBeInstanceOf(Date);
    expect((await service.getRoots(SHOP_ID)).map(row => row.name)).toEqual(['Clothing']);
    expect((await rejectAppError(service.delete(SHOP_ID, shoes.category_id))).code).toBe(ERROR_CODE.ALREADY_DELETED);

    const restored = await service.restore(SHOP_ID, shoes.category_id);
    expect(restored.deleted_at).toBeNull();
    expect((await service.getRoots(SHOP_ID)).map(row => row.name)).toEqual(['Clothing', 'Shoes']);
    expect((await rejectAppError(service.restore(SHOP_ID, shoes.category_id))).code).toBe(ERROR_CODE.ALREADY_ACTIVE);
  });

  it('hard deletes a leaf', async () => {
    const { jeans } = await seedCatalog(service);

    const removed = await service.delete(SHOP_ID, jeans.category_id, true);

    expect(removed.name).toBe('Jeans');
    expect((await rejectAppError(service.get(SHOP_ID, jeans.category_id))).code).toBe(ERROR_CODE.NOT_FOUND);
  });
});

describe('CategoryService counters and display', () => {
  it('never lets the product count go below zero', async () => {
    const { shoes } = await seedCatalog(service);

    await service.adjustProductCount(SHOP_ID, shoes.category_id, 3);
    const updated = await service.adjustProductCount(SHOP_ID, shoes.category_id, -10);

    expect(updated.product_count).toBe(0);
  });

  it('flips visibility', async () => {
    const { shoes } = await seedCatalog(service);

    expect((await service.toggleDisplay(SHOP_ID, shoes.category_id)).use_display).toBe(false);
    expect((await service.toggleDisplay(SHOP_ID, shoes.category_id)).use_display).toBe(true);
  });
});

describe('buildFullName', () => {
  it('joins ancestor names with " > "', () => {
    expect(buildFullName([{ name: 'Clothing' }, { name: 'Pants' }], 'Jeans')).toBe('Clothing > Pants > Jeans');
    expect(buildFullName([], 'Clothing')).toBe('Clothing');
  });
});
