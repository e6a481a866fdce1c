// Category Model - shop_categories, one materialized-path tree per shop

export interface Category {
  shop_id: number;
  category_id: number;
  parent_id: number | null; // NULL = root category
  depth: number; // 1..4
  path: string; // '1/27/105/'
  name: string;
  full_name: string | null; // 'Clothing > Pants > Jeans'
  display_order: number;
  use_display: boolean;
  category_code: string | null; // unique per shop
  description: string | null;
  image_url: string | null;
  product_count: number;
  hash_tags: string[] | null;
  meta_keywords: string | null;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null; // Soft delete
}

export interface CreateCategoryInput {
  name: string;
  parent_id?: number | null;
  display_order?: number | null;
  use_display?: boolean;
  category_code?: string | null;
  description?: string | null;
  image_url?: string | null;
  hash_tags?: string[] | null;
  meta_keywords?: string | null;
}

// No parent_id: categories are never moved
export interface UpdateCategoryInput {
  name?: string;
  display_order?: number;
  use_display?: boolean;
  category_code?: string | null;
  description?: string | null;
  image_url?: string | null;
  hash_tags?: string[] | null;
  meta_keywords?: string | null;
}

/**
 * Row as written by phase one of creation
 */
export interface NewCategoryRecord {
  shop_id: number;
  parent_id: number | null;
  depth: number;
  path: string;
  name: string;
  full_name: string;
  display_order: number;
  use_display: boolean;
  category_code: string | null;
  description: string | null;
  image_url: string | null;
  hash_tags: string[] | null;
  meta_keywords: string | null;
}

export interface CategoryListFilter {
  useDisplay?: boolean;
  includeDeleted?: boolean;
  depth?: number;
  keyword?: string;
}

export type CategoryPatch = UpdateCategoryInput & { full_name?: string };
