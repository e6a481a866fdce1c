import { Migration } from './types';

export const migration: Migration = {
  async up(db) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS shop_categories (
        shop_id INTEGER NOT NULL REFERENCES shops(id) ON DELETE CASCADE,
        category_id SERIAL,
        -- NULL = root category
        parent_id INTEGER,
        -- 1..4, equals the number of segments in path
        depth SMALLINT NOT NULL DEFAULT 1 CHECK (depth BETWEEN 1 AND 4),
        -- Ancestor ids with a trailing delimiter, e.g. '1/27/105/'
        path VARCHAR(255) NOT NULL,
        name VARCHAR(100) NOT NULL,
        -- Ancestor names joined with ' > '
        full_name VARCHAR(500),
        display_order INTEGER NOT NULL DEFAULT 0,
        use_display BOOLEAN NOT NULL DEFAULT TRUE,
        category_code VARCHAR(50),
        description TEXT,
        image_url VARCHAR(500),
        product_count INTEGER NOT NULL DEFAULT 0 CHECK (product_count >= 0),
        hash_tags JSONB,
        meta_keywords VARCHAR(255),
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        -- Soft delete
        deleted_at TIMESTAMP,
        PRIMARY KEY (shop_id, category_id),
        FOREIGN KEY (shop_id, parent_id) REFERENCES shop_categories(shop_id, category_id)
      )
    `);

    // Prefix scans: path LIKE '1/27/%'
    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_shop_categories_path ON shop_categories(shop_id, path text_pattern_ops)
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_shop_categories_parent ON shop_categories(shop_id, parent_id)
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_shop_categories_depth ON shop_categories(shop_id, depth) WHERE deleted_at IS NULL
    `);

    await db.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS uq_shop_categories_code ON shop_categories(shop_id, category_code) WHERE category_code IS NOT NULL
    `);
  },

  async down(db) {
    await db.query('DROP INDEX IF EXISTS uq_shop_categories_code');
    await db.query('DROP INDEX IF EXISTS idx_shop_categories_depth');
    await db.query('DROP INDEX IF EXISTS idx_shop_categories_parent');
    await db.query('DROP INDEX IF EXISTS idx_shop_categories_path');
    await db.query('DROP TABLE IF EXISTS shop_categories CASCADE');
  },
};
