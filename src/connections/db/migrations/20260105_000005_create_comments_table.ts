import { Migration } from './types';

export const migration: Migration = {
  async up(db) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS comments (
        id SERIAL PRIMARY KEY,
        post_id INTEGER NOT NULL REFERENCES posts(id) ON DELETE CASCADE,
        -- Hard delete of a comment removes its whole subtree
        parent_id INTEGER REFERENCES comments(id) ON DELETE CASCADE,
        -- NULL = guest comment, authorised by password_hash
        author_id UUID REFERENCES users(id) ON DELETE SET NULL,
        content TEXT NOT NULL,
        -- 0..3, equals the number of segments in path minus one
        depth SMALLINT NOT NULL DEFAULT 0 CHECK (depth BETWEEN 0 AND 3),
        -- Ancestor ids without a trailing delimiter, e.g. '100/101/102'
        path VARCHAR(255) NOT NULL,
        order_num INTEGER NOT NULL DEFAULT 0,
        is_deleted BOOLEAN NOT NULL DEFAULT FALSE,
        password_hash VARCHAR(255),
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_comments_post_path ON comments(post_id, path text_pattern_ops)
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_comments_post_parent ON comments(post_id, parent_id)
    `);
  },

  async down(db) {
    await db.query('DROP INDEX IF EXISTS idx_comments_post_parent');
    await db.query('DROP INDEX IF EXISTS idx_comments_post_path');
    await db.query('DROP TABLE IF EXISTS comments CASCADE');
  },
};
