import { Migration } from './types';

export const migration: Migration = {
  async up(db) {
    await db.query(`
      CREATE EXTENSION IF NOT EXISTS "uuid-ossp";
    `);

    await db.query(`
      DO $$ BEGIN
        CREATE TYPE user_status AS ENUM ('active', 'banned', 'deleted');
      EXCEPTION
        WHEN duplicate_object THEN null;
      END $$;
    `);

    // Accounts are issued elsewhere; this table is what tokens resolve against
    await db.query(`
      CREATE TABLE IF NOT EXISTS users (
        id UUID PRIMARY KEY DEFAULT uuid_generate_v4(),
        username VARCHAR(50) UNIQUE NOT NULL,
        email VARCHAR(255) UNIQUE,
        password_hash VARCHAR(255) NOT NULL,
        status user_status DEFAULT 'active',
        role VARCHAR(20) DEFAULT 'customer',
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_users_role_status ON users(role, status)
    `);
  },

  async down(db) {
    await db.query('DROP INDEX IF EXISTS idx_users_role_status');
    await db.query('DROP TABLE IF EXISTS users CASCADE');
    await db.query('DROP TYPE IF EXISTS user_status CASCADE');
  },
};
