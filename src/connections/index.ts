// Database
export { pool, connectDatabase, withTransaction, migrate, rollback } from './db';
export type { Queryable } from './db';

// Config
export { appConfig, authConfig, dbConfig, logConfig } from './config';
