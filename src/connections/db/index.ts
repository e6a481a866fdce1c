export { pool, connectDatabase, withTransaction } from './connection';
export type { Queryable } from './connection';
export { migrate, rollback } from './migrate';
