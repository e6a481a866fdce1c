import { Pool, PoolClient } from 'pg';
import { dbConfig } from '../config/database.config';
import { logger } from '../../utils/logging';

export const pool = new Pool(dbConfig);

/**
 * Anything we can run a parameterized query on: the pool or a checked-out client
 */
export type Queryable = Pick<PoolClient, 'query'>;

pool.on('error', (err: Error) => {
  logger.error('Unexpected error on idle client', { error: err.message, stack: err.stack });
  process.exit(-1);
});

/**
 * Connect to database and verify connection with retry logic
 */
export const connectDatabase = async (maxRetries: number = 10, retryDelay: number = 2000): Promise<void> => {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await pool.query('SELECT NOW()');
      logger.info('Database connected successfully');
      return;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (attempt >= maxRetries) {
        logger.error(`Database connection error after ${maxRetries} attempts`, { error: message });
        throw err;
      }
      logger.warn(`Database connection attempt ${attempt}/${maxRetries} failed, retrying in ${retryDelay}ms...`, { error: message });
      await new Promise(resolve => setTimeout(resolve, retryDelay));
    }
  }
};

/**
 * A checked-out client; release(err) destroys it instead of returning it to the pool
 */
export interface TransactionClient extends Queryable {
  release(err?: Error | boolean): void;
}

export interface ClientSource {
  connect(): Promise<TransactionClient>;
}

/**
 * Run `work` on one pooled client between BEGIN and COMMIT; ROLLBACK on any error
 */
export const withTransaction = async <T>(
  work: (client: Queryable) => Promise<T>,
  source: ClientSource = pool
): Promise<T> => {
  const client = await source.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    client.release();
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.error('Transaction rollback failed', {
        error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
      });
      client.release(rollbackError instanceof Error ? rollbackError : true);
      throw error;
    }
    client.release();
    throw error;
  }
};
