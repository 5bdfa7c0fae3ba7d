import { Pool, PoolClient, PoolConfig } from 'pg';
import { ConflictError, InvalidValueError, LockTimeoutError, NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

const config: PoolConfig = {
     connectionString: process.env.DATABASE_URL,
     // In test mode, use minimal connections and short timeouts
     min: process.env.NODE_ENV === 'test' ? 0 : parseInt(process.env.DB_POOL_MIN || '2', 10),
     max: process.env.NODE_ENV === 'test' ? 2 : parseInt(process.env.DB_POOL_MAX || '10', 10),
     idleTimeoutMillis:
          process.env.NODE_ENV === 'test'
               ? 100
               : parseInt(process.env.DB_IDLE_TIMEOUT_MS || '10000', 10),
     connectionTimeoutMillis: parseInt(process.env.DB_CONNECTION_TIMEOUT_MS || '5000', 10),
};
export const pool = new Pool(config);

// Log pool errors
pool.on('error', (err) => {
     logger.error({ err }, 'Unexpected PostgreSQL pool error');
});

export interface TransactionOptions {
     /** Upper bound on any row-lock wait inside the transaction */
     lockTimeoutMs?: number;
}

const LOCK_NOT_AVAILABLE = '55P03';
const DEADLOCK_DETECTED = '40P01';
const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';
// SQLSTATE class 22: bad dates, out-of-range numbers and similar input
const DATA_EXCEPTION_CLASS = '22';

/**
 * Maps PostgreSQL failures the caller can act on to domain errors
 */
export function translateDatabaseError(err: unknown): unknown {
     if (typeof err !== 'object' || err === null || !('code' in err)) {
          return err;
     }

     if (typeof err.code === 'string' && err.code.startsWith(DATA_EXCEPTION_CLASS)) {
          const detail = 'message' in err && typeof err.message === 'string' ? err.message : err.code;
          return new InvalidValueError(`Invalid value: ${detail}`);
     }

     const constraint =
          'constraint' in err && typeof err.constraint === 'string' ? err.constraint : undefined;

     switch (err.code) {
          case LOCK_NOT_AVAILABLE:
               return new LockTimeoutError('Timed out waiting for a stock row lock');
          case DEADLOCK_DETECTED:
               return new LockTimeoutError('Stock update aborted by a deadlock, retry the operation');
          case UNIQUE_VIOLATION:
               return new ConflictError(
                    constraint ? `Duplicate value violates ${constraint}` : 'Duplicate value',
                    constraint
               );
          case FOREIGN_KEY_VIOLATION:
               return new NotFoundError('Referenced record', constraint ?? 'unknown');
          default:
               return err;
     }
}

// Connection health check
export async function checkConnection(): Promise<boolean> {
     try {
          const client = await pool.connect();
          await client.query('SELECT 1');
          client.release();
          return true;
     } catch (error) {
          logger.error({ error }, 'Database connection check failed');
          return false;
     }
}

// Transaction helper
export async function withTransaction<T>(
     fn: (client: PoolClient) => Promise<T>,
     options: TransactionOptions = {}
): Promise<T> {
     const client = await pool.connect();
     try {
          await client.query('BEGIN');
          if (options.lockTimeoutMs !== undefined) {
               await client.query(`SELECT set_config('lock_timeout', $1, true)`, [
                    `${options.lockTimeoutMs}ms`,
               ]);
          }
          const result = await fn(client);
          await client.query('COMMIT');
          return result;
     } catch (err) {
          await client.query('ROLLBACK');
          throw translateDatabaseError(err);
     } finally {
          client.release();
     }
}

// Connection helper for non-transactional queries
export async function withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
     const client = await pool.connect();
     try {
          return await fn(client);
     } catch (err) {
          throw translateDatabaseError(err);
     } finally {
          client.release();
     }
}

// Graceful shutdown
export async function closePool(): Promise<void> {
     await pool.end();
     logger.info('Database pool closed');
}

// Handle shutdown signals (disabled in test mode)
if (process.env.NODE_ENV !== 'test') {
     process.on('SIGINT', async () => {
          await closePool();
          process.exit(0);
     });

     process.on('SIGTERM', async () => {
          await closePool();
          process.exit(0);
     });
}
