import { promises as fs } from 'fs';
import { join } from 'path';
import { pool, withTransaction } from './client';
import { logger } from '../utils/logger';

const MIGRATIONS_DIR = join(__dirname, 'migrations');

/**
 * Applies every migration in name order that is not yet recorded in schema_migration.
 * Each file runs in its own transaction together with its bookkeeping row.
 */
async function runMigrations(migrationsDir: string = MIGRATIONS_DIR): Promise<string[]> {
     const applied: string[] = [];

     try {
          await pool.query(`
      CREATE TABLE IF NOT EXISTS schema_migration (
        name VARCHAR(200) PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

          const { rows } = await pool.query<{ name: string }>('SELECT name FROM schema_migration');
          const done = new Set(rows.map((r) => r.name));

          const files = await fs.readdir(migrationsDir);
          const pending = files.filter((f) => f.endsWith('.sql') && !done.has(f)).sort();

          logger.info({ pending: pending.length, applied: done.size }, 'Running database migrations');

          for (const file of pending) {
               const sql = await fs.readFile(join(migrationsDir, file), 'utf-8');

               logger.info({ file }, 'Executing migration');
               await withTransaction(async (client) => {
                    await client.query(sql);
                    await client.query('INSERT INTO schema_migration (name) VALUES ($1)', [file]);
               });
               applied.push(file);
               logger.info({ file }, 'Migration completed');
          }

          logger.info({ count: applied.length }, 'All migrations completed successfully');
          return applied;
     } catch (err) {
          logger.error({ err }, 'Migration failed');
          throw err;
     } finally {
          await pool.end();
     }
}

// Run if executed directly
if (require.main === module) {
     runMigrations().catch((err) => {
          logger.error({ err }, 'Migration error');
          process.exit(1);
     });
}

export { runMigrations };
