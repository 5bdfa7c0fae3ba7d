// Global teardown - close the database pool after all tests
export default async function globalTeardown() {
     process.env.NODE_ENV = 'test';
     process.env.LOG_LEVEL = 'silent';
     const { pool } = await import('./services/shared/src/db/client');
     await pool.end();
}
