import * as dotenv from 'dotenv';
import { checkConnection } from '@spareline/shared/src/db/client';
import { PgTransactionRunner } from '@spareline/shared/src/repositories/pg/pg-transaction-runner';
import { StockEngine } from '@spareline/shared/src/services/stock-engine';
import { logger } from '@spareline/shared/src/utils/logger';
import { buildApp } from './app';

// Load environment variables
dotenv.config();

const PORT = parseInt(process.env.STOCK_API_PORT || '3000', 10);
const HOST = process.env.STOCK_API_HOST || '0.0.0.0';

async function main() {
     const engine = new StockEngine(new PgTransactionRunner());
     const app = await buildApp({ engine, checkReady: checkConnection });

     try {
          await app.listen({ port: PORT, host: HOST });
          logger.info(`Stock API listening on ${HOST}:${PORT}`);
          logger.info(`OpenAPI docs available at http://${HOST}:${PORT}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          process.exit(1);
     }

     // Graceful shutdown
     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await app.close();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error');
     process.exit(1);
});
