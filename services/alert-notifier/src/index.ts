import dotenv from 'dotenv';
import { closeConnection } from '@spareline/shared/src/messaging/client';
import { logger } from '@spareline/shared/src/utils/logger';
import { AlertNotifier } from './notifier';

dotenv.config();

const PREFETCH = parseInt(process.env.AMQP_PREFETCH || '10', 10);

async function main() {
     const notifier = new AlertNotifier();

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await closeConnection();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);

     await notifier.start(PREFETCH);
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in alert notifier');
     process.exit(1);
});
