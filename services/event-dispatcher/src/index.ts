import dotenv from 'dotenv';
import { closeConnection } from '@spareline/shared/src/messaging/client';
import { logger } from '@spareline/shared/src/utils/logger';
import { EventDispatcher } from './dispatcher';

dotenv.config();

async function main() {
     const dispatcher = new EventDispatcher();

     // Graceful shutdown
     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          dispatcher.stop();
          await new Promise((resolve) => setTimeout(resolve, 1000));
          await closeConnection();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);

     await dispatcher.start();
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in event dispatcher');
     process.exit(1);
});
