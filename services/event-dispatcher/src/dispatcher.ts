import type { PoolClient } from 'pg';
import { withTransaction } from '@spareline/shared/src/db/client';
import { publishEvent, STOCK_EVENTS_EXCHANGE, stockRoutingKey } from '@spareline/shared/src/messaging/client';
import { logger } from '@spareline/shared/src/utils/logger';

export interface OutboxEventRow {
     id: string | number;
     type: string;
     payload: Record<string, unknown>;
     created_at: Date;
}

export type EventPublisher = (
     routingKey: string,
     payload: Record<string, unknown>,
     messageId: string
) => Promise<void>;

export type TransactionFn = <T>(fn: (client: PoolClient) => Promise<T>) => Promise<T>;

export interface EventDispatcherOptions {
     batchSize?: number;
     pollIntervalMs?: number;
     publish?: EventPublisher;
     transaction?: TransactionFn;
}

export const publishToStockExchange: EventPublisher = (routingKey, payload, messageId) =>
     publishEvent(STOCK_EVENTS_EXCHANGE, routingKey, payload, { messageId });

/**
 * Relays PENDING rows of the domain_event outbox to the stock.events exchange
 */
export class EventDispatcher {
     private running = false;
     private readonly batchSize: number;
     private readonly pollIntervalMs: number;
     private readonly publish: EventPublisher;
     private readonly transaction: TransactionFn;

     constructor(options: EventDispatcherOptions = {}) {
          this.batchSize = options.batchSize ?? parseInt(process.env.EVENT_BATCH_SIZE || '100', 10);
          this.pollIntervalMs =
               options.pollIntervalMs ?? parseInt(process.env.EVENT_POLL_INTERVAL_MS || '200', 10);
          this.publish = options.publish ?? publishToStockExchange;
          this.transaction = options.transaction ?? ((fn) => withTransaction(fn));
     }

     async start(): Promise<void> {
          this.running = true;
          logger.info(
               { batchSize: this.batchSize, pollIntervalMs: this.pollIntervalMs },
               'Starting event dispatcher'
          );

          while (this.running) {
               try {
                    await this.processBatch();
               } catch (err) {
                    logger.error({ err }, 'Error processing event batch');
               }

               await this.sleep(this.pollIntervalMs);
          }
     }

     /**
      * Returns the number of events published in this batch
      */
     async processBatch(): Promise<number> {
          return this.transaction(async (client) => {
               const { rows: events } = await client.query<OutboxEventRow>(
                    `
        SELECT id, type, payload, created_at
        FROM domain_event
        WHERE status = 'PENDING'
        ORDER BY created_at, id
        LIMIT $1
        FOR UPDATE SKIP LOCKED
      `,
                    [this.batchSize]
               );

               if (events.length === 0) {
                    return 0;
               }

               logger.debug({ eventCount: events.length }, 'Processing event batch');

               let sent = 0;
               for (const event of events) {
                    const eventId = String(event.id);
                    try {
                         await this.publish(stockRoutingKey(event.type), event.payload, eventId);

                         await client.query(
                              `
            UPDATE domain_event
            SET status = 'SENT', updated_at = NOW()
            WHERE id = $1
          `,
                              [event.id]
                         );
                         sent++;

                         logger.debug({ eventId, type: event.type }, 'Event dispatched');
                    } catch (err) {
                         logger.error({ err, eventId, type: event.type }, 'Failed to dispatch event');

                         await client.query(
                              `
            UPDATE domain_event
            SET status = 'FAILED',
                updated_at = NOW(),
                retry_count = retry_count + 1,
                error = $2
            WHERE id = $1
          `,
                              [event.id, err instanceof Error ? err.message : 'Unknown error']
                         );
                    }
               }

               logger.info({ dispatched: sent, failed: events.length - sent }, 'Event batch processed');
               return sent;
          });
     }

     stop(): void {
          logger.info('Stopping event dispatcher');
          this.running = false;
     }

     private sleep(ms: number): Promise<void> {
          return new Promise((resolve) => setTimeout(resolve, ms));
     }
}
