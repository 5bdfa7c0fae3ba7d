import type { Channel, ConsumeMessage } from '@spareline/shared/src/messaging/client';
import { getChannel, STOCK_ALERTS_QUEUE } from '@spareline/shared/src/messaging/client';
import { LowStockAlertRaisedEvent } from '@spareline/shared/src/types/stock.types';
import { createChildLogger } from '@spareline/shared/src/utils/logger';

const log = createChildLogger({ worker: 'alert-notifier' });

export class MalformedAlertError extends Error {
     constructor(message: string) {
          super(message);
          this.name = 'MalformedAlertError';
     }
}

function isRecord(value: unknown): value is Record<string, unknown> {
     return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseAlertEvent(content: Buffer): LowStockAlertRaisedEvent {
     let payload: unknown;
     try {
          payload = JSON.parse(content.toString());
     } catch {
          throw new MalformedAlertError('Alert message is not valid JSON');
     }

     if (!isRecord(payload)) {
          throw new MalformedAlertError('Alert message must be a JSON object');
     }

     const { alertId, stockLedgerId, itemId, warehouseId, currentQuantity, minQuantity, message, timestamp } =
          payload;
     if (
          typeof alertId !== 'number' ||
          typeof stockLedgerId !== 'number' ||
          typeof itemId !== 'number' ||
          typeof warehouseId !== 'number' ||
          typeof currentQuantity !== 'number' ||
          typeof minQuantity !== 'number' ||
          typeof message !== 'string'
     ) {
          throw new MalformedAlertError('Alert message is missing required fields');
     }

     return {
          alertId,
          stockLedgerId,
          itemId,
          warehouseId,
          currentQuantity,
          minQuantity,
          message,
          timestamp: typeof timestamp === 'string' ? timestamp : new Date().toISOString(),
     };
}

/**
 * Consumes LowStockAlertRaised events and surfaces them to operators
 */
export class AlertNotifier {
     async start(prefetch: number): Promise<void> {
          log.info({ prefetch }, 'Starting alert notifier');

          const channel = await getChannel();
          await channel.prefetch(prefetch);

          await channel.consume(STOCK_ALERTS_QUEUE, (msg) => {
               if (!msg) return;
               this.handleMessage(channel, msg);
          });

          log.info('Alert notifier started');
     }

     handleMessage(channel: Pick<Channel, 'ack' | 'nack'>, msg: ConsumeMessage): void {
          try {
               this.notify(parseAlertEvent(msg.content));
               channel.ack(msg);
          } catch (err) {
               // no retry: a malformed payload stays malformed
               log.error({ err, routingKey: msg.fields.routingKey }, 'Malformed alert message, sending to DLQ');
               channel.nack(msg, false, false);
          }
     }

     notify(event: LowStockAlertRaisedEvent): void {
          log.warn(
               {
                    alertId: event.alertId,
                    itemId: event.itemId,
                    warehouseId: event.warehouseId,
                    currentQuantity: event.currentQuantity,
                    minQuantity: event.minQuantity,
               },
               event.message
          );
     }
}
