import * as amqplib from 'amqplib';
import type { Channel, ConsumeMessage } from 'amqplib';
import { StockEventType } from '../types/stock.types';
import { logger } from '../utils/logger';

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

let connection: AmqpConnection | null = null;
let channel: Channel | null = null;

export const STOCK_EVENTS_EXCHANGE = 'stock.events';
export const STOCK_DEAD_LETTER_EXCHANGE = 'dlx.stock';
export const STOCK_ALERTS_QUEUE = 'stock.alerts';
export const STOCK_ALERTS_DLQ = 'dlq.stock.alerts';

export function stockRoutingKey(type: StockEventType | string): string {
     return `stock.${type}`;
}

async function connect(): Promise<AmqpConnection> {
     const url = process.env.AMQP_URL || 'amqp://localhost:5672';
     logger.info({ url: url.replace(/:[^:]*@/, ':****@') }, 'Connecting to RabbitMQ');

     const conn = await amqplib.connect(url);

     conn.on('error', (err) => {
          logger.error({ err }, 'RabbitMQ connection error');
     });

     conn.on('close', () => {
          logger.warn('RabbitMQ connection closed, attempting to reconnect...');
          setTimeout(() => {
               connection = null;
               channel = null;
          }, 5000);
     });

     logger.info('Connected to RabbitMQ');
     return conn;
}

export async function getChannel(): Promise<Channel> {
     if (channel) return channel;

     const conn = connection ?? (await connect());
     connection = conn;

     const ch = await conn.createChannel();

     await ch.assertExchange(STOCK_EVENTS_EXCHANGE, 'topic', { durable: true });
     await ch.assertExchange(STOCK_DEAD_LETTER_EXCHANGE, 'topic', { durable: true });

     await ch.assertQueue(STOCK_ALERTS_QUEUE, {
          durable: true,
          deadLetterExchange: STOCK_DEAD_LETTER_EXCHANGE,
          deadLetterRoutingKey: STOCK_ALERTS_DLQ,
     });
     await ch.assertQueue(STOCK_ALERTS_DLQ, { durable: true });

     await ch.bindQueue(STOCK_ALERTS_QUEUE, STOCK_EVENTS_EXCHANGE, stockRoutingKey('LowStockAlertRaised'));
     await ch.bindQueue(STOCK_ALERTS_DLQ, STOCK_DEAD_LETTER_EXCHANGE, STOCK_ALERTS_DLQ);

     logger.info('RabbitMQ channel created and configured');

     channel = ch;
     return ch;
}

export interface PublishOptions {
     messageId?: string;
}

export async function publishEvent(
     exchange: string,
     routingKey: string,
     payload: Record<string, unknown>,
     options: PublishOptions = {}
): Promise<void> {
     const ch = await getChannel();
     const content = Buffer.from(JSON.stringify(payload));

     ch.publish(exchange, routingKey, content, {
          persistent: true,
          contentType: 'application/json',
          timestamp: Date.now(),
          messageId: options.messageId,
     });
}

export async function closeConnection(): Promise<void> {
     if (channel) {
          await channel.close();
          channel = null;
     }
     if (connection) {
          await connection.close();
          connection = null;
     }
     logger.info('RabbitMQ connection closed');
}

// Handle shutdown signals (disabled in test mode)
if (process.env.NODE_ENV !== 'test') {
     process.on('SIGINT', async () => {
          await closeConnection();
     });

     process.on('SIGTERM', async () => {
          await closeConnection();
     });
}

export type { Channel, ConsumeMessage };
