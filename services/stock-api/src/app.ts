import Fastify, { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import { StockEngine } from '@spareline/shared/src/services/stock-engine';
import { registerAccountingRoutes } from './routes/accounting';
import { registerPurchaseOrderRoutes } from './routes/purchase-orders';
import { registerSalesOrderRoutes } from './routes/sales-orders';
import { registerAlertRoutes, registerItemRoutes, registerStockRoutes } from './routes/stock';

export interface StockApiOptions {
     engine: StockEngine;
     /** Readiness check, backed by the pool's connection check in production */
     checkReady: () => Promise<boolean>;
     logger?: boolean;
}

export async function buildApp(options: StockApiOptions): Promise<FastifyInstance> {
     const { engine, checkReady } = options;

     const app = Fastify({
          logger: options.logger ?? true,
          requestIdHeader: 'x-correlation-id',
          genReqId: (req) => {
               const header = req.headers['x-correlation-id'];
               return typeof header === 'string' && header.length > 0 ? header : `req-${Date.now()}`;
          },
          ajv: {
               customOptions: {
                    removeAdditional: 'all',
                    coerceTypes: true,
                    useDefaults: true,
                    strict: false,
               },
          },
     });

     // Body and parameter validation failures share the domain error shape
     app.setErrorHandler((error, request, reply) => {
          if (error.validation) {
               return reply.code(400).send({
                    error: 'VALIDATION_ERROR',
                    message: error.message,
                    details: {},
               });
          }

          const statusCode = error.statusCode ?? 500;
          if (statusCode < 500) {
               return reply.code(statusCode).send({
                    error: error.code,
                    message: error.message,
                    details: {},
               });
          }

          request.log.error({ err: error }, 'Unhandled request error');
          return reply.code(500).send({
               error: 'INTERNAL_ERROR',
               message: 'An unexpected error occurred',
          });
     });

     await app.register(cors, {
          origin: true,
     });

     await app.register(swagger, {
          openapi: {
               info: {
                    title: 'Spareline Stock API',
                    description:
                         'Stock ledger, purchase receiving, sales reservations, low-stock alerts and profit and loss',
                    version: '1.0.0',
               },
               servers: [{ url: 'http://localhost:3000', description: 'Development' }],
               tags: [
                    { name: 'stock', description: 'Stock levels and thresholds' },
                    { name: 'items', description: 'Item totals across warehouses' },
                    { name: 'purchase-orders', description: 'Purchase orders and receiving' },
                    { name: 'sales-orders', description: 'Sales orders and fulfilment' },
                    { name: 'alerts', description: 'Low-stock alerts' },
                    { name: 'accounting', description: 'Profit and loss reporting' },
                    { name: 'health', description: 'Health and readiness checks' },
               ],
          },
     });

     await app.register(swaggerUi, {
          routePrefix: '/docs',
          uiConfig: {
               docExpansion: 'list',
               deepLinking: true,
          },
     });

     app.get(
          '/health',
          {
               schema: {
                    tags: ['health'],
                    description: 'Basic health check',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ok' },
                                   timestamp: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          async () => {
               return {
                    status: 'ok',
                    timestamp: new Date().toISOString(),
               };
          }
     );

     app.get(
          '/health/ready',
          {
               schema: {
                    tags: ['health'],
                    description: 'Readiness check with dependency validation',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ready' },
                                   dependencies: {
                                        type: 'object',
                                        properties: {
                                             database: { type: 'string' },
                                        },
                                   },
                              },
                         },
                         503: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string' },
                                   error: { type: 'string' },
                              },
                         },
                    },
               },
          },
          async (_request, reply) => {
               try {
                    if (!(await checkReady())) {
                         reply.code(503);
                         return {
                              status: 'not_ready',
                              error: 'Database connection failed',
                         };
                    }

                    return {
                         status: 'ready',
                         dependencies: {
                              database: 'ok',
                         },
                    };
               } catch (error) {
                    reply.code(503);
                    return {
                         status: 'not_ready',
                         error: error instanceof Error ? error.message : 'Unknown error',
                    };
               }
          }
     );

     await app.register(registerStockRoutes, { prefix: '/stock', engine });
     await app.register(registerItemRoutes, { prefix: '/items', engine });
     await app.register(registerPurchaseOrderRoutes, { prefix: '/purchase-orders', engine });
     await app.register(registerSalesOrderRoutes, { prefix: '/sales-orders', engine });
     await app.register(registerAlertRoutes, { prefix: '/alerts', engine });
     await app.register(registerAccountingRoutes, { prefix: '/accounting', engine });

     return app;
}
