import { FastifyInstance } from 'fastify';
import { StockEngine } from '@spareline/shared/src/services/stock-engine';
import type { StockThresholds } from '@spareline/shared/src/types/stock.types';
import {
     alertActionSchema,
     configureThresholdsSchema,
     getItemStockSchema,
     getStockSnapshotSchema,
     listAlertsSchema,
     listItemsBelowReorderLevelSchema,
     listStockSchema,
} from '../schemas/stock.schemas';
import { sendError } from './errors';

interface StockParams {
     itemId: number;
     warehouseId: number;
}

interface WarehouseQuery {
     warehouseId?: number;
}

export async function registerStockRoutes(app: FastifyInstance, options: { engine: StockEngine }) {
     const { engine } = options;

     app.get<{ Querystring: WarehouseQuery }>(
          '/low',
          { schema: listStockSchema('List stock rows at or below their minimum') },
          async (request, reply) => {
               try {
                    return reply.send(await engine.listLowStock(request.query.warehouseId));
               } catch (error) {
                    return sendError(reply, error, 'Failed to list low stock');
               }
          }
     );

     app.get<{ Querystring: WarehouseQuery }>(
          '/out',
          { schema: listStockSchema('List stock rows with nothing on hand') },
          async (request, reply) => {
               try {
                    return reply.send(await engine.listOutOfStock(request.query.warehouseId));
               } catch (error) {
                    return sendError(reply, error, 'Failed to list out-of-stock rows');
               }
          }
     );

     app.get<{ Params: StockParams }>(
          '/:itemId/:warehouseId',
          { schema: getStockSnapshotSchema },
          async (request, reply) => {
               try {
                    const { itemId, warehouseId } = request.params;
                    return reply.send(await engine.getStockSnapshot(itemId, warehouseId));
               } catch (error) {
                    return sendError(reply, error, 'Failed to get stock snapshot');
               }
          }
     );

     app.put<{ Params: StockParams; Body: StockThresholds }>(
          '/:itemId/:warehouseId/thresholds',
          { schema: configureThresholdsSchema },
          async (request, reply) => {
               try {
                    const { itemId, warehouseId } = request.params;
                    return reply.send(
                         await engine.configureStockThresholds(itemId, warehouseId, request.body)
                    );
               } catch (error) {
                    return sendError(reply, error, 'Failed to configure stock thresholds');
               }
          }
     );
}

export async function registerAlertRoutes(app: FastifyInstance, options: { engine: StockEngine }) {
     const { engine } = options;

     app.get<{ Querystring: WarehouseQuery }>(
          '/',
          { schema: listAlertsSchema },
          async (request, reply) => {
               try {
                    return reply.send(await engine.listPendingAlerts(request.query.warehouseId));
               } catch (error) {
                    return sendError(reply, error, 'Failed to list alerts');
               }
          }
     );

     app.post<{ Params: { id: number } }>(
          '/:id/acknowledge',
          { schema: alertActionSchema('Acknowledge a pending alert') },
          async (request, reply) => {
               try {
                    return reply.send(await engine.acknowledgeAlert(request.params.id));
               } catch (error) {
                    return sendError(reply, error, 'Failed to acknowledge alert');
               }
          }
     );

     app.post<{ Params: { id: number } }>(
          '/:id/resolve',
          { schema: alertActionSchema('Resolve an open alert') },
          async (request, reply) => {
               try {
                    return reply.send(await engine.resolveAlert(request.params.id));
               } catch (error) {
                    return sendError(reply, error, 'Failed to resolve alert');
               }
          }
     );
}

export async function registerItemRoutes(app: FastifyInstance, options: { engine: StockEngine }) {
     const { engine } = options;

     app.get(
          '/low-stock',
          { schema: listItemsBelowReorderLevelSchema },
          async (_request, reply) => {
               try {
                    return reply.send(await engine.listItemsBelowReorderLevel());
               } catch (error) {
                    return sendError(reply, error, 'Failed to list items below reorder level');
               }
          }
     );

     app.get<{ Params: { itemId: number } }>(
          '/:itemId/stock',
          { schema: getItemStockSchema },
          async (request, reply) => {
               try {
                    return reply.send(await engine.getItemStock(request.params.itemId));
               } catch (error) {
                    return sendError(reply, error, 'Failed to get item stock');
               }
          }
     );
}
