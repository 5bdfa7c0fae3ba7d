import { FastifyInstance } from 'fastify';
import { StockEngine } from '@spareline/shared/src/services/stock-engine';
import type {
     SalesLineDraft,
     SalesLinePatch,
     SalesOrderDraft,
} from '@spareline/shared/src/types/stock.types';
import {
     addSalesLineSchema,
     createSalesOrderSchema,
     removeSalesLineSchema,
     salesOrderActionSchema,
     updateSalesLineSchema,
} from '../schemas/sales-orders.schemas';
import { sendError } from './errors';

interface OrderParams {
     id: number;
}

interface LineParams extends OrderParams {
     lineId: number;
}

export async function registerSalesOrderRoutes(app: FastifyInstance, options: { engine: StockEngine }) {
     const { engine } = options;

     app.post<{ Body: SalesOrderDraft }>(
          '/',
          { schema: createSalesOrderSchema },
          async (request, reply) => {
               try {
                    return reply.code(201).send(await engine.createSalesOrder(request.body));
               } catch (error) {
                    return sendError(reply, error, 'Failed to create sales order');
               }
          }
     );

     app.get<{ Params: OrderParams }>(
          '/:id',
          { schema: salesOrderActionSchema('Get a sales order with its lines') },
          async (request, reply) => {
               try {
                    return reply.send(await engine.getSalesOrder(request.params.id));
               } catch (error) {
                    return sendError(reply, error, 'Failed to get sales order');
               }
          }
     );

     app.post<{ Params: OrderParams }>(
          '/:id/confirm',
          { schema: salesOrderActionSchema('Confirm a PENDING sales order') },
          async (request, reply) => {
               try {
                    return reply.send(await engine.confirmSalesOrder(request.params.id));
               } catch (error) {
                    return sendError(reply, error, 'Failed to confirm sales order');
               }
          }
     );

     app.post<{ Params: OrderParams }>(
          '/:id/ship',
          { schema: salesOrderActionSchema('Ship a sales order out of reserved stock') },
          async (request, reply) => {
               try {
                    return reply.send(await engine.shipSalesOrder(request.params.id));
               } catch (error) {
                    return sendError(reply, error, 'Failed to ship sales order');
               }
          }
     );

     app.post<{ Params: OrderParams }>(
          '/:id/deliver',
          { schema: salesOrderActionSchema('Mark a sales order delivered') },
          async (request, reply) => {
               try {
                    return reply.send(await engine.deliverSalesOrder(request.params.id));
               } catch (error) {
                    return sendError(reply, error, 'Failed to deliver sales order');
               }
          }
     );

     app.post<{ Params: OrderParams }>(
          '/:id/cancel',
          { schema: salesOrderActionSchema('Cancel a sales order and release its reservations') },
          async (request, reply) => {
               try {
                    return reply.send(await engine.cancelSalesOrder(request.params.id));
               } catch (error) {
                    return sendError(reply, error, 'Failed to cancel sales order');
               }
          }
     );

     app.post<{ Params: OrderParams; Body: SalesLineDraft }>(
          '/:id/lines',
          { schema: addSalesLineSchema },
          async (request, reply) => {
               try {
                    return reply.code(201).send(await engine.addSalesLine(request.params.id, request.body));
               } catch (error) {
                    return sendError(reply, error, 'Failed to add sales line');
               }
          }
     );

     app.patch<{ Params: LineParams; Body: SalesLinePatch }>(
          '/:id/lines/:lineId',
          { schema: updateSalesLineSchema },
          async (request, reply) => {
               try {
                    const { id, lineId } = request.params;
                    return reply.send(await engine.updateSalesLine(id, lineId, request.body));
               } catch (error) {
                    return sendError(reply, error, 'Failed to update sales line');
               }
          }
     );

     app.delete<{ Params: LineParams }>(
          '/:id/lines/:lineId',
          { schema: removeSalesLineSchema },
          async (request, reply) => {
               try {
                    const { id, lineId } = request.params;
                    return reply.send(await engine.removeSalesLine(id, lineId));
               } catch (error) {
                    return sendError(reply, error, 'Failed to remove sales line');
               }
          }
     );
}
