import { FastifyInstance } from 'fastify';
import { StockEngine } from '@spareline/shared/src/services/stock-engine';
import type {
     PurchaseLinePatch,
     PurchaseOrderDraft,
     ReceiptLine,
} from '@spareline/shared/src/types/stock.types';
import {
     cancelPurchaseOrderSchema,
     createPurchaseOrderSchema,
     getPurchaseOrderSchema,
     receivePurchaseOrderSchema,
     recordReceiptSchema,
     updatePurchaseLineSchema,
} from '../schemas/purchase-orders.schemas';
import { sendError } from './errors';

interface OrderParams {
     id: number;
}

export async function registerPurchaseOrderRoutes(
     app: FastifyInstance,
     options: { engine: StockEngine }
) {
     const { engine } = options;

     app.post<{ Body: PurchaseOrderDraft }>(
          '/',
          { schema: createPurchaseOrderSchema },
          async (request, reply) => {
               try {
                    const order = await engine.createPurchaseOrder(request.body);
                    return reply.code(201).send(order);
               } catch (error) {
                    return sendError(reply, error, 'Failed to create purchase order');
               }
          }
     );

     app.get<{ Params: OrderParams }>(
          '/:id',
          { schema: getPurchaseOrderSchema },
          async (request, reply) => {
               try {
                    return reply.send(await engine.getPurchaseOrder(request.params.id));
               } catch (error) {
                    return sendError(reply, error, 'Failed to get purchase order');
               }
          }
     );

     app.patch<{ Params: OrderParams & { lineId: number }; Body: PurchaseLinePatch }>(
          '/:id/lines/:lineId',
          { schema: updatePurchaseLineSchema },
          async (request, reply) => {
               try {
                    const { id, lineId } = request.params;
                    return reply.send(await engine.updatePurchaseLine(id, lineId, request.body));
               } catch (error) {
                    return sendError(reply, error, 'Failed to update purchase line');
               }
          }
     );

     app.post<{ Params: OrderParams; Body: { receivedQuantities?: ReceiptLine[] } | undefined }>(
          '/:id/receive',
          { schema: receivePurchaseOrderSchema },
          async (request, reply) => {
               try {
                    const result = await engine.receivePurchaseOrder(
                         request.params.id,
                         request.body?.receivedQuantities
                    );
                    return reply.send(result);
               } catch (error) {
                    return sendError(reply, error, 'Failed to receive purchase order');
               }
          }
     );

     app.post<{ Params: OrderParams; Body: { lines: ReceiptLine[] } }>(
          '/:id/receipts',
          { schema: recordReceiptSchema },
          async (request, reply) => {
               try {
                    const result = await engine.recordPurchaseReceipt(request.params.id, request.body.lines);
                    return reply.send(result);
               } catch (error) {
                    return sendError(reply, error, 'Failed to record purchase receipt');
               }
          }
     );

     app.post<{ Params: OrderParams }>(
          '/:id/cancel',
          { schema: cancelPurchaseOrderSchema },
          async (request, reply) => {
               try {
                    return reply.send(await engine.cancelPurchaseOrder(request.params.id));
               } catch (error) {
                    return sendError(reply, error, 'Failed to cancel purchase order');
               }
          }
     );
}
