import { PurchaseFulfillmentService } from '@spareline/shared/src/services/purchase-fulfillment-service';
import { StockRepositories } from '@spareline/shared/src/repositories/repositories';
import { PurchaseOrderDraft } from '@spareline/shared/src/types/stock.types';
import {
     AlreadyReceivedError,
     InvalidQuantityError,
     InvalidTransitionError,
     NotFoundError,
} from '@spareline/shared/src/utils/errors';
import { InMemoryStockStore } from '../helpers/inMemoryStore';

describe('PurchaseFulfillmentService', () => {
     let store: InMemoryStockStore;
     let service: PurchaseFulfillmentService;
     let warehouseId: number;
     let itemId: number;

     const run = <T>(fn: (repos: StockRepositories) => Promise<T>): Promise<T> => store.transaction(fn);

     function draft(overrides: Partial<PurchaseOrderDraft> = {}): PurchaseOrderDraft {
          return {
               vendorId: 1,
               orderNumber: 'PO-1001',
               orderDate: '2024-03-01',
               warehouseId,
               lines: [{ itemId, quantity: 10, unitCost: 5 }],
               ...overrides,
          };
     }

     beforeEach(() => {
          store = new InMemoryStockStore();
          service = new PurchaseFulfillmentService();
          warehouseId = store.addWarehouse('Main Warehouse');
          itemId = store.addItem('Spark Plug');
     });

     describe('createPurchaseOrder', () => {
          it('should reject an order without lines', async () => {
               await expect(run((repos) => service.createPurchaseOrder(repos, draft({ lines: [] })))).rejects.toThrow(
                    InvalidQuantityError
               );
          });

          it('should price every line and total the order from line totals', async () => {
               const otherItem = store.addItem('Air Filter');

               const order = await run((repos) =>
                    service.createPurchaseOrder(
                         repos,
                         draft({
                              lines: [
                                   { itemId, quantity: 10, unitCost: 5, freightCost: 10 },
                                   { itemId: otherItem, quantity: 4, unitCost: 2.5, customsDuty: 2 },
                              ],
                         })
                    )
               );

               expect(order.status).toBe('PENDING');
               expect(order.totalAmount).toBe(60);
               expect(order.lines.map((l) => [l.lineTotal, l.landedCostPerUnit, l.totalLandedCost])).toEqual([
                    [50, 6, 60],
                    [10, 3, 12],
               ]);
               expect(order.lines.every((l) => l.receivedQuantity === 0 && l.stockAppliedQuantity === 0)).toBe(true);
          });
     });

     describe('markReceived', () => {
          it('should apply every line to stock once', async () => {
               const order = await run((repos) => service.createPurchaseOrder(repos, draft()));

               const result = await run((repos) => service.markReceived(repos, order.id));

               expect(result.order.status).toBe('RECEIVED');
               expect(result.order.lines[0]).toMatchObject({ receivedQuantity: 10, stockAppliedQuantity: 10 });
               expect(store.stockRow(itemId, warehouseId)).toMatchObject({ quantity: 10, averageCost: 5 });
               expect(store.movements[0].referenceId).toBe(`purchase_order:${order.id}`);
          });

          it('should refuse a second receipt and leave stock alone', async () => {
               const order = await run((repos) => service.createPurchaseOrder(repos, draft()));
               await run((repos) => service.markReceived(repos, order.id));

               await expect(run((repos) => service.markReceived(repos, order.id))).rejects.toThrow(
                    AlreadyReceivedError
               );
               expect(store.stockRow(itemId, warehouseId)?.quantity).toBe(10);
          });

          it('should fail before touching stock when a line has no warehouse', async () => {
               const otherItem = store.addItem('Air Filter');
               const order = await run((repos) =>
                    service.createPurchaseOrder(
                         repos,
                         draft({
                              warehouseId: null,
                              lines: [
                                   { itemId, quantity: 10, unitCost: 5, warehouseId },
                                   { itemId: otherItem, quantity: 3, unitCost: 5 },
                              ],
                         })
                    )
               );

               await expect(run((repos) => service.markReceived(repos, order.id))).rejects.toMatchObject({
                    code: 'MISSING_WAREHOUSE',
                    itemId: otherItem,
               });
               expect(store.stockRow(itemId, warehouseId)).toBeUndefined();
          });

          it('should use the line warehouse over the order warehouse', async () => {
               const overflow = store.addWarehouse('Overflow');
               const order = await run((repos) =>
                    service.createPurchaseOrder(
                         repos,
                         draft({ lines: [{ itemId, quantity: 10, unitCost: 5, warehouseId: overflow }] })
                    )
               );

               await run((repos) => service.markReceived(repos, order.id));

               expect(store.stockRow(itemId, overflow)?.quantity).toBe(10);
               expect(store.stockRow(itemId, warehouseId)).toBeUndefined();
          });

          it('should apply only what a partial receipt left over', async () => {
               const order = await run((repos) => service.createPurchaseOrder(repos, draft()));
               const lineId = order.lines[0].id;
               await run((repos) => service.recordReceipt(repos, order.id, [{ lineId, quantity: 4 }]));

               await run((repos) => service.markReceived(repos, order.id));

               expect(store.stockRow(itemId, warehouseId)?.quantity).toBe(10);
               expect(store.movements.map((m) => m.quantityDelta)).toEqual([4, 6]);
          });

          it('should accept a short explicit quantity but not one below what is applied', async () => {
               const order = await run((repos) => service.createPurchaseOrder(repos, draft()));
               const lineId = order.lines[0].id;
               await run((repos) => service.recordReceipt(repos, order.id, [{ lineId, quantity: 4 }]));

               await expect(
                    run((repos) => service.markReceived(repos, order.id, [{ lineId, quantity: 3 }]))
               ).rejects.toThrow(`Received quantity for line ${lineId} must be between 4 and 10, got 3`);

               const result = await run((repos) => service.markReceived(repos, order.id, [{ lineId, quantity: 8 }]));
               expect(result.order.lines[0].receivedQuantity).toBe(8);
               expect(store.stockRow(itemId, warehouseId)?.quantity).toBe(8);
          });

          it('should refuse to receive a cancelled order', async () => {
               const order = await run((repos) => service.createPurchaseOrder(repos, draft()));
               await run((repos) => service.cancelPurchaseOrder(repos, order.id));

               await expect(run((repos) => service.markReceived(repos, order.id))).rejects.toThrow(
                    InvalidTransitionError
               );
          });

          it('should report an unknown order', async () => {
               await expect(run((repos) => service.markReceived(repos, 999))).rejects.toThrow(
                    'Purchase order 999 not found'
               );
          });
     });

     describe('recordReceipt', () => {
          it('should move through PARTIAL to RECEIVED', async () => {
               const order = await run((repos) => service.createPurchaseOrder(repos, draft()));
               const lineId = order.lines[0].id;

               const partial = await run((repos) => service.recordReceipt(repos, order.id, [{ lineId, quantity: 4 }]));
               expect(partial.order.status).toBe('PARTIAL');
               expect(partial.order.receivedDate).toBeNull();

               const complete = await run((repos) =>
                    service.recordReceipt(repos, order.id, [
                         { lineId, quantity: 2 },
                         { lineId, quantity: 4 },
                    ])
               );
               expect(complete.order.status).toBe('RECEIVED');
               expect(complete.order.receivedDate).toBeInstanceOf(Date);
               expect(store.stockRow(itemId, warehouseId)?.quantity).toBe(10);
          });

          it('should reject receiving more than was ordered', async () => {
               const order = await run((repos) => service.createPurchaseOrder(repos, draft()));
               const lineId = order.lines[0].id;

               await expect(
                    run((repos) => service.recordReceipt(repos, order.id, [{ lineId, quantity: 11 }]))
               ).rejects.toThrow(`Line ${lineId} would receive 11 of 10 ordered`);
          });

          it('should reject an unknown line', async () => {
               const order = await run((repos) => service.createPurchaseOrder(repos, draft()));

               await expect(
                    run((repos) => service.recordReceipt(repos, order.id, [{ lineId: 999, quantity: 1 }]))
               ).rejects.toThrow(NotFoundError);
          });
     });

     describe('cancelPurchaseOrder', () => {
          it('should cancel a pending order and ignore a repeat', async () => {
               const order = await run((repos) => service.createPurchaseOrder(repos, draft()));

               expect((await run((repos) => service.cancelPurchaseOrder(repos, order.id))).status).toBe('CANCELLED');
               expect((await run((repos) => service.cancelPurchaseOrder(repos, order.id))).status).toBe('CANCELLED');
          });

          it('should refuse to cancel once goods have arrived', async () => {
               const order = await run((repos) => service.createPurchaseOrder(repos, draft()));
               await run((repos) =>
                    service.recordReceipt(repos, order.id, [{ lineId: order.lines[0].id, quantity: 1 }])
               );

               await expect(run((repos) => service.cancelPurchaseOrder(repos, order.id))).rejects.toThrow(
                    'Cannot cancel Purchase order'
               );
          });
     });

     describe('updatePurchaseLine', () => {
          it('should reprice the line and the order total', async () => {
               const order = await run((repos) => service.createPurchaseOrder(repos, draft()));
               const lineId = order.lines[0].id;

               const updated = await run((repos) =>
                    service.updatePurchaseLine(repos, order.id, lineId, { quantity: 20, otherCosts: 40 })
               );

               expect(updated.lines[0]).toMatchObject({
                    quantity: 20,
                    lineTotal: 100,
                    landedCostPerUnit: 7,
                    totalLandedCost: 140,
               });
               expect(updated.totalAmount).toBe(100);
          });

          it('should refuse edits after a receipt', async () => {
               const order = await run((repos) => service.createPurchaseOrder(repos, draft()));
               const lineId = order.lines[0].id;
               await run((repos) => service.markReceived(repos, order.id));

               await expect(
                    run((repos) => service.updatePurchaseLine(repos, order.id, lineId, { quantity: 5 }))
               ).rejects.toThrow(InvalidTransitionError);
          });

          it('should reject an invalid quantity', async () => {
               const order = await run((repos) => service.createPurchaseOrder(repos, draft()));

               await expect(
                    run((repos) => service.updatePurchaseLine(repos, order.id, order.lines[0].id, { quantity: 0 }))
               ).rejects.toThrow(InvalidQuantityError);
          });
     });
});
