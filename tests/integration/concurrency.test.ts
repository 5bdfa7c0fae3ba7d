import { InsufficientStockError } from '@spareline/shared/src/utils/errors';
import { createStockFixture, salesDraft, stockItem, StockFixture } from '../helpers/testUtils';

describe('Concurrent stock operations', () => {
     let fx: StockFixture;

     beforeEach(async () => {
          fx = createStockFixture();
          await stockItem(fx.engine, fx.itemId, fx.warehouseId, 100);
     });

     it('should let exactly one of two competing orders reserve the last units', async () => {
          const results = await Promise.allSettled([
               fx.engine.createSalesOrder(
                    salesDraft(fx.warehouseId, [{ itemId: fx.itemId, quantity: 60, unitPrice: 20 }])
               ),
               fx.engine.createSalesOrder(
                    salesDraft(fx.warehouseId, [{ itemId: fx.itemId, quantity: 60, unitPrice: 20 }])
               ),
          ]);

          const fulfilled = results.filter((r) => r.status === 'fulfilled');
          const rejected = results.filter(
               (r): r is PromiseRejectedResult => r.status === 'rejected'
          );

          expect(fulfilled).toHaveLength(1);
          expect(rejected).toHaveLength(1);
          expect(rejected[0].reason).toBeInstanceOf(InsufficientStockError);
          expect(rejected[0].reason).toMatchObject({ requested: 60, available: 40 });

          const snapshot = await fx.engine.getStockSnapshot(fx.itemId, fx.warehouseId);
          expect(snapshot).toMatchObject({ quantity: 100, reserved: 60, available: 40 });
     });

     it('should never oversell under many small concurrent orders', async () => {
          const attempts = Array.from({ length: 15 }, () =>
               fx.engine.createSalesOrder(
                    salesDraft(fx.warehouseId, [{ itemId: fx.itemId, quantity: 8, unitPrice: 20 }])
               )
          );

          const results = await Promise.allSettled(attempts);
          const succeeded = results.filter((r) => r.status === 'fulfilled').length;

          // 12 x 8 = 96 fits in 100, a 13th would need 104
          expect(succeeded).toBe(12);
          const row = fx.store.stockRow(fx.itemId, fx.warehouseId);
          expect(row).toMatchObject({ quantity: 100, reservedQuantity: 96, availableQuantity: 4 });
     });

     it('should keep the ledger consistent when reservations, shipments and cancellations interleave', async () => {
          const a = await fx.engine.createSalesOrder(
               salesDraft(fx.warehouseId, [{ itemId: fx.itemId, quantity: 30, unitPrice: 20 }])
          );
          const b = await fx.engine.createSalesOrder(
               salesDraft(fx.warehouseId, [{ itemId: fx.itemId, quantity: 30, unitPrice: 20 }])
          );

          await Promise.all([
               fx.engine.shipSalesOrder(a.order.id),
               fx.engine.cancelSalesOrder(b.order.id),
               fx.engine.createSalesOrder(
                    salesDraft(fx.warehouseId, [{ itemId: fx.itemId, quantity: 20, unitPrice: 20 }])
               ),
          ]);

          const row = fx.store.stockRow(fx.itemId, fx.warehouseId);
          expect(row).toMatchObject({ quantity: 70, reservedQuantity: 20, availableQuantity: 50 });
     });
});
