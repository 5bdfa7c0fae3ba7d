import { StockAlertMonitor } from '@spareline/shared/src/services/stock-alert-service';
import { NotFoundError } from '@spareline/shared/src/utils/errors';
import { logger } from '@spareline/shared/src/utils/logger';
import { createStockFixture, salesDraft, stockItem } from '../helpers/testUtils';

describe('StockEngine', () => {
     afterEach(() => {
          jest.restoreAllMocks();
     });

     it('should keep a committed reservation when alert evaluation fails', async () => {
          const alerts = new StockAlertMonitor();
          const fx = createStockFixture({ alerts });
          await stockItem(fx.engine, fx.itemId, fx.warehouseId, 20, { minQuantity: 5 });

          const failure = new Error('alert table unavailable');
          jest.spyOn(alerts, 'evaluate').mockRejectedValue(failure);
          const logError = jest.spyOn(logger, 'error');

          const result = await fx.engine.createSalesOrder(
               salesDraft(fx.warehouseId, [{ itemId: fx.itemId, quantity: 18, unitPrice: 12 }])
          );

          expect(result.stock[0]).toMatchObject({ reserved: 18, available: 2 });
          expect(fx.store.stockRow(fx.itemId, fx.warehouseId)?.reservedQuantity).toBe(18);
          expect(logError).toHaveBeenCalledWith(
               { err: failure, stockLedgerId: result.stock[0].ledgerId },
               'Stock alert evaluation failed'
          );
     });

     it('should evaluate each touched row once after the stock transaction', async () => {
          const fx = createStockFixture();
          await stockItem(fx.engine, fx.itemId, fx.warehouseId, 20);
          const before = fx.store.transactionCount;

          await fx.engine.createSalesOrder(
               salesDraft(fx.warehouseId, [
                    { itemId: fx.itemId, quantity: 2, unitPrice: 12 },
                    { itemId: fx.itemId, quantity: 3, unitPrice: 12 },
               ])
          );

          // one for the order, one for the single ledger row it touched
          expect(fx.store.transactionCount - before).toBe(2);
     });

     it('should raise an alert when a threshold is raised above the stock on hand', async () => {
          const fx = createStockFixture();
          await stockItem(fx.engine, fx.itemId, fx.warehouseId, 20);

          const snapshot = await fx.engine.configureStockThresholds(fx.itemId, fx.warehouseId, {
               minQuantity: 25,
               maxQuantity: 200,
          });

          expect(snapshot).toMatchObject({ quantity: 20, min: 25, max: 200 });
          expect(await fx.engine.listPendingAlerts()).toHaveLength(1);
          expect((await fx.engine.listLowStock()).map((l) => l.itemId)).toEqual([fx.itemId]);
     });

     it('should report a missing stock row', async () => {
          const fx = createStockFixture();

          await expect(fx.engine.getStockSnapshot(fx.itemId, fx.warehouseId)).rejects.toThrow(NotFoundError);
          await expect(fx.engine.getStockSnapshot(fx.itemId, fx.warehouseId)).rejects.toThrow(
               `Stock ledger ${fx.itemId}:${fx.warehouseId} not found`
          );
     });

     it('should list rows with nothing on hand', async () => {
          const fx = createStockFixture();
          await stockItem(fx.engine, fx.itemId, fx.warehouseId, 5);
          const { order } = await fx.engine.createSalesOrder(
               salesDraft(fx.warehouseId, [{ itemId: fx.itemId, quantity: 5, unitPrice: 12 }])
          );
          expect(await fx.engine.listOutOfStock()).toEqual([]);

          await fx.engine.shipSalesOrder(order.id);

          const out = await fx.engine.listOutOfStock(fx.warehouseId);
          expect(out.map((l) => [l.itemId, l.quantity])).toEqual([[fx.itemId, 0]]);
     });

     describe('item totals', () => {
          it('should sum an item across warehouses and list the rows behind it', async () => {
               const fx = createStockFixture();
               const eastId = fx.store.addWarehouse('East Depot');
               await stockItem(fx.engine, fx.itemId, fx.warehouseId, 30);
               await stockItem(fx.engine, fx.itemId, eastId, 20, { unitCost: 12 });

               const stock = await fx.engine.getItemStock(fx.itemId);

               expect(stock).toMatchObject({
                    itemId: fx.itemId,
                    sku: `SKU-${fx.itemId}`,
                    name: 'Brake Pad Set',
                    reorderLevel: 0,
                    totalQuantity: 50,
                    isLowStock: false,
               });
               expect(stock.levels.map((l) => [l.warehouseId, l.quantity, l.averageCost])).toEqual([
                    [eastId, 20, 12],
                    [fx.warehouseId, 30, 10],
               ]);
          });

          it('should report an unknown item', async () => {
               const fx = createStockFixture();

               await expect(fx.engine.getItemStock(9999)).rejects.toThrow('Item 9999 not found');
          });

          it('should list items at or below their reorder level', async () => {
               const fx = createStockFixture();
               const wiperId = fx.store.addItem('Wiper Blade', 6, 10);
               const filterId = fx.store.addItem('Air Filter', 8, 5);
               const beltId = fx.store.addItem('Timing Belt', 30, 4);
               await stockItem(fx.engine, fx.itemId, fx.warehouseId, 30);
               await stockItem(fx.engine, wiperId, fx.warehouseId, 8);
               await stockItem(fx.engine, beltId, fx.warehouseId, 5);

               const low = await fx.engine.listItemsBelowReorderLevel();

               expect(low.map((i) => [i.itemId, i.totalQuantity, i.reorderLevel])).toEqual([
                    [filterId, 0, 5],
                    [wiperId, 8, 10],
               ]);
               expect(low.every((i) => i.isLowStock)).toBe(true);
          });
     });

     it('should price each sales line against the item cost when reading an order', async () => {
          const fx = createStockFixture();
          const cheapId = fx.store.addItem('Cabin Filter');
          await stockItem(fx.engine, fx.itemId, fx.warehouseId, 10);
          await stockItem(fx.engine, cheapId, fx.warehouseId, 10);
          const { order } = await fx.engine.createSalesOrder(
               salesDraft(fx.warehouseId, [
                    { itemId: fx.itemId, quantity: 3, unitPrice: 50 },
                    { itemId: cheapId, quantity: 2, unitPrice: 9 },
               ])
          );

          const read = await fx.engine.getSalesOrder(order.id);

          expect(read.lines.map((l) => [l.itemId, l.marginPercentage, l.profitAmount])).toEqual([
               [fx.itemId, 25, 30],
               [cheapId, 0, 0],
          ]);
     });
});
