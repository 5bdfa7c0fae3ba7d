import { PoolClient } from 'pg';
import { PgAccountingRepository } from '@spareline/shared/src/repositories/pg/pg-accounting-repository';
import { PgDomainEventRepository } from '@spareline/shared/src/repositories/pg/pg-domain-event-repository';
import { PgStockAlertRepository } from '@spareline/shared/src/repositories/pg/pg-stock-alert-repository';
import {
     PgStockLedgerRepository,
     sortStockKeys,
} from '@spareline/shared/src/repositories/pg/pg-stock-ledger-repository';

const ledgerRow = {
     id: '11',
     item_id: '2',
     warehouse_id: '1',
     item_name: 'Brake Pad Set',
     warehouse_name: 'Main Warehouse',
     quantity: 100,
     reserved_quantity: 10,
     available_quantity: 90,
     min_quantity: 20,
     max_quantity: null,
     average_cost: '12.5000',
     last_restocked_at: null,
};

describe('PostgreSQL repositories (Unit)', () => {
     let mockClient: jest.Mocked<PoolClient>;

     beforeEach(() => {
          mockClient = {
               query: jest.fn(),
          } as unknown as jest.Mocked<PoolClient>;
     });

     function sqlOf(call: number): string {
          return String(mockClient.query.mock.calls[call][0]);
     }

     describe('sortStockKeys', () => {
          it('should order by item then warehouse and drop duplicates', () => {
               expect(
                    sortStockKeys([
                         { itemId: 5, warehouseId: 2 },
                         { itemId: 3, warehouseId: 9 },
                         { itemId: 5, warehouseId: 1 },
                         { itemId: 3, warehouseId: 9 },
                    ])
               ).toEqual([
                    { itemId: 3, warehouseId: 9 },
                    { itemId: 5, warehouseId: 1 },
                    { itemId: 5, warehouseId: 2 },
               ]);
          });
     });

     describe('PgStockLedgerRepository', () => {
          it('should lock rows in key order with FOR UPDATE', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [ledgerRow] } as never);
               const repo = new PgStockLedgerRepository(mockClient);

               const levels = await repo.lockForUpdate([
                    { itemId: 4, warehouseId: 1 },
                    { itemId: 2, warehouseId: 1 },
               ]);

               expect(sqlOf(0)).toContain('FOR UPDATE OF s');
               expect(sqlOf(0)).toContain('ORDER BY s.item_id, s.warehouse_id');
               expect(mockClient.query.mock.calls[0][1]).toEqual([
                    [2, 4],
                    [1, 1],
               ]);
               expect(levels).toEqual([
                    {
                         id: 11,
                         itemId: 2,
                         warehouseId: 1,
                         itemName: 'Brake Pad Set',
                         warehouseName: 'Main Warehouse',
                         quantity: 100,
                         reservedQuantity: 10,
                         availableQuantity: 90,
                         minQuantity: 20,
                         maxQuantity: null,
                         averageCost: 12.5,
                         lastRestockedAt: null,
                    },
               ]);
          });

          it('should not query when there is nothing to lock', async () => {
               const repo = new PgStockLedgerRepository(mockClient);

               expect(await repo.lockForUpdate([])).toEqual([]);
               expect(mockClient.query).not.toHaveBeenCalled();
          });

          it('should insert a missing row without failing on an existing one', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);
               const repo = new PgStockLedgerRepository(mockClient);

               await repo.insertIfMissing({ itemId: 2, warehouseId: 1 });

               expect(sqlOf(0)).toContain('ON CONFLICT (item_id, warehouse_id) DO NOTHING');
               expect(mockClient.query.mock.calls[0][1]).toEqual([2, 1]);
          });

          it('should store a null unit cost for movements without one', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);
               const repo = new PgStockLedgerRepository(mockClient);

               await repo.recordMovement({
                    stockLedgerId: 11,
                    type: 'RESERVE',
                    quantityDelta: 0,
                    reservedDelta: 5,
                    referenceId: 'sales_order:3',
               });

               expect(mockClient.query.mock.calls[0][1]).toEqual([11, 'RESERVE', 0, 5, null, 'sales_order:3']);
          });

          it('should pass a null warehouse filter when none is given', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);
               const repo = new PgStockLedgerRepository(mockClient);

               await repo.listLowStock();

               expect(sqlOf(0)).toContain('s.quantity <= s.min_quantity');
               expect(mockClient.query.mock.calls[0][1]).toEqual([null]);
          });

          it('should list every warehouse row of one item', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [ledgerRow] } as never);
               const repo = new PgStockLedgerRepository(mockClient);

               const levels = await repo.listByItem(2);

               expect(sqlOf(0)).toContain('WHERE s.item_id = $1');
               expect(sqlOf(0)).toContain('ORDER BY w.name');
               expect(mockClient.query.mock.calls[0][1]).toEqual([2]);
               expect(levels.map((l) => [l.warehouseName, l.availableQuantity])).toEqual([['Main Warehouse', 90]]);
          });
     });

     describe('PgStockAlertRepository', () => {
          it('should return null when a pending alert already exists', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);
               const repo = new PgStockAlertRepository(mockClient);

               const created = await repo.insert({
                    stockLedgerId: 11,
                    itemId: 2,
                    warehouseId: 1,
                    currentQuantity: 5,
                    minQuantity: 20,
                    status: 'PENDING',
                    message: 'low',
               });

               expect(created).toBeNull();
               expect(sqlOf(0)).toContain(
                    "ON CONFLICT (stock_ledger_id) WHERE status = 'PENDING' DO NOTHING"
               );
          });

          it('should persist the refreshed quantities and status', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);
               const repo = new PgStockAlertRepository(mockClient);
               const acknowledgedAt = new Date('2024-03-05T10:00:00Z');

               await repo.update({
                    id: 8,
                    stockLedgerId: 11,
                    itemId: 2,
                    warehouseId: 1,
                    currentQuantity: 4,
                    minQuantity: 25,
                    status: 'ACKNOWLEDGED',
                    message: 'low',
                    createdAt: new Date('2024-03-04T10:00:00Z'),
                    acknowledgedAt,
                    resolvedAt: null,
               });

               expect(mockClient.query.mock.calls[0][1]).toEqual([
                    4,
                    25,
                    'low',
                    'ACKNOWLEDGED',
                    acknowledgedAt,
                    null,
                    8,
               ]);
          });

          it('should only lock by id when asked to', async () => {
               mockClient.query.mockResolvedValue({ rows: [] } as never);
               const repo = new PgStockAlertRepository(mockClient);

               await repo.findById(8);
               await repo.findById(8, { forUpdate: true });

               expect(sqlOf(0)).not.toContain('FOR UPDATE');
               expect(sqlOf(1)).toContain('FOR UPDATE');
          });
     });

     describe('PgAccountingRepository', () => {
          it('should parse NUMERIC sums returned as strings', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [{ total: '1250.50' }] } as never);
               const repo = new PgAccountingRepository(mockClient);

               expect(await repo.sumShippedSales('2024-01-01', '2024-01-31')).toBe(1250.5);
               expect(mockClient.query.mock.calls[0][1]).toEqual(['2024-01-01', '2024-01-31']);
          });

          it('should map an upserted report row', async () => {
               const createdAt = new Date('2024-02-01T00:00:00Z');
               mockClient.query.mockResolvedValueOnce({
                    rows: [
                         {
                              id: '3',
                              period_start: '2024-01-01',
                              period_end: '2024-01-31',
                              total_revenue: '1000.00',
                              total_cost_of_goods_sold: '600.00',
                              total_expenses: '100.00',
                              gross_profit: '400.00',
                              net_profit: '300.00',
                              created_at: createdAt,
                         },
                    ],
               } as never);
               const repo = new PgAccountingRepository(mockClient);

               const report = await repo.upsertProfitLossReport('2024-01-01', '2024-01-31', {
                    revenue: 1000,
                    cogs: 600,
                    expenses: 100,
                    grossProfit: 400,
                    netProfit: 300,
               });

               expect(sqlOf(0)).toContain('ON CONFLICT (period_start, period_end) DO UPDATE');
               expect(report).toEqual({
                    id: 3,
                    periodStart: '2024-01-01',
                    periodEnd: '2024-01-31',
                    revenue: 1000,
                    cogs: 600,
                    expenses: 100,
                    grossProfit: 400,
                    netProfit: 300,
                    createdAt,
               });
          });

          it('should total ledger debits and credits', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [{ debits: '250.00', credits: '900.25' }] } as never);
               const repo = new PgAccountingRepository(mockClient);

               expect(await repo.ledgerTotals('2024-01-01', '2024-01-31')).toEqual({
                    debits: 250,
                    credits: 900.25,
               });
          });
     });

     describe('PgDomainEventRepository', () => {
          it('should append the payload as JSON to the outbox', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);
               const repo = new PgDomainEventRepository(mockClient);

               await repo.append('StockReserved', { stockLedgerId: 11, reservedDelta: 5 });

               expect(sqlOf(0)).toContain('INSERT INTO domain_event (type, payload)');
               expect(mockClient.query.mock.calls[0][1]).toEqual([
                    'StockReserved',
                    '{"stockLedgerId":11,"reservedDelta":5}',
               ]);
          });
     });
});
