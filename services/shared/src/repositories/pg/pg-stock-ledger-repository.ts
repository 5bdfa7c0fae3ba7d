import { PoolClient } from 'pg';
import { StockLedgerRepository } from '../repositories';
import { StockKey, StockLevel, StockMovement } from '../../types/stock.types';
import { toNullableNumber, toNumber } from '../../utils/money';

interface StockLedgerRow {
     id: string | number;
     item_id: string | number;
     warehouse_id: string | number;
     item_name: string;
     warehouse_name: string;
     quantity: number;
     reserved_quantity: number;
     available_quantity: number;
     min_quantity: number;
     max_quantity: number | null;
     average_cost: string | number;
     last_restocked_at: Date | null;
}

const SELECT_LEDGER = `
      SELECT
        s.id,
        s.item_id,
        s.warehouse_id,
        i.name AS item_name,
        w.name AS warehouse_name,
        s.quantity,
        s.reserved_quantity,
        s.available_quantity,
        s.min_quantity,
        s.max_quantity,
        s.average_cost,
        s.last_restocked_at
      FROM stock_ledger s
      JOIN item i ON i.id = s.item_id
      JOIN warehouse w ON w.id = s.warehouse_id`;

export function mapStockLedgerRow(row: StockLedgerRow): StockLevel {
     return {
          id: toNumber(row.id),
          itemId: toNumber(row.item_id),
          warehouseId: toNumber(row.warehouse_id),
          itemName: row.item_name,
          warehouseName: row.warehouse_name,
          quantity: toNumber(row.quantity),
          reservedQuantity: toNumber(row.reserved_quantity),
          availableQuantity: toNumber(row.available_quantity),
          minQuantity: toNumber(row.min_quantity),
          maxQuantity: toNullableNumber(row.max_quantity),
          averageCost: toNumber(row.average_cost),
          lastRestockedAt: row.last_restocked_at,
     };
}

/**
 * Sorted, de-duplicated keys. Every caller locks in this order so two transactions
 * touching the same rows always queue instead of deadlocking.
 */
export function sortStockKeys(keys: StockKey[]): StockKey[] {
     const unique = new Map<string, StockKey>();
     for (const key of keys) {
          unique.set(`${key.itemId}:${key.warehouseId}`, key);
     }
     return [...unique.values()].sort(
          (a, b) => a.itemId - b.itemId || a.warehouseId - b.warehouseId
     );
}

export class PgStockLedgerRepository implements StockLedgerRepository {
     constructor(private readonly client: PoolClient) {}

     async lockForUpdate(keys: StockKey[]): Promise<StockLevel[]> {
          const sorted = sortStockKeys(keys);
          if (sorted.length === 0) {
               return [];
          }

          const { rows } = await this.client.query<StockLedgerRow>(
               `${SELECT_LEDGER}
      WHERE (s.item_id, s.warehouse_id) IN (
        SELECT * FROM unnest($1::bigint[], $2::bigint[])
      )
      ORDER BY s.item_id, s.warehouse_id
      FOR UPDATE OF s
    `,
               [sorted.map((k) => k.itemId), sorted.map((k) => k.warehouseId)]
          );

          return rows.map(mapStockLedgerRow);
     }

     async insertIfMissing(key: StockKey): Promise<void> {
          await this.client.query(
               `
      INSERT INTO stock_ledger (item_id, warehouse_id)
      VALUES ($1, $2)
      ON CONFLICT (item_id, warehouse_id) DO NOTHING
    `,
               [key.itemId, key.warehouseId]
          );
     }

     async update(level: StockLevel): Promise<void> {
          await this.client.query(
               `
      UPDATE stock_ledger
      SET quantity = $1,
          reserved_quantity = $2,
          min_quantity = $3,
          max_quantity = $4,
          average_cost = $5,
          last_restocked_at = $6,
          updated_at = NOW()
      WHERE id = $7
    `,
               [
                    level.quantity,
                    level.reservedQuantity,
                    level.minQuantity,
                    level.maxQuantity,
                    level.averageCost,
                    level.lastRestockedAt,
                    level.id,
               ]
          );
     }

     async find(key: StockKey): Promise<StockLevel | null> {
          const { rows } = await this.client.query<StockLedgerRow>(
               `${SELECT_LEDGER}
      WHERE s.item_id = $1 AND s.warehouse_id = $2
    `,
               [key.itemId, key.warehouseId]
          );
          return rows.length > 0 ? mapStockLedgerRow(rows[0]) : null;
     }

     async findById(id: number): Promise<StockLevel | null> {
          const { rows } = await this.client.query<StockLedgerRow>(
               `${SELECT_LEDGER}
      WHERE s.id = $1
    `,
               [id]
          );
          return rows.length > 0 ? mapStockLedgerRow(rows[0]) : null;
     }

     async listByItem(itemId: number): Promise<StockLevel[]> {
          const { rows } = await this.client.query<StockLedgerRow>(
               `${SELECT_LEDGER}
      WHERE s.item_id = $1
      ORDER BY w.name
    `,
               [itemId]
          );
          return rows.map(mapStockLedgerRow);
     }

     async listLowStock(warehouseId?: number): Promise<StockLevel[]> {
          const { rows } = await this.client.query<StockLedgerRow>(
               `${SELECT_LEDGER}
      WHERE s.quantity <= s.min_quantity
        AND ($1::bigint IS NULL OR s.warehouse_id = $1)
      ORDER BY i.name, w.name
    `,
               [warehouseId ?? null]
          );
          return rows.map(mapStockLedgerRow);
     }

     async listOutOfStock(warehouseId?: number): Promise<StockLevel[]> {
          const { rows } = await this.client.query<StockLedgerRow>(
               `${SELECT_LEDGER}
      WHERE s.quantity = 0
        AND ($1::bigint IS NULL OR s.warehouse_id = $1)
      ORDER BY i.name, w.name
    `,
               [warehouseId ?? null]
          );
          return rows.map(mapStockLedgerRow);
     }

     async recordMovement(movement: StockMovement): Promise<void> {
          await this.client.query(
               `
      INSERT INTO stock_movement (
        stock_ledger_id,
        type,
        quantity_delta,
        reserved_delta,
        unit_cost,
        reference_id
      ) VALUES ($1, $2, $3, $4, $5, $6)
    `,
               [
                    movement.stockLedgerId,
                    movement.type,
                    movement.quantityDelta,
                    movement.reservedDelta,
                    movement.unitCost ?? null,
                    movement.referenceId,
               ]
          );
     }
}
