import { PoolClient } from 'pg';
import { LockOptions, StockAlertRepository } from '../repositories';
import { NewStockAlert, StockAlert, StockAlertStatus } from '../../types/stock.types';
import { toNumber } from '../../utils/money';

interface StockAlertRow {
     id: string | number;
     stock_ledger_id: string | number;
     item_id: string | number;
     warehouse_id: string | number;
     current_quantity: number;
     min_quantity: number;
     status: StockAlertStatus;
     message: string;
     created_at: Date;
     acknowledged_at: Date | null;
     resolved_at: Date | null;
}

const SELECT_ALERT = `
      SELECT
        id,
        stock_ledger_id,
        item_id,
        warehouse_id,
        current_quantity,
        min_quantity,
        status,
        message,
        created_at,
        acknowledged_at,
        resolved_at
      FROM stock_alert`;

function mapAlert(row: StockAlertRow): StockAlert {
     return {
          id: toNumber(row.id),
          stockLedgerId: toNumber(row.stock_ledger_id),
          itemId: toNumber(row.item_id),
          warehouseId: toNumber(row.warehouse_id),
          currentQuantity: toNumber(row.current_quantity),
          minQuantity: toNumber(row.min_quantity),
          status: row.status,
          message: row.message,
          createdAt: row.created_at,
          acknowledgedAt: row.acknowledged_at,
          resolvedAt: row.resolved_at,
     };
}

export class PgStockAlertRepository implements StockAlertRepository {
     constructor(private readonly client: PoolClient) {}

     async findPending(stockLedgerId: number): Promise<StockAlert | null> {
          const { rows } = await this.client.query<StockAlertRow>(
               `${SELECT_ALERT}
      WHERE stock_ledger_id = $1 AND status = 'PENDING'
      FOR UPDATE
    `,
               [stockLedgerId]
          );
          return rows.length > 0 ? mapAlert(rows[0]) : null;
     }

     async insert(alert: NewStockAlert): Promise<StockAlert | null> {
          // The partial unique index on pending alerts turns a concurrent duplicate into a no-op
          const { rows } = await this.client.query<StockAlertRow>(
               `
      INSERT INTO stock_alert (
        stock_ledger_id,
        item_id,
        warehouse_id,
        current_quantity,
        min_quantity,
        status,
        message
      ) VALUES ($1, $2, $3, $4, $5, $6, $7)
      ON CONFLICT (stock_ledger_id) WHERE status = 'PENDING' DO NOTHING
      RETURNING
        id,
        stock_ledger_id,
        item_id,
        warehouse_id,
        current_quantity,
        min_quantity,
        status,
        message,
        created_at,
        acknowledged_at,
        resolved_at
    `,
               [
                    alert.stockLedgerId,
                    alert.itemId,
                    alert.warehouseId,
                    alert.currentQuantity,
                    alert.minQuantity,
                    alert.status,
                    alert.message,
               ]
          );
          return rows.length > 0 ? mapAlert(rows[0]) : null;
     }

     async update(alert: StockAlert): Promise<void> {
          await this.client.query(
               `
      UPDATE stock_alert
      SET current_quantity = $1,
          min_quantity = $2,
          message = $3,
          status = $4,
          acknowledged_at = $5,
          resolved_at = $6
      WHERE id = $7
    `,
               [
                    alert.currentQuantity,
                    alert.minQuantity,
                    alert.message,
                    alert.status,
                    alert.acknowledgedAt,
                    alert.resolvedAt,
                    alert.id,
               ]
          );
     }

     async findById(id: number, options: LockOptions = {}): Promise<StockAlert | null> {
          const { rows } = await this.client.query<StockAlertRow>(
               `${SELECT_ALERT}
      WHERE id = $1
      ${options.forUpdate ? 'FOR UPDATE' : ''}
    `,
               [id]
          );
          return rows.length > 0 ? mapAlert(rows[0]) : null;
     }

     async listPending(warehouseId?: number): Promise<StockAlert[]> {
          const { rows } = await this.client.query<StockAlertRow>(
               `${SELECT_ALERT}
      WHERE status = 'PENDING'
        AND ($1::bigint IS NULL OR warehouse_id = $1)
      ORDER BY created_at DESC
    `,
               [warehouseId ?? null]
          );
          return rows.map(mapAlert);
     }
}
