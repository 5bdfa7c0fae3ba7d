import { PoolClient } from 'pg';
import { ItemRepository } from '../repositories';
import { ItemStockTotal } from '../../types/stock.types';
import { toNumber } from '../../utils/money';

interface ItemStockRow {
     id: string | number;
     sku: string;
     name: string;
     reorder_level: number;
     total_quantity: string | number;
}

// SUM over INTEGER comes back as a bigint string
const SELECT_ITEM_TOTALS = `
      SELECT
        i.id,
        i.sku,
        i.name,
        i.reorder_level,
        COALESCE(SUM(s.quantity), 0) AS total_quantity
      FROM item i
      LEFT JOIN stock_ledger s ON s.item_id = i.id`;

export function mapItemStockRow(row: ItemStockRow): ItemStockTotal {
     const reorderLevel = toNumber(row.reorder_level);
     const totalQuantity = toNumber(row.total_quantity);
     return {
          itemId: toNumber(row.id),
          sku: row.sku,
          name: row.name,
          reorderLevel,
          totalQuantity,
          isLowStock: totalQuantity <= reorderLevel,
     };
}

export class PgItemRepository implements ItemRepository {
     constructor(private readonly client: PoolClient) {}

     async findStockTotal(itemId: number): Promise<ItemStockTotal | null> {
          const { rows } = await this.client.query<ItemStockRow>(
               `${SELECT_ITEM_TOTALS}
      WHERE i.id = $1
      GROUP BY i.id
    `,
               [itemId]
          );
          return rows.length > 0 ? mapItemStockRow(rows[0]) : null;
     }

     async listBelowReorderLevel(): Promise<ItemStockTotal[]> {
          const { rows } = await this.client.query<ItemStockRow>(
               `${SELECT_ITEM_TOTALS}
      WHERE i.is_active
      GROUP BY i.id
      HAVING COALESCE(SUM(s.quantity), 0) <= i.reorder_level
      ORDER BY i.name
    `
          );
          return rows.map(mapItemStockRow);
     }

     async costPrices(itemIds: number[]): Promise<Map<number, number>> {
          if (itemIds.length === 0) {
               return new Map();
          }

          const { rows } = await this.client.query<{ id: string | number; cost_price: string | number }>(
               `
      SELECT id, cost_price
      FROM item
      WHERE id = ANY($1::bigint[])
    `,
               [[...new Set(itemIds)]]
          );
          return new Map(rows.map((row) => [toNumber(row.id), toNumber(row.cost_price)]));
     }
}
