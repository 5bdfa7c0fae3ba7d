import { PoolClient } from 'pg';
import { LockOptions, SalesOrderRepository } from '../repositories';
import {
     NewSalesLine,
     NewSalesOrder,
     SalesLine,
     SalesOrder,
     SalesOrderStatus,
} from '../../types/stock.types';
import { toNumber } from '../../utils/money';

interface SalesOrderRow {
     id: string | number;
     client_id: string | number;
     order_number: string;
     order_date: string;
     status: SalesOrderStatus;
     warehouse_id: string | number;
     discount_amount: string | number;
     total_amount: string | number;
     notes: string | null;
     confirmed_at: Date | null;
     shipped_date: Date | null;
     delivered_date: Date | null;
     cancelled_at: Date | null;
}

interface SalesLineRow {
     id: string | number;
     sales_order_id: string | number;
     item_id: string | number;
     quantity: number;
     unit_price: string | number;
     discount_percentage: string | number;
     shipped_quantity: number;
     line_total: string | number;
}

function mapLine(row: SalesLineRow): SalesLine {
     return {
          id: toNumber(row.id),
          salesOrderId: toNumber(row.sales_order_id),
          itemId: toNumber(row.item_id),
          quantity: toNumber(row.quantity),
          unitPrice: toNumber(row.unit_price),
          discountPercentage: toNumber(row.discount_percentage),
          shippedQuantity: toNumber(row.shipped_quantity),
          lineTotal: toNumber(row.line_total),
     };
}

export class PgSalesOrderRepository implements SalesOrderRepository {
     constructor(private readonly client: PoolClient) {}

     async insert(order: NewSalesOrder): Promise<SalesOrder> {
          const { rows } = await this.client.query<{ id: string | number }>(
               `
      INSERT INTO sales_order (
        client_id,
        order_number,
        order_date,
        status,
        warehouse_id,
        discount_amount,
        total_amount,
        notes
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
      RETURNING id
    `,
               [
                    order.clientId,
                    order.orderNumber,
                    order.orderDate,
                    order.status,
                    order.warehouseId,
                    order.discountAmount,
                    order.totalAmount,
                    order.notes,
               ]
          );
          const id = toNumber(rows[0].id);

          const lines: SalesLine[] = [];
          for (const line of order.lines) {
               lines.push(await this.insertLine(id, line));
          }

          return { ...order, id, lines };
     }

     async findById(id: number, options: LockOptions = {}): Promise<SalesOrder | null> {
          const { rows } = await this.client.query<SalesOrderRow>(
               `
      SELECT
        id,
        client_id,
        order_number,
        to_char(order_date, 'YYYY-MM-DD') AS order_date,
        status,
        warehouse_id,
        discount_amount,
        total_amount,
        notes,
        confirmed_at,
        shipped_date,
        delivered_date,
        cancelled_at
      FROM sales_order
      WHERE id = $1
      ${options.forUpdate ? 'FOR UPDATE' : ''}
    `,
               [id]
          );

          if (rows.length === 0) {
               return null;
          }

          const { rows: lineRows } = await this.client.query<SalesLineRow>(
               `
      SELECT
        id,
        sales_order_id,
        item_id,
        quantity,
        unit_price,
        discount_percentage,
        shipped_quantity,
        line_total
      FROM sales_line
      WHERE sales_order_id = $1
      ORDER BY id
    `,
               [id]
          );

          const row = rows[0];
          return {
               id: toNumber(row.id),
               clientId: toNumber(row.client_id),
               orderNumber: row.order_number,
               orderDate: row.order_date,
               status: row.status,
               warehouseId: toNumber(row.warehouse_id),
               discountAmount: toNumber(row.discount_amount),
               totalAmount: toNumber(row.total_amount),
               notes: row.notes,
               confirmedAt: row.confirmed_at,
               shippedDate: row.shipped_date,
               deliveredDate: row.delivered_date,
               cancelledAt: row.cancelled_at,
               lines: lineRows.map(mapLine),
          };
     }

     async updateOrder(order: SalesOrder): Promise<void> {
          await this.client.query(
               `
      UPDATE sales_order
      SET status = $1,
          total_amount = $2,
          confirmed_at = $3,
          shipped_date = $4,
          delivered_date = $5,
          cancelled_at = $6,
          updated_at = NOW()
      WHERE id = $7
    `,
               [
                    order.status,
                    order.totalAmount,
                    order.confirmedAt,
                    order.shippedDate,
                    order.deliveredDate,
                    order.cancelledAt,
                    order.id,
               ]
          );
     }

     async insertLine(salesOrderId: number, line: NewSalesLine): Promise<SalesLine> {
          const { rows } = await this.client.query<{ id: string | number }>(
               `
      INSERT INTO sales_line (
        sales_order_id,
        item_id,
        quantity,
        unit_price,
        discount_percentage,
        shipped_quantity,
        line_total
      ) VALUES ($1, $2, $3, $4, $5, $6, $7)
      RETURNING id
    `,
               [
                    salesOrderId,
                    line.itemId,
                    line.quantity,
                    line.unitPrice,
                    line.discountPercentage,
                    line.shippedQuantity,
                    line.lineTotal,
               ]
          );

          return { ...line, id: toNumber(rows[0].id), salesOrderId };
     }

     async updateLine(line: SalesLine): Promise<void> {
          await this.client.query(
               `
      UPDATE sales_line
      SET quantity = $1,
          unit_price = $2,
          discount_percentage = $3,
          shipped_quantity = $4,
          line_total = $5,
          updated_at = NOW()
      WHERE id = $6
    `,
               [
                    line.quantity,
                    line.unitPrice,
                    line.discountPercentage,
                    line.shippedQuantity,
                    line.lineTotal,
                    line.id,
               ]
          );
     }

     async deleteLine(lineId: number): Promise<void> {
          await this.client.query(`DELETE FROM sales_line WHERE id = $1`, [lineId]);
     }
}
