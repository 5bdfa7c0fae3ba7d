import { PoolClient } from 'pg';
import { LockOptions, PurchaseOrderRepository } from '../repositories';
import {
     NewPurchaseLine,
     NewPurchaseOrder,
     PurchaseLine,
     PurchaseOrder,
     PurchaseOrderStatus,
} from '../../types/stock.types';
import { toNullableNumber, toNumber } from '../../utils/money';

interface PurchaseOrderRow {
     id: string | number;
     vendor_id: string | number;
     order_number: string;
     order_date: string;
     status: PurchaseOrderStatus;
     warehouse_id: string | number | null;
     total_amount: string | number;
     received_date: Date | null;
     notes: string | null;
}

interface PurchaseLineRow {
     id: string | number;
     purchase_order_id: string | number;
     item_id: string | number;
     warehouse_id: string | number | null;
     quantity: number;
     received_quantity: number;
     stock_applied_quantity: number;
     unit_cost: string | number;
     freight_cost: string | number;
     customs_duty: string | number;
     other_costs: string | number;
     line_total: string | number;
     landed_cost_per_unit: string | number;
     total_landed_cost: string | number;
}

function mapLine(row: PurchaseLineRow): PurchaseLine {
     return {
          id: toNumber(row.id),
          purchaseOrderId: toNumber(row.purchase_order_id),
          itemId: toNumber(row.item_id),
          warehouseId: toNullableNumber(row.warehouse_id),
          quantity: toNumber(row.quantity),
          receivedQuantity: toNumber(row.received_quantity),
          stockAppliedQuantity: toNumber(row.stock_applied_quantity),
          unitCost: toNumber(row.unit_cost),
          freightCost: toNumber(row.freight_cost),
          customsDuty: toNumber(row.customs_duty),
          otherCosts: toNumber(row.other_costs),
          lineTotal: toNumber(row.line_total),
          landedCostPerUnit: toNumber(row.landed_cost_per_unit),
          totalLandedCost: toNumber(row.total_landed_cost),
     };
}

export class PgPurchaseOrderRepository implements PurchaseOrderRepository {
     constructor(private readonly client: PoolClient) {}

     async insert(order: NewPurchaseOrder): Promise<PurchaseOrder> {
          const { rows } = await this.client.query<{ id: string | number }>(
               `
      INSERT INTO purchase_order (
        vendor_id,
        order_number,
        order_date,
        status,
        warehouse_id,
        total_amount,
        notes
      ) VALUES ($1, $2, $3, $4, $5, $6, $7)
      RETURNING id
    `,
               [
                    order.vendorId,
                    order.orderNumber,
                    order.orderDate,
                    order.status,
                    order.warehouseId,
                    order.totalAmount,
                    order.notes,
               ]
          );
          const id = toNumber(rows[0].id);

          const lines: PurchaseLine[] = [];
          for (const line of order.lines) {
               lines.push(await this.insertLine(id, line));
          }

          return { ...order, id, lines };
     }

     async findById(id: number, options: LockOptions = {}): Promise<PurchaseOrder | null> {
          const { rows } = await this.client.query<PurchaseOrderRow>(
               `
      SELECT
        id,
        vendor_id,
        order_number,
        to_char(order_date, 'YYYY-MM-DD') AS order_date,
        status,
        warehouse_id,
        total_amount,
        received_date,
        notes
      FROM purchase_order
      WHERE id = $1
      ${options.forUpdate ? 'FOR UPDATE' : ''}
    `,
               [id]
          );

          if (rows.length === 0) {
               return null;
          }

          const { rows: lineRows } = await this.client.query<PurchaseLineRow>(
               `
      SELECT
        id,
        purchase_order_id,
        item_id,
        warehouse_id,
        quantity,
        received_quantity,
        stock_applied_quantity,
        unit_cost,
        freight_cost,
        customs_duty,
        other_costs,
        line_total,
        landed_cost_per_unit,
        total_landed_cost
      FROM purchase_line
      WHERE purchase_order_id = $1
      ORDER BY id
    `,
               [id]
          );

          const row = rows[0];
          return {
               id: toNumber(row.id),
               vendorId: toNumber(row.vendor_id),
               orderNumber: row.order_number,
               orderDate: row.order_date,
               status: row.status,
               warehouseId: toNullableNumber(row.warehouse_id),
               totalAmount: toNumber(row.total_amount),
               receivedDate: row.received_date,
               notes: row.notes,
               lines: lineRows.map(mapLine),
          };
     }

     async updateOrder(order: PurchaseOrder): Promise<void> {
          await this.client.query(
               `
      UPDATE purchase_order
      SET status = $1,
          total_amount = $2,
          received_date = $3,
          updated_at = NOW()
      WHERE id = $4
    `,
               [order.status, order.totalAmount, order.receivedDate, order.id]
          );
     }

     async updateLine(line: PurchaseLine): Promise<void> {
          await this.client.query(
               `
      UPDATE purchase_line
      SET quantity = $1,
          received_quantity = $2,
          stock_applied_quantity = $3,
          unit_cost = $4,
          freight_cost = $5,
          customs_duty = $6,
          other_costs = $7,
          line_total = $8,
          landed_cost_per_unit = $9,
          total_landed_cost = $10,
          updated_at = NOW()
      WHERE id = $11
    `,
               [
                    line.quantity,
                    line.receivedQuantity,
                    line.stockAppliedQuantity,
                    line.unitCost,
                    line.freightCost,
                    line.customsDuty,
                    line.otherCosts,
                    line.lineTotal,
                    line.landedCostPerUnit,
                    line.totalLandedCost,
                    line.id,
               ]
          );
     }

     private async insertLine(purchaseOrderId: number, line: NewPurchaseLine): Promise<PurchaseLine> {
          const { rows } = await this.client.query<{ id: string | number }>(
               `
      INSERT INTO purchase_line (
        purchase_order_id,
        item_id,
        warehouse_id,
        quantity,
        received_quantity,
        stock_applied_quantity,
        unit_cost,
        freight_cost,
        customs_duty,
        other_costs,
        line_total,
        landed_cost_per_unit,
        total_landed_cost
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
      RETURNING id
    `,
               [
                    purchaseOrderId,
                    line.itemId,
                    line.warehouseId,
                    line.quantity,
                    line.receivedQuantity,
                    line.stockAppliedQuantity,
                    line.unitCost,
                    line.freightCost,
                    line.customsDuty,
                    line.otherCosts,
                    line.lineTotal,
                    line.landedCostPerUnit,
                    line.totalLandedCost,
               ]
          );

          return { ...line, id: toNumber(rows[0].id), purchaseOrderId };
     }
}
