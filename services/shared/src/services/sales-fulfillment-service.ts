import { StockRepositories } from '../repositories/repositories';
import {
     FulfillmentResult,
     LineProfit,
     NewSalesLine,
     SalesLine,
     SalesLineDraft,
     SalesLinePatch,
     SalesOrder,
     SalesOrderDraft,
     SalesOrderView,
     StockKey,
     StockLevel,
} from '../types/stock.types';
import {
     InsufficientStockError,
     InvalidQuantityError,
     InvalidTransitionError,
     MissingWarehouseError,
     NotFoundError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { round2 } from '../utils/money';
import { StockLedgerService, stockKeyOf } from './stock-ledger-service';

export function salesLineTotal(quantity: number, unitPrice: number, discountPercentage: number): number {
     const subtotal = quantity * unitPrice;
     return round2(subtotal - subtotal * (discountPercentage / 100));
}

export function salesOrderTotal(lines: Array<{ lineTotal: number }>, discountAmount: number): number {
     const sum = lines.reduce((total, line) => total + line.lineTotal, 0);
     return Math.max(0, round2(sum - discountAmount));
}

/**
 * Margin over the item's cost price; zero when the item has no cost price
 */
export function lineProfit(line: Pick<SalesLine, 'quantity' | 'unitPrice'>, itemCostPrice: number): LineProfit {
     if (itemCostPrice <= 0) {
          return { marginPercentage: 0, profitAmount: 0 };
     }

     const profitPerUnit = line.unitPrice - itemCostPrice;
     return {
          marginPercentage: round2((profitPerUnit / itemCostPrice) * 100),
          profitAmount: round2(profitPerUnit * line.quantity),
     };
}

function validateLine(line: SalesLineDraft | SalesLine): void {
     if (!Number.isInteger(line.quantity) || line.quantity <= 0) {
          throw new InvalidQuantityError(
               `Quantity must be a positive integer for item ${line.itemId}, got ${line.quantity}`
          );
     }
     if (!Number.isFinite(line.unitPrice) || line.unitPrice < 0) {
          throw new InvalidQuantityError(`Unit price must be a non-negative amount, got ${line.unitPrice}`);
     }
     const discount = line.discountPercentage ?? 0;
     if (!Number.isFinite(discount) || discount < 0 || discount > 100) {
          throw new InvalidQuantityError(`Discount percentage must be between 0 and 100, got ${discount}`);
     }
}

function referenceOf(orderId: number): string {
     return `sales_order:${orderId}`;
}

/**
 * Sums line quantities per item so that two lines for the same item are checked and
 * moved as one amount
 */
function quantitiesByItem(lines: Array<{ itemId: number; quantity: number }>): Map<number, number> {
     const totals = new Map<number, number>();
     for (const line of lines) {
          totals.set(line.itemId, (totals.get(line.itemId) ?? 0) + line.quantity);
     }
     return totals;
}

export class SalesFulfillmentService {
     constructor(private readonly ledger: StockLedgerService = new StockLedgerService()) {}

     /**
      * Create a PENDING order and reserve every line, all-or-nothing
      */
     async create(
          repos: StockRepositories,
          draft: SalesOrderDraft
     ): Promise<FulfillmentResult<SalesOrder>> {
          const warehouseId = draft.warehouseId ?? null;
          if (warehouseId === null) {
               throw new MissingWarehouseError(draft.orderNumber);
          }
          if (!draft.lines || draft.lines.length === 0) {
               throw new InvalidQuantityError('Sales order must have at least one line');
          }
          draft.lines.forEach(validateLine);

          const discountAmount = draft.discountAmount ?? 0;
          if (!Number.isFinite(discountAmount) || discountAmount < 0) {
               throw new InvalidQuantityError(`Discount amount must be a non-negative amount, got ${discountAmount}`);
          }

          const demand = quantitiesByItem(draft.lines);
          const keys = [...demand.keys()].map((itemId) => ({ itemId, warehouseId }));
          const locked = await this.ledger.lockRows(repos, keys);

          // Check every line before reserving any of them
          for (const key of keys) {
               const requested = demand.get(key.itemId) ?? 0;
               const available = locked.get(stockKeyOf(key))?.availableQuantity ?? 0;
               if (available < requested) {
                    throw new InsufficientStockError(key.itemId, key.warehouseId, requested, available);
               }
          }

          const lines: NewSalesLine[] = draft.lines.map((line) => {
               const discountPercentage = line.discountPercentage ?? 0;
               return {
                    itemId: line.itemId,
                    quantity: line.quantity,
                    unitPrice: line.unitPrice,
                    discountPercentage,
                    shippedQuantity: 0,
                    lineTotal: salesLineTotal(line.quantity, line.unitPrice, discountPercentage),
               };
          });

          const order = await repos.sales.insert({
               clientId: draft.clientId,
               orderNumber: draft.orderNumber,
               orderDate: draft.orderDate,
               status: 'PENDING',
               warehouseId,
               discountAmount,
               totalAmount: salesOrderTotal(lines, discountAmount),
               notes: draft.notes ?? null,
               confirmedAt: null,
               shippedDate: null,
               deliveredDate: null,
               cancelledAt: null,
               lines,
          });

          const stock: StockLevel[] = [];
          for (const key of keys) {
               stock.push(
                    await this.ledger.reserve(repos, key, demand.get(key.itemId) ?? 0, referenceOf(order.id))
               );
          }

          logger.info(
               { salesOrderId: order.id, orderNumber: order.orderNumber, lineCount: lines.length },
               'Sales order created with reservations'
          );
          return { order, stock };
     }

     async confirm(repos: StockRepositories, orderId: number): Promise<SalesOrder> {
          const order = await this.lockOrder(repos, orderId);

          if (order.status === 'CONFIRMED') {
               return order;
          }
          if (order.status !== 'PENDING') {
               throw new InvalidTransitionError('Sales order', orderId, order.status, 'confirm');
          }

          const updated: SalesOrder = { ...order, status: 'CONFIRMED', confirmedAt: new Date() };
          await repos.sales.updateOrder(updated);

          logger.info({ salesOrderId: orderId }, 'Sales order confirmed');
          return updated;
     }

     async ship(repos: StockRepositories, orderId: number): Promise<FulfillmentResult<SalesOrder>> {
          const order = await this.lockOrder(repos, orderId);

          if (order.status === 'SHIPPED' || order.status === 'DELIVERED') {
               logger.debug({ salesOrderId: orderId, status: order.status }, 'Sales order already shipped');
               return { order, stock: [] };
          }
          if (order.status === 'CANCELLED') {
               throw new InvalidTransitionError('Sales order', orderId, order.status, 'ship');
          }

          return this.shipLocked(repos, order);
     }

     /**
      * Deliver a shipped order, or ship and deliver a reserved one in a single step.
      * Stock leaves the ledger exactly once either way.
      */
     async deliver(repos: StockRepositories, orderId: number): Promise<FulfillmentResult<SalesOrder>> {
          const order = await this.lockOrder(repos, orderId);

          if (order.status === 'DELIVERED') {
               return { order, stock: [] };
          }
          if (order.status === 'CANCELLED') {
               throw new InvalidTransitionError('Sales order', orderId, order.status, 'deliver');
          }

          const shipped =
               order.status === 'SHIPPED'
                    ? { order, stock: [] }
                    : await this.shipLocked(repos, order);

          const updated: SalesOrder = { ...shipped.order, status: 'DELIVERED', deliveredDate: new Date() };
          await repos.sales.updateOrder(updated);

          logger.info({ salesOrderId: orderId }, 'Sales order delivered');
          return { order: updated, stock: shipped.stock };
     }

     async cancel(repos: StockRepositories, orderId: number): Promise<FulfillmentResult<SalesOrder>> {
          const order = await this.lockOrder(repos, orderId);

          if (order.status === 'CANCELLED') {
               return { order, stock: [] };
          }
          if (order.status === 'SHIPPED' || order.status === 'DELIVERED') {
               throw new InvalidTransitionError('Sales order', orderId, order.status, 'cancel');
          }

          const demand = quantitiesByItem(order.lines);
          const keys = [...demand.keys()].map((itemId) => ({ itemId, warehouseId: order.warehouseId }));
          await this.ledger.lockRows(repos, keys);

          const stock: StockLevel[] = [];
          for (const key of keys) {
               const level = await this.ledger.releaseReservation(
                    repos,
                    key,
                    demand.get(key.itemId) ?? 0,
                    referenceOf(orderId)
               );
               if (level) {
                    stock.push(level);
               }
          }

          const updated: SalesOrder = { ...order, status: 'CANCELLED', cancelledAt: new Date() };
          await repos.sales.updateOrder(updated);

          logger.info({ salesOrderId: orderId, releasedRows: stock.length }, 'Sales order cancelled');
          return { order: updated, stock };
     }

     async addLine(
          repos: StockRepositories,
          orderId: number,
          draft: SalesLineDraft
     ): Promise<FulfillmentResult<SalesOrder>> {
          const order = await this.lockEditable(repos, orderId);
          validateLine(draft);

          const key: StockKey = { itemId: draft.itemId, warehouseId: order.warehouseId };
          const level = await this.ledger.reserve(repos, key, draft.quantity, referenceOf(orderId));

          const discountPercentage = draft.discountPercentage ?? 0;
          const line = await repos.sales.insertLine(orderId, {
               itemId: draft.itemId,
               quantity: draft.quantity,
               unitPrice: draft.unitPrice,
               discountPercentage,
               shippedQuantity: 0,
               lineTotal: salesLineTotal(draft.quantity, draft.unitPrice, discountPercentage),
          });

          const updated = await this.saveTotals(repos, order, [...order.lines, line]);
          logger.info({ salesOrderId: orderId, lineId: line.id, itemId: line.itemId }, 'Sales line added');
          return { order: updated, stock: [level] };
     }

     /**
      * Only the quantity delta moves: an increase is reserved after an availability
      * check, a decrease is released.
      */
     async updateLine(
          repos: StockRepositories,
          orderId: number,
          lineId: number,
          patch: SalesLinePatch
     ): Promise<FulfillmentResult<SalesOrder>> {
          const order = await this.lockEditable(repos, orderId);
          const line = this.findLine(order, lineId);

          const merged: SalesLine = { ...line, ...patch };
          validateLine(merged);

          const key: StockKey = { itemId: line.itemId, warehouseId: order.warehouseId };
          const delta = merged.quantity - line.quantity;
          const stock: StockLevel[] = [];

          if (delta > 0) {
               stock.push(await this.ledger.reserve(repos, key, delta, referenceOf(orderId)));
          } else if (delta < 0) {
               const level = await this.ledger.releaseReservation(repos, key, -delta, referenceOf(orderId));
               if (level) {
                    stock.push(level);
               }
          }

          const updatedLine: SalesLine = {
               ...merged,
               lineTotal: salesLineTotal(merged.quantity, merged.unitPrice, merged.discountPercentage),
          };
          await repos.sales.updateLine(updatedLine);

          const updated = await this.saveTotals(
               repos,
               order,
               order.lines.map((l) => (l.id === lineId ? updatedLine : l))
          );
          logger.info({ salesOrderId: orderId, lineId, delta }, 'Sales line updated');
          return { order: updated, stock };
     }

     async removeLine(
          repos: StockRepositories,
          orderId: number,
          lineId: number
     ): Promise<FulfillmentResult<SalesOrder>> {
          const order = await this.lockEditable(repos, orderId);
          const line = this.findLine(order, lineId);

          if (order.lines.length === 1) {
               throw new InvalidQuantityError('Sales order must keep at least one line');
          }

          const level = await this.ledger.releaseReservation(
               repos,
               { itemId: line.itemId, warehouseId: order.warehouseId },
               line.quantity,
               referenceOf(orderId)
          );
          await repos.sales.deleteLine(lineId);

          const updated = await this.saveTotals(
               repos,
               order,
               order.lines.filter((l) => l.id !== lineId)
          );
          logger.info({ salesOrderId: orderId, lineId }, 'Sales line removed');
          return { order: updated, stock: level ? [level] : [] };
     }

     /**
      * Attach margin and profit to every line, priced against each item's cost price
      */
     async withLineProfit(repos: StockRepositories, order: SalesOrder): Promise<SalesOrderView> {
          const costPrices = await repos.items.costPrices(order.lines.map((line) => line.itemId));
          return {
               ...order,
               lines: order.lines.map((line) => ({
                    ...line,
                    ...lineProfit(line, costPrices.get(line.itemId) ?? 0),
               })),
          };
     }

     private async shipLocked(
          repos: StockRepositories,
          order: SalesOrder
     ): Promise<FulfillmentResult<SalesOrder>> {
          const demand = quantitiesByItem(order.lines);
          const keys = [...demand.keys()].map((itemId) => ({ itemId, warehouseId: order.warehouseId }));
          await this.ledger.lockRows(repos, keys);

          const stock: StockLevel[] = [];
          for (const key of keys) {
               stock.push(
                    await this.ledger.reduce(repos, key, demand.get(key.itemId) ?? 0, referenceOf(order.id), true)
               );
          }

          const lines = order.lines.map((line) => ({ ...line, shippedQuantity: line.quantity }));
          for (const line of lines) {
               await repos.sales.updateLine(line);
          }

          const updated: SalesOrder = { ...order, lines, status: 'SHIPPED', shippedDate: new Date() };
          await repos.sales.updateOrder(updated);

          logger.info({ salesOrderId: order.id, lineCount: lines.length }, 'Sales order shipped');
          return { order: updated, stock };
     }

     private async lockOrder(repos: StockRepositories, orderId: number): Promise<SalesOrder> {
          const order = await repos.sales.findById(orderId, { forUpdate: true });
          if (!order) {
               throw new NotFoundError('Sales order', orderId);
          }
          return order;
     }

     private async lockEditable(repos: StockRepositories, orderId: number): Promise<SalesOrder> {
          const order = await this.lockOrder(repos, orderId);
          if (order.status !== 'PENDING') {
               throw new InvalidTransitionError('Sales order', orderId, order.status, 'edit lines of');
          }
          return order;
     }

     private findLine(order: SalesOrder, lineId: number): SalesLine {
          const line = order.lines.find((l) => l.id === lineId);
          if (!line) {
               throw new NotFoundError('Sales line', lineId);
          }
          return line;
     }

     private async saveTotals(
          repos: StockRepositories,
          order: SalesOrder,
          lines: SalesLine[]
     ): Promise<SalesOrder> {
          const updated: SalesOrder = {
               ...order,
               lines,
               totalAmount: salesOrderTotal(lines, order.discountAmount),
          };
          await repos.sales.updateOrder(updated);
          return updated;
     }
}
