import { StockRepositories } from '../repositories/repositories';
import {
     FulfillmentResult,
     NewPurchaseLine,
     PurchaseLine,
     PurchaseLinePatch,
     PurchaseOrder,
     PurchaseOrderDraft,
     ReceiptLine,
     StockKey,
     StockLevel,
} from '../types/stock.types';
import {
     AlreadyReceivedError,
     InvalidQuantityError,
     InvalidTransitionError,
     MissingWarehouseError,
     NotFoundError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { round2 } from '../utils/money';
import { computeLandedCost } from './landed-cost';
import { StockLedgerService } from './stock-ledger-service';

interface PlannedReceipt {
     line: PurchaseLine;
     key: StockKey;
     receivedQuantity: number;
}

function orderTotal(lines: Array<{ lineTotal: number }>): number {
     return round2(lines.reduce((sum, line) => sum + line.lineTotal, 0));
}

function referenceOf(order: PurchaseOrder): string {
     return `purchase_order:${order.id}`;
}

export class PurchaseFulfillmentService {
     constructor(private readonly ledger: StockLedgerService = new StockLedgerService()) {}

     async createPurchaseOrder(
          repos: StockRepositories,
          draft: PurchaseOrderDraft
     ): Promise<PurchaseOrder> {
          if (!draft.lines || draft.lines.length === 0) {
               throw new InvalidQuantityError('Purchase order must have at least one line');
          }

          const lines: NewPurchaseLine[] = draft.lines.map((line) => {
               const cost = computeLandedCost(line);
               return {
                    itemId: line.itemId,
                    warehouseId: line.warehouseId ?? null,
                    quantity: line.quantity,
                    receivedQuantity: 0,
                    stockAppliedQuantity: 0,
                    unitCost: line.unitCost,
                    freightCost: line.freightCost ?? 0,
                    customsDuty: line.customsDuty ?? 0,
                    otherCosts: line.otherCosts ?? 0,
                    lineTotal: cost.lineTotal,
                    landedCostPerUnit: cost.landedCostPerUnit,
                    totalLandedCost: cost.totalLandedCost,
               };
          });

          const order = await repos.purchases.insert({
               vendorId: draft.vendorId,
               orderNumber: draft.orderNumber,
               orderDate: draft.orderDate,
               status: 'PENDING',
               warehouseId: draft.warehouseId ?? null,
               totalAmount: orderTotal(lines),
               receivedDate: null,
               notes: draft.notes ?? null,
               lines,
          });

          logger.info(
               { purchaseOrderId: order.id, orderNumber: order.orderNumber, lineCount: lines.length },
               'Purchase order created'
          );
          return order;
     }

     /**
      * Lines are editable until the first receipt
      */
     async updatePurchaseLine(
          repos: StockRepositories,
          orderId: number,
          lineId: number,
          patch: PurchaseLinePatch
     ): Promise<PurchaseOrder> {
          const order = await this.lockOrder(repos, orderId);

          if (order.status !== 'PENDING') {
               throw new InvalidTransitionError('Purchase order', orderId, order.status, 'edit lines of');
          }

          const line = order.lines.find((l) => l.id === lineId);
          if (!line) {
               throw new NotFoundError('Purchase line', lineId);
          }

          const merged = { ...line, ...patch };
          const cost = computeLandedCost(merged);
          const updatedLine: PurchaseLine = {
               ...merged,
               lineTotal: cost.lineTotal,
               landedCostPerUnit: cost.landedCostPerUnit,
               totalLandedCost: cost.totalLandedCost,
          };
          await repos.purchases.updateLine(updatedLine);

          const lines = order.lines.map((l) => (l.id === lineId ? updatedLine : l));
          const updated: PurchaseOrder = { ...order, lines, totalAmount: orderTotal(lines) };
          await repos.purchases.updateOrder(updated);

          logger.info({ purchaseOrderId: orderId, lineId }, 'Purchase line updated');
          return updated;
     }

     /**
      * Receive the whole order. Each line is set to its ordered quantity unless an
      * explicit quantity is given, and only the part not yet applied goes to stock.
      */
     async markReceived(
          repos: StockRepositories,
          orderId: number,
          receivedQuantities: ReceiptLine[] = []
     ): Promise<FulfillmentResult<PurchaseOrder>> {
          const order = await this.lockOrder(repos, orderId);

          if (order.status === 'RECEIVED') {
               throw new AlreadyReceivedError(orderId);
          }
          if (order.status === 'CANCELLED') {
               throw new InvalidTransitionError('Purchase order', orderId, order.status, 'receive');
          }

          const explicit = new Map<number, number>();
          for (const receipt of receivedQuantities) {
               if (!order.lines.some((l) => l.id === receipt.lineId)) {
                    throw new NotFoundError('Purchase line', receipt.lineId);
               }
               explicit.set(receipt.lineId, receipt.quantity);
          }

          const plan = order.lines.map((line) => {
               const receivedQuantity = explicit.get(line.id) ?? line.quantity;
               if (
                    !Number.isInteger(receivedQuantity) ||
                    receivedQuantity < line.stockAppliedQuantity ||
                    receivedQuantity > line.quantity
               ) {
                    throw new InvalidQuantityError(
                         `Received quantity for line ${line.id} must be between ${line.stockAppliedQuantity} and ${line.quantity}, got ${receivedQuantity}`
                    );
               }
               return { line, key: this.stockKey(order, line), receivedQuantity };
          });

          const stock = await this.applyReceipts(repos, order, plan);

          const updated: PurchaseOrder = {
               ...order,
               status: 'RECEIVED',
               receivedDate: new Date(),
               lines: plan.map(({ line, receivedQuantity }) => ({
                    ...line,
                    receivedQuantity,
                    stockAppliedQuantity: receivedQuantity,
               })),
          };
          await repos.purchases.updateOrder(updated);

          logger.info(
               { purchaseOrderId: orderId, orderNumber: order.orderNumber, stockRows: stock.length },
               'Purchase order received'
          );
          return { order: updated, stock };
     }

     /**
      * Record a partial delivery against individual lines
      */
     async recordReceipt(
          repos: StockRepositories,
          orderId: number,
          receipts: ReceiptLine[]
     ): Promise<FulfillmentResult<PurchaseOrder>> {
          if (!receipts || receipts.length === 0) {
               throw new InvalidQuantityError('Receipt must have at least one line');
          }

          const order = await this.lockOrder(repos, orderId);

          if (order.status === 'RECEIVED') {
               throw new AlreadyReceivedError(orderId);
          }
          if (order.status === 'CANCELLED') {
               throw new InvalidTransitionError('Purchase order', orderId, order.status, 'receive');
          }

          const incoming = new Map<number, number>();
          for (const receipt of receipts) {
               if (!Number.isInteger(receipt.quantity) || receipt.quantity <= 0) {
                    throw new InvalidQuantityError(
                         `Receipt quantity for line ${receipt.lineId} must be a positive integer, got ${receipt.quantity}`
                    );
               }
               incoming.set(receipt.lineId, (incoming.get(receipt.lineId) ?? 0) + receipt.quantity);
          }

          const plan: PlannedReceipt[] = [];
          for (const [lineId, quantity] of incoming) {
               const line = order.lines.find((l) => l.id === lineId);
               if (!line) {
                    throw new NotFoundError('Purchase line', lineId);
               }

               const receivedQuantity = line.receivedQuantity + quantity;
               if (receivedQuantity > line.quantity) {
                    throw new InvalidQuantityError(
                         `Line ${lineId} would receive ${receivedQuantity} of ${line.quantity} ordered`
                    );
               }
               plan.push({ line, key: this.stockKey(order, line), receivedQuantity });
          }

          const stock = await this.applyReceipts(repos, order, plan);

          const received = new Map(plan.map((p) => [p.line.id, p.receivedQuantity]));
          const lines = order.lines.map((line) => {
               const receivedQuantity = received.get(line.id);
               return receivedQuantity === undefined
                    ? line
                    : { ...line, receivedQuantity, stockAppliedQuantity: receivedQuantity };
          });
          const complete = lines.every((line) => line.receivedQuantity >= line.quantity);

          const updated: PurchaseOrder = {
               ...order,
               lines,
               status: complete ? 'RECEIVED' : 'PARTIAL',
               receivedDate: complete ? new Date() : order.receivedDate,
          };
          await repos.purchases.updateOrder(updated);

          logger.info(
               { purchaseOrderId: orderId, status: updated.status, lineCount: plan.length },
               'Purchase receipt recorded'
          );
          return { order: updated, stock };
     }

     async cancelPurchaseOrder(repos: StockRepositories, orderId: number): Promise<PurchaseOrder> {
          const order = await this.lockOrder(repos, orderId);

          if (order.status === 'CANCELLED') {
               return order;
          }
          if (order.status !== 'PENDING') {
               throw new InvalidTransitionError('Purchase order', orderId, order.status, 'cancel');
          }

          const updated: PurchaseOrder = { ...order, status: 'CANCELLED' };
          await repos.purchases.updateOrder(updated);

          logger.info({ purchaseOrderId: orderId }, 'Purchase order cancelled');
          return updated;
     }

     private async lockOrder(repos: StockRepositories, orderId: number): Promise<PurchaseOrder> {
          const order = await repos.purchases.findById(orderId, { forUpdate: true });
          if (!order) {
               throw new NotFoundError('Purchase order', orderId);
          }
          return order;
     }

     private stockKey(order: PurchaseOrder, line: PurchaseLine): StockKey {
          const warehouseId = line.warehouseId ?? order.warehouseId;
          if (warehouseId === null) {
               throw new MissingWarehouseError(order.orderNumber, line.itemId);
          }
          return { itemId: line.itemId, warehouseId };
     }

     /**
      * Applies received − already applied for every planned line; all warehouse checks
      * have already passed before the first row is touched.
      */
     private async applyReceipts(
          repos: StockRepositories,
          order: PurchaseOrder,
          plan: PlannedReceipt[]
     ): Promise<StockLevel[]> {
          const pending = plan.filter((p) => p.receivedQuantity > p.line.stockAppliedQuantity);
          await this.ledger.lockRows(
               repos,
               pending.map((p) => p.key)
          );

          const touched = new Map<number, StockLevel>();
          for (const { line, key, receivedQuantity } of pending) {
               const delta = receivedQuantity - line.stockAppliedQuantity;
               const level = await this.ledger.increase(
                    repos,
                    key,
                    delta,
                    line.landedCostPerUnit,
                    referenceOf(order)
               );
               touched.set(level.id, level);

               await repos.purchases.updateLine({
                    ...line,
                    receivedQuantity,
                    stockAppliedQuantity: receivedQuantity,
               });

               logger.debug(
                    { purchaseOrderId: order.id, lineId: line.id, ...key, delta },
                    'Purchase line applied to stock'
               );
          }

          return [...touched.values()];
     }
}
