import { StockRepositories, TransactionRunner } from '../repositories/repositories';
import {
     FulfillmentResult,
     ItemStock,
     ItemStockTotal,
     LedgerSummary,
     OrderResult,
     ProfitLoss,
     ProfitLossReport,
     PurchaseLinePatch,
     PurchaseOrder,
     PurchaseOrderDraft,
     ReceiptLine,
     SalesLineDraft,
     SalesLinePatch,
     SalesOrder,
     SalesOrderDraft,
     SalesOrderView,
     StockAlert,
     StockLevel,
     StockSnapshot,
     StockThresholds,
} from '../types/stock.types';
import { NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { ProfitLossAggregator } from './profit-loss-service';
import { PurchaseFulfillmentService } from './purchase-fulfillment-service';
import { SalesFulfillmentService } from './sales-fulfillment-service';
import { StockAlertMonitor } from './stock-alert-service';
import { StockLedgerService, toSnapshot } from './stock-ledger-service';

export interface StockEngineServices {
     ledger?: StockLedgerService;
     purchases?: PurchaseFulfillmentService;
     sales?: SalesFulfillmentService;
     alerts?: StockAlertMonitor;
     accounting?: ProfitLossAggregator;
}

/**
 * Entry point for every stock operation. Each call is one transaction; alert
 * evaluation for the rows it touched runs after that transaction commits.
 */
export class StockEngine {
     private readonly ledger: StockLedgerService;
     private readonly purchases: PurchaseFulfillmentService;
     private readonly sales: SalesFulfillmentService;
     private readonly alerts: StockAlertMonitor;
     private readonly accounting: ProfitLossAggregator;

     constructor(
          private readonly runner: TransactionRunner,
          services: StockEngineServices = {}
     ) {
          this.ledger = services.ledger ?? new StockLedgerService();
          this.purchases = services.purchases ?? new PurchaseFulfillmentService(this.ledger);
          this.sales = services.sales ?? new SalesFulfillmentService(this.ledger);
          this.alerts = services.alerts ?? new StockAlertMonitor();
          this.accounting = services.accounting ?? new ProfitLossAggregator();
     }

     // Purchase orders

     async createPurchaseOrder(draft: PurchaseOrderDraft): Promise<PurchaseOrder> {
          return this.runner.transaction((repos) => this.purchases.createPurchaseOrder(repos, draft));
     }

     async getPurchaseOrder(orderId: number): Promise<PurchaseOrder> {
          const order = await this.runner.read((repos) => repos.purchases.findById(orderId));
          if (!order) {
               throw new NotFoundError('Purchase order', orderId);
          }
          return order;
     }

     async updatePurchaseLine(
          orderId: number,
          lineId: number,
          patch: PurchaseLinePatch
     ): Promise<PurchaseOrder> {
          return this.runner.transaction((repos) =>
               this.purchases.updatePurchaseLine(repos, orderId, lineId, patch)
          );
     }

     async receivePurchaseOrder(
          orderId: number,
          receivedQuantities?: ReceiptLine[]
     ): Promise<OrderResult<PurchaseOrder>> {
          return this.fulfil((repos) => this.purchases.markReceived(repos, orderId, receivedQuantities));
     }

     async recordPurchaseReceipt(
          orderId: number,
          receipts: ReceiptLine[]
     ): Promise<OrderResult<PurchaseOrder>> {
          return this.fulfil((repos) => this.purchases.recordReceipt(repos, orderId, receipts));
     }

     async cancelPurchaseOrder(orderId: number): Promise<PurchaseOrder> {
          return this.runner.transaction((repos) => this.purchases.cancelPurchaseOrder(repos, orderId));
     }

     // Sales orders

     async createSalesOrder(draft: SalesOrderDraft): Promise<OrderResult<SalesOrder>> {
          return this.fulfil((repos) => this.sales.create(repos, draft));
     }

     async getSalesOrder(orderId: number): Promise<SalesOrderView> {
          return this.runner.read(async (repos) => {
               const order = await repos.sales.findById(orderId);
               if (!order) {
                    throw new NotFoundError('Sales order', orderId);
               }
               return this.sales.withLineProfit(repos, order);
          });
     }

     async confirmSalesOrder(orderId: number): Promise<SalesOrder> {
          return this.runner.transaction((repos) => this.sales.confirm(repos, orderId));
     }

     async shipSalesOrder(orderId: number): Promise<OrderResult<SalesOrder>> {
          return this.fulfil((repos) => this.sales.ship(repos, orderId));
     }

     async deliverSalesOrder(orderId: number): Promise<OrderResult<SalesOrder>> {
          return this.fulfil((repos) => this.sales.deliver(repos, orderId));
     }

     async cancelSalesOrder(orderId: number): Promise<OrderResult<SalesOrder>> {
          return this.fulfil((repos) => this.sales.cancel(repos, orderId));
     }

     async addSalesLine(orderId: number, line: SalesLineDraft): Promise<OrderResult<SalesOrder>> {
          return this.fulfil((repos) => this.sales.addLine(repos, orderId, line));
     }

     async updateSalesLine(
          orderId: number,
          lineId: number,
          patch: SalesLinePatch
     ): Promise<OrderResult<SalesOrder>> {
          return this.fulfil((repos) => this.sales.updateLine(repos, orderId, lineId, patch));
     }

     async removeSalesLine(orderId: number, lineId: number): Promise<OrderResult<SalesOrder>> {
          return this.fulfil((repos) => this.sales.removeLine(repos, orderId, lineId));
     }

     // Stock

     async getStockSnapshot(itemId: number, warehouseId: number): Promise<StockSnapshot> {
          const level = await this.runner.read((repos) => repos.ledger.find({ itemId, warehouseId }));
          if (!level) {
               throw new NotFoundError('Stock ledger', `${itemId}:${warehouseId}`);
          }
          return toSnapshot(level);
     }

     async configureStockThresholds(
          itemId: number,
          warehouseId: number,
          thresholds: StockThresholds
     ): Promise<StockSnapshot> {
          const level = await this.runner.transaction((repos) =>
               this.ledger.configureThresholds(repos, { itemId, warehouseId }, thresholds)
          );
          await this.evaluateAlerts([level.id]);
          return toSnapshot(level);
     }

     async listLowStock(warehouseId?: number): Promise<StockLevel[]> {
          return this.runner.read((repos) => repos.ledger.listLowStock(warehouseId));
     }

     async listOutOfStock(warehouseId?: number): Promise<StockLevel[]> {
          return this.runner.read((repos) => repos.ledger.listOutOfStock(warehouseId));
     }

     async getItemStock(itemId: number): Promise<ItemStock> {
          return this.runner.read((repos) => this.ledger.itemStock(repos, itemId));
     }

     async listItemsBelowReorderLevel(): Promise<ItemStockTotal[]> {
          return this.runner.read((repos) => repos.items.listBelowReorderLevel());
     }

     // Alerts

     async listPendingAlerts(warehouseId?: number): Promise<StockAlert[]> {
          return this.runner.read((repos) => this.alerts.listPending(repos, warehouseId));
     }

     async acknowledgeAlert(alertId: number): Promise<StockAlert> {
          return this.runner.transaction((repos) => this.alerts.acknowledge(repos, alertId));
     }

     async resolveAlert(alertId: number): Promise<StockAlert> {
          return this.runner.transaction((repos) => this.alerts.resolve(repos, alertId));
     }

     // Accounting

     async calculateProfitLoss(start: string, end: string): Promise<ProfitLoss> {
          return this.runner.read((repos) => this.accounting.calculate(repos, start, end));
     }

     async createProfitLossReport(start: string, end: string): Promise<ProfitLossReport> {
          return this.runner.transaction((repos) => this.accounting.createReport(repos, start, end));
     }

     async listProfitLossReports(): Promise<ProfitLossReport[]> {
          return this.runner.read((repos) => this.accounting.listReports(repos));
     }

     async ledgerSummary(start: string, end: string): Promise<LedgerSummary> {
          return this.runner.read((repos) => this.accounting.ledgerSummary(repos, start, end));
     }

     /**
      * Evaluate alerts for the given rows, one transaction per row. Failures are logged
      * and never reach the caller, whose stock change has already committed.
      */
     async evaluateAlerts(stockLedgerIds: number[]): Promise<void> {
          for (const stockLedgerId of new Set(stockLedgerIds)) {
               try {
                    await this.runner.transaction((repos) => this.alerts.evaluate(repos, stockLedgerId));
               } catch (err) {
                    logger.error({ err, stockLedgerId }, 'Stock alert evaluation failed');
               }
          }
     }

     private async fulfil<T>(
          fn: (repos: StockRepositories) => Promise<FulfillmentResult<T>>
     ): Promise<OrderResult<T>> {
          const result = await this.runner.transaction(fn);
          await this.evaluateAlerts(result.stock.map((level) => level.id));
          return { order: result.order, stock: result.stock.map(toSnapshot) };
     }
}
