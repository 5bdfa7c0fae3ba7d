import {
     ItemStockTotal,
     LedgerTotals,
     NewPurchaseOrder,
     NewSalesLine,
     NewSalesOrder,
     NewStockAlert,
     ProfitLoss,
     ProfitLossReport,
     PurchaseLine,
     PurchaseOrder,
     SalesLine,
     SalesOrder,
     StockAlert,
     StockEventType,
     StockKey,
     StockLevel,
     StockMovement,
} from '../types/stock.types';

export interface LockOptions {
     forUpdate?: boolean;
}

export interface StockLedgerRepository {
     /** Locks the rows in (item, warehouse) order and returns the ones that exist */
     lockForUpdate(keys: StockKey[]): Promise<StockLevel[]>;
     insertIfMissing(key: StockKey): Promise<void>;
     update(level: StockLevel): Promise<void>;
     find(key: StockKey): Promise<StockLevel | null>;
     findById(id: number): Promise<StockLevel | null>;
     listByItem(itemId: number): Promise<StockLevel[]>;
     listLowStock(warehouseId?: number): Promise<StockLevel[]>;
     listOutOfStock(warehouseId?: number): Promise<StockLevel[]>;
     recordMovement(movement: StockMovement): Promise<void>;
}

export interface ItemRepository {
     findStockTotal(itemId: number): Promise<ItemStockTotal | null>;
     /** Items whose total across warehouses is at or below their reorder level */
     listBelowReorderLevel(): Promise<ItemStockTotal[]>;
     costPrices(itemIds: number[]): Promise<Map<number, number>>;
}

export interface PurchaseOrderRepository {
     insert(order: NewPurchaseOrder): Promise<PurchaseOrder>;
     findById(id: number, options?: LockOptions): Promise<PurchaseOrder | null>;
     updateOrder(order: PurchaseOrder): Promise<void>;
     updateLine(line: PurchaseLine): Promise<void>;
}

export interface SalesOrderRepository {
     insert(order: NewSalesOrder): Promise<SalesOrder>;
     findById(id: number, options?: LockOptions): Promise<SalesOrder | null>;
     updateOrder(order: SalesOrder): Promise<void>;
     insertLine(salesOrderId: number, line: NewSalesLine): Promise<SalesLine>;
     updateLine(line: SalesLine): Promise<void>;
     deleteLine(lineId: number): Promise<void>;
}

export interface StockAlertRepository {
     findPending(stockLedgerId: number): Promise<StockAlert | null>;
     /** Returns null when another pending alert for the same row won the race */
     insert(alert: NewStockAlert): Promise<StockAlert | null>;
     update(alert: StockAlert): Promise<void>;
     findById(id: number, options?: LockOptions): Promise<StockAlert | null>;
     listPending(warehouseId?: number): Promise<StockAlert[]>;
}

export interface AccountingRepository {
     sumShippedSales(start: string, end: string): Promise<number>;
     sumReceivedPurchases(start: string, end: string): Promise<number>;
     sumDebitPayments(start: string, end: string): Promise<number>;
     upsertProfitLossReport(start: string, end: string, values: ProfitLoss): Promise<ProfitLossReport>;
     listProfitLossReports(): Promise<ProfitLossReport[]>;
     ledgerTotals(start: string, end: string): Promise<LedgerTotals>;
}

export interface DomainEventRepository {
     append(type: StockEventType, payload: Record<string, unknown>): Promise<void>;
}

export interface StockRepositories {
     ledger: StockLedgerRepository;
     items: ItemRepository;
     purchases: PurchaseOrderRepository;
     sales: SalesOrderRepository;
     alerts: StockAlertRepository;
     accounting: AccountingRepository;
     events: DomainEventRepository;
}

export interface TransactionRunner {
     /** Runs fn in one transaction; any throw rolls back every write made through repos */
     transaction<T>(fn: (repos: StockRepositories) => Promise<T>): Promise<T>;
     /** Non-locking reads for display */
     read<T>(fn: (repos: StockRepositories) => Promise<T>): Promise<T>;
}
