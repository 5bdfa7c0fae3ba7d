// Type definitions for the stock engine domain

export interface StockKey {
     itemId: number;
     warehouseId: number;
}

export interface StockLevel extends StockKey {
     id: number;
     itemName: string;
     warehouseName: string;
     quantity: number;
     reservedQuantity: number;
     availableQuantity: number;
     minQuantity: number;
     maxQuantity: number | null;
     averageCost: number;
     lastRestockedAt: Date | null;
}

export interface StockSnapshot extends StockKey {
     ledgerId: number;
     quantity: number;
     reserved: number;
     available: number;
     min: number;
     max: number | null;
     averageCost: number;
}

// Item totals across every warehouse

export interface ItemStockTotal {
     itemId: number;
     sku: string;
     name: string;
     reorderLevel: number;
     totalQuantity: number;
     /** Total on hand at or below the item's reorder level */
     isLowStock: boolean;
}

export interface ItemStock extends ItemStockTotal {
     levels: StockSnapshot[];
}

export interface StockThresholds {
     minQuantity: number;
     maxQuantity?: number | null;
}

export type StockMovementType = 'RECEIPT' | 'RESERVE' | 'RELEASE' | 'SHIPMENT' | 'ADJUSTMENT';

export interface StockMovement {
     stockLedgerId: number;
     type: StockMovementType;
     quantityDelta: number;
     reservedDelta: number;
     unitCost?: number;
     referenceId: string;
}

// Purchase orders

export type PurchaseOrderStatus = 'PENDING' | 'PARTIAL' | 'RECEIVED' | 'CANCELLED';

export interface PurchaseLine {
     id: number;
     purchaseOrderId: number;
     itemId: number;
     warehouseId: number | null;
     quantity: number;
     receivedQuantity: number;
     stockAppliedQuantity: number;
     unitCost: number;
     freightCost: number;
     customsDuty: number;
     otherCosts: number;
     lineTotal: number;
     landedCostPerUnit: number;
     totalLandedCost: number;
}

export interface PurchaseOrder {
     id: number;
     vendorId: number;
     orderNumber: string;
     orderDate: string;
     status: PurchaseOrderStatus;
     warehouseId: number | null;
     totalAmount: number;
     receivedDate: Date | null;
     notes: string | null;
     lines: PurchaseLine[];
}

export type NewPurchaseLine = Omit<PurchaseLine, 'id' | 'purchaseOrderId'>;

export type NewPurchaseOrder = Omit<PurchaseOrder, 'id' | 'lines'> & {
     lines: NewPurchaseLine[];
};

export interface PurchaseLineDraft {
     itemId: number;
     quantity: number;
     unitCost: number;
     freightCost?: number;
     customsDuty?: number;
     otherCosts?: number;
     warehouseId?: number | null;
}

export interface PurchaseOrderDraft {
     vendorId: number;
     orderNumber: string;
     orderDate: string;
     warehouseId?: number | null;
     notes?: string | null;
     lines: PurchaseLineDraft[];
}

export interface PurchaseLinePatch {
     quantity?: number;
     unitCost?: number;
     freightCost?: number;
     customsDuty?: number;
     otherCosts?: number;
}

export interface ReceiptLine {
     lineId: number;
     quantity: number;
}

// Sales orders

export type SalesOrderStatus = 'PENDING' | 'CONFIRMED' | 'SHIPPED' | 'DELIVERED' | 'CANCELLED';

export interface SalesLine {
     id: number;
     salesOrderId: number;
     itemId: number;
     quantity: number;
     unitPrice: number;
     discountPercentage: number;
     shippedQuantity: number;
     lineTotal: number;
}

export interface SalesOrder {
     id: number;
     clientId: number;
     orderNumber: string;
     orderDate: string;
     status: SalesOrderStatus;
     warehouseId: number;
     discountAmount: number;
     totalAmount: number;
     notes: string | null;
     confirmedAt: Date | null;
     shippedDate: Date | null;
     deliveredDate: Date | null;
     cancelledAt: Date | null;
     lines: SalesLine[];
}

export type NewSalesLine = Omit<SalesLine, 'id' | 'salesOrderId'>;

export type NewSalesOrder = Omit<SalesOrder, 'id' | 'lines'> & {
     lines: NewSalesLine[];
};

export interface SalesLineDraft {
     itemId: number;
     quantity: number;
     unitPrice: number;
     discountPercentage?: number;
}

export interface SalesOrderDraft {
     clientId: number;
     orderNumber: string;
     orderDate: string;
     warehouseId?: number | null;
     discountAmount?: number;
     notes?: string | null;
     lines: SalesLineDraft[];
}

export interface SalesLinePatch {
     quantity?: number;
     unitPrice?: number;
     discountPercentage?: number;
}

export interface LineProfit {
     marginPercentage: number;
     profitAmount: number;
}

export type SalesLineView = SalesLine & LineProfit;

export interface SalesOrderView extends Omit<SalesOrder, 'lines'> {
     lines: SalesLineView[];
}

// Alerts

export type StockAlertStatus = 'PENDING' | 'ACKNOWLEDGED' | 'RESOLVED';

export interface StockAlert {
     id: number;
     stockLedgerId: number;
     itemId: number;
     warehouseId: number;
     currentQuantity: number;
     minQuantity: number;
     status: StockAlertStatus;
     message: string;
     createdAt: Date;
     acknowledgedAt: Date | null;
     resolvedAt: Date | null;
}

export type NewStockAlert = Omit<StockAlert, 'id' | 'createdAt' | 'acknowledgedAt' | 'resolvedAt'>;

// Accounting

export interface ProfitLoss {
     revenue: number;
     cogs: number;
     expenses: number;
     grossProfit: number;
     netProfit: number;
}

export interface ProfitLossReport extends ProfitLoss {
     id: number;
     periodStart: string;
     periodEnd: string;
     createdAt: Date;
}

export interface LedgerTotals {
     debits: number;
     credits: number;
}

export interface LedgerSummary {
     startDate: string;
     endDate: string;
     totalDebits: number;
     totalCredits: number;
     balance: number;
}

// Engine results

export interface OrderResult<T> {
     order: T;
     stock: StockSnapshot[];
}

export interface FulfillmentResult<T> {
     order: T;
     stock: StockLevel[];
}

// Domain events

export type StockEventType =
     | 'StockReceived'
     | 'StockReserved'
     | 'StockReleased'
     | 'StockShipped'
     | 'LowStockAlertRaised';

export interface StockMovedEvent {
     stockLedgerId: number;
     itemId: number;
     warehouseId: number;
     quantityDelta: number;
     reservedDelta: number;
     quantity: number;
     reservedQuantity: number;
     referenceId: string;
     timestamp: string;
}

export interface LowStockAlertRaisedEvent {
     alertId: number;
     stockLedgerId: number;
     itemId: number;
     warehouseId: number;
     currentQuantity: number;
     minQuantity: number;
     message: string;
     timestamp: string;
}

export type DomainEventStatus = 'PENDING' | 'SENT' | 'FAILED';

export interface DomainEvent {
     id: number;
     type: StockEventType;
     payload: Record<string, unknown>;
     status: DomainEventStatus;
     createdAt: Date;
}
