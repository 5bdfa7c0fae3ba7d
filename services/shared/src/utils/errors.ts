// Custom error classes for domain-specific errors

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }

     /**
      * Structured fields a caller needs to render the error without another lookup
      */
     get details(): Record<string, unknown> {
          return {};
     }
}

export class InsufficientStockError extends DomainError {
     constructor(
          public readonly itemId: number,
          public readonly warehouseId: number,
          public readonly requested: number,
          public readonly available: number
     ) {
          super(
               `Insufficient stock for item ${itemId} in warehouse ${warehouseId}: requested ${requested}, available ${available}`,
               'INSUFFICIENT_STOCK',
               409
          );
     }

     get details(): Record<string, unknown> {
          return {
               itemId: this.itemId,
               warehouseId: this.warehouseId,
               requested: this.requested,
               available: this.available,
          };
     }
}

export class InvalidTransitionError extends DomainError {
     constructor(
          public readonly entity: string,
          public readonly entityId: number,
          public readonly currentStatus: string,
          public readonly action: string
     ) {
          super(
               `Cannot ${action} ${entity} ${entityId} while it is ${currentStatus}`,
               'INVALID_TRANSITION',
               409
          );
     }

     get details(): Record<string, unknown> {
          return {
               entity: this.entity,
               id: this.entityId,
               currentStatus: this.currentStatus,
               action: this.action,
          };
     }
}

export class AlreadyReceivedError extends DomainError {
     constructor(public readonly orderId: number) {
          super(`Purchase order ${orderId} has already been received`, 'ALREADY_RECEIVED', 409);
     }

     get details(): Record<string, unknown> {
          return { orderId: this.orderId };
     }
}

export class MissingWarehouseError extends DomainError {
     constructor(
          public readonly orderRef: string,
          public readonly itemId?: number
     ) {
          super(
               itemId === undefined
                    ? `Order ${orderRef} has no warehouse`
                    : `Order ${orderRef} has no warehouse for item ${itemId}`,
               'MISSING_WAREHOUSE',
               400
          );
     }

     get details(): Record<string, unknown> {
          return { orderRef: this.orderRef, itemId: this.itemId };
     }
}

export class InvalidQuantityError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_QUANTITY', 400);
     }
}

export class InvalidDateRangeError extends DomainError {
     constructor(
          public readonly start: string,
          public readonly end: string
     ) {
          super(`Start date ${start} is after end date ${end}`, 'INVALID_DATE_RANGE', 400);
     }
}

export class NotFoundError extends DomainError {
     constructor(
          public readonly entity: string,
          public readonly entityId: number | string
     ) {
          super(`${entity} ${entityId} not found`, 'NOT_FOUND', 404);
     }
}

export class ConflictError extends DomainError {
     constructor(
          message: string,
          public readonly constraint?: string
     ) {
          super(message, 'CONFLICT', 409);
     }
}

export class LockTimeoutError extends DomainError {
     public readonly retriable = true;

     constructor(message: string = 'Timed out waiting for a stock row lock') {
          super(message, 'LOCK_TIMEOUT', 503);
     }
}

export class InvalidValueError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_VALUE', 400);
     }
}
