import {
     AlreadyReceivedError,
     ConflictError,
     DomainError,
     InsufficientStockError,
     InvalidDateRangeError,
     InvalidQuantityError,
     InvalidTransitionError,
     InvalidValueError,
     LockTimeoutError,
     MissingWarehouseError,
     NotFoundError,
} from '@spareline/shared/src/utils/errors';

describe('Error Classes', () => {
     describe('DomainError', () => {
          it('should create a domain error with message and code', () => {
               const error = new DomainError('Test error', 'TEST_CODE');
               expect(error.message).toBe('Test error');
               expect(error.code).toBe('TEST_CODE');
               expect(error.statusCode).toBe(400);
               expect(error.name).toBe('DomainError');
               expect(error.details).toEqual({});
               expect(error instanceof Error).toBe(true);
          });

          it('should accept custom status code', () => {
               const error = new DomainError('Test error', 'TEST_CODE', 500);
               expect(error.statusCode).toBe(500);
          });
     });

     describe('InsufficientStockError', () => {
          it('should carry the item, warehouse and both quantities', () => {
               const error = new InsufficientStockError(7, 2, 60, 40);
               expect(error.message).toBe(
                    'Insufficient stock for item 7 in warehouse 2: requested 60, available 40'
               );
               expect(error.code).toBe('INSUFFICIENT_STOCK');
               expect(error.statusCode).toBe(409);
               expect(error.name).toBe('InsufficientStockError');
               expect(error.details).toEqual({ itemId: 7, warehouseId: 2, requested: 60, available: 40 });
          });
     });

     describe('InvalidTransitionError', () => {
          it('should name the entity, its status and the refused action', () => {
               const error = new InvalidTransitionError('Sales order', 12, 'SHIPPED', 'cancel');
               expect(error.message).toBe('Cannot cancel Sales order 12 while it is SHIPPED');
               expect(error.code).toBe('INVALID_TRANSITION');
               expect(error.statusCode).toBe(409);
               expect(error.details).toEqual({
                    entity: 'Sales order',
                    id: 12,
                    currentStatus: 'SHIPPED',
                    action: 'cancel',
               });
          });
     });

     describe('AlreadyReceivedError', () => {
          it('should create error with order ID', () => {
               const error = new AlreadyReceivedError(3);
               expect(error.message).toBe('Purchase order 3 has already been received');
               expect(error.code).toBe('ALREADY_RECEIVED');
               expect(error.statusCode).toBe(409);
               expect(error.details).toEqual({ orderId: 3 });
          });
     });

     describe('MissingWarehouseError', () => {
          it('should describe an order without a warehouse', () => {
               const error = new MissingWarehouseError('SO-1');
               expect(error.message).toBe('Order SO-1 has no warehouse');
               expect(error.statusCode).toBe(400);
          });

          it('should name the item when only one line lacks a warehouse', () => {
               const error = new MissingWarehouseError('PO-1', 9);
               expect(error.message).toBe('Order PO-1 has no warehouse for item 9');
               expect(error.details).toEqual({ orderRef: 'PO-1', itemId: 9 });
          });
     });

     describe('InvalidQuantityError', () => {
          it('should create error with message', () => {
               const error = new InvalidQuantityError('Quantity must be positive');
               expect(error.message).toBe('Quantity must be positive');
               expect(error.code).toBe('INVALID_QUANTITY');
               expect(error.statusCode).toBe(400);
          });
     });

     describe('InvalidDateRangeError', () => {
          it('should include both bounds', () => {
               const error = new InvalidDateRangeError('2024-02-01', '2024-01-01');
               expect(error.message).toBe('Start date 2024-02-01 is after end date 2024-01-01');
               expect(error.code).toBe('INVALID_DATE_RANGE');
          });
     });

     describe('NotFoundError', () => {
          it('should create error with entity and ID', () => {
               const error = new NotFoundError('Purchase order', 42);
               expect(error.message).toBe('Purchase order 42 not found');
               expect(error.code).toBe('NOT_FOUND');
               expect(error.statusCode).toBe(404);
          });
     });

     describe('ConflictError', () => {
          it('should keep the violated constraint', () => {
               const error = new ConflictError('Duplicate value', 'sales_order_order_number_key');
               expect(error.statusCode).toBe(409);
               expect(error.constraint).toBe('sales_order_order_number_key');
          });
     });

     describe('LockTimeoutError', () => {
          it('should be retriable with a 503 status', () => {
               const error = new LockTimeoutError();
               expect(error.message).toBe('Timed out waiting for a stock row lock');
               expect(error.code).toBe('LOCK_TIMEOUT');
               expect(error.statusCode).toBe(503);
               expect(error.retriable).toBe(true);
          });
     });

     describe('InvalidValueError', () => {
          it('should reject the value with a 400 status', () => {
               const error = new InvalidValueError('Invalid value: 22008');
               expect(error.message).toBe('Invalid value: 22008');
               expect(error.code).toBe('INVALID_VALUE');
               expect(error.statusCode).toBe(400);
               expect(error.name).toBe('InvalidValueError');
          });
     });

     describe('Error inheritance', () => {
          it('should maintain error stack traces', () => {
               const error = new DomainError('Test', 'TEST');
               expect(error.stack).toBeDefined();
               expect(error.stack).toContain('DomainError');
          });

          it('should be catchable as Error', () => {
               const error: unknown = new InsufficientStockError(1, 1, 10, 5);
               expect(error instanceof Error).toBe(true);
               expect(error instanceof DomainError).toBe(true);
          });
     });
});
