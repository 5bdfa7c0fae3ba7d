import { StockRepositories } from '../repositories/repositories';
import {
     ItemStock,
     StockEventType,
     StockKey,
     StockLevel,
     StockMovedEvent,
     StockMovementType,
     StockSnapshot,
     StockThresholds,
} from '../types/stock.types';
import { InsufficientStockError, InvalidQuantityError, NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { round4 } from '../utils/money';

export function stockKeyOf(key: StockKey): string {
     return `${key.itemId}:${key.warehouseId}`;
}

export function toSnapshot(level: StockLevel): StockSnapshot {
     return {
          ledgerId: level.id,
          itemId: level.itemId,
          warehouseId: level.warehouseId,
          quantity: level.quantity,
          reserved: level.reservedQuantity,
          available: level.availableQuantity,
          min: level.minQuantity,
          max: level.maxQuantity,
          averageCost: level.averageCost,
     };
}

function withQuantities(level: StockLevel, quantity: number, reservedQuantity: number): StockLevel {
     return {
          ...level,
          quantity,
          reservedQuantity,
          availableQuantity: quantity - reservedQuantity,
     };
}

function assertPositiveQuantity(quantity: number, key: StockKey): void {
     if (!Number.isInteger(quantity) || quantity <= 0) {
          throw new InvalidQuantityError(
               `Quantity must be a positive integer for item ${key.itemId} in warehouse ${key.warehouseId}, got ${quantity}`
          );
     }
}

/**
 * Per (item, warehouse) quantity arithmetic.
 *
 * Every method must be called inside a transaction; each one locks its row before reading
 * it, so the check and the write below always see the same values.
 */
export class StockLedgerService {
     /**
      * Lock several ledger rows up front in a deterministic order
      */
     async lockRows(repos: StockRepositories, keys: StockKey[]): Promise<Map<string, StockLevel>> {
          const levels = await repos.ledger.lockForUpdate(keys);
          return new Map(levels.map((level) => [stockKeyOf(level), level]));
     }

     async getOrCreate(repos: StockRepositories, key: StockKey): Promise<StockLevel> {
          const [existing] = await repos.ledger.lockForUpdate([key]);
          if (existing) {
               return existing;
          }

          await repos.ledger.insertIfMissing(key);
          const [created] = await repos.ledger.lockForUpdate([key]);
          if (!created) {
               throw new NotFoundError('Stock ledger', stockKeyOf(key));
          }

          logger.info(
               { itemId: key.itemId, warehouseId: key.warehouseId, stockLedgerId: created.id },
               'Stock ledger row created'
          );
          return created;
     }

     /**
      * Add received units and fold their cost into the weighted average
      */
     async increase(
          repos: StockRepositories,
          key: StockKey,
          quantity: number,
          unitCost: number,
          referenceId: string
     ): Promise<StockLevel> {
          assertPositiveQuantity(quantity, key);
          if (!Number.isFinite(unitCost) || unitCost < 0) {
               throw new InvalidQuantityError(`Unit cost must be a non-negative amount, got ${unitCost}`);
          }

          const current = await this.getOrCreate(repos, key);
          const totalQuantity = current.quantity + quantity;
          const averageCost =
               totalQuantity === 0
                    ? unitCost
                    : round4(
                           (current.quantity * current.averageCost + quantity * unitCost) /
                                totalQuantity
                      );

          const next: StockLevel = {
               ...withQuantities(current, totalQuantity, current.reservedQuantity),
               averageCost,
               lastRestockedAt: new Date(),
          };

          await repos.ledger.update(next);
          await this.record(repos, current, next, 'RECEIPT', 'StockReceived', referenceId, unitCost);

          logger.debug(
               { ...key, quantity, unitCost, newQuantity: next.quantity, averageCost },
               'Stock increased'
          );
          return next;
     }

     async reserve(
          repos: StockRepositories,
          key: StockKey,
          quantity: number,
          referenceId: string
     ): Promise<StockLevel> {
          assertPositiveQuantity(quantity, key);

          const [current] = await repos.ledger.lockForUpdate([key]);
          const available = current ? current.availableQuantity : 0;

          if (!current || available < quantity) {
               throw new InsufficientStockError(key.itemId, key.warehouseId, quantity, available);
          }

          const next = withQuantities(current, current.quantity, current.reservedQuantity + quantity);

          await repos.ledger.update(next);
          await this.record(repos, current, next, 'RESERVE', 'StockReserved', referenceId);

          logger.debug(
               { ...key, quantity, reserved: next.reservedQuantity, available: next.availableQuantity },
               'Stock reserved'
          );
          return next;
     }

     /**
      * Give reserved units back to available. Clamped at zero so a repeated cancellation
      * can never drive the reservation negative.
      */
     async releaseReservation(
          repos: StockRepositories,
          key: StockKey,
          quantity: number,
          referenceId: string
     ): Promise<StockLevel | null> {
          assertPositiveQuantity(quantity, key);

          const [current] = await repos.ledger.lockForUpdate([key]);
          if (!current) {
               logger.warn({ ...key, quantity, referenceId }, 'No stock ledger row to release from');
               return null;
          }

          if (current.reservedQuantity < quantity) {
               logger.warn(
                    { ...key, quantity, reserved: current.reservedQuantity, referenceId },
                    'Release exceeds outstanding reservation, clamping to zero'
               );
          }

          const next = withQuantities(
               current,
               current.quantity,
               Math.max(0, current.reservedQuantity - quantity)
          );

          if (next.reservedQuantity === current.reservedQuantity) {
               return current;
          }

          await repos.ledger.update(next);
          await this.record(repos, current, next, 'RELEASE', 'StockReleased', referenceId);
          return next;
     }

     /**
      * Take units physically out of the warehouse
      */
     async reduce(
          repos: StockRepositories,
          key: StockKey,
          quantity: number,
          referenceId: string,
          fromReserved: boolean = true
     ): Promise<StockLevel> {
          assertPositiveQuantity(quantity, key);

          const [current] = await repos.ledger.lockForUpdate([key]);
          // Units that are not drawn from a reservation must not eat into other orders' reservations
          const limit = current ? (fromReserved ? current.quantity : current.availableQuantity) : 0;

          if (!current || limit < quantity) {
               throw new InsufficientStockError(key.itemId, key.warehouseId, quantity, limit);
          }

          if (fromReserved && current.reservedQuantity < quantity) {
               logger.warn(
                    { ...key, quantity, reserved: current.reservedQuantity, referenceId },
                    'Reducing more than is reserved'
               );
          }

          const next = withQuantities(
               current,
               current.quantity - quantity,
               fromReserved
                    ? Math.max(0, current.reservedQuantity - quantity)
                    : current.reservedQuantity
          );

          await repos.ledger.update(next);
          await this.record(
               repos,
               current,
               next,
               fromReserved ? 'SHIPMENT' : 'ADJUSTMENT',
               'StockShipped',
               referenceId
          );

          logger.debug({ ...key, quantity, newQuantity: next.quantity }, 'Stock reduced');
          return next;
     }

     async configureThresholds(
          repos: StockRepositories,
          key: StockKey,
          thresholds: StockThresholds
     ): Promise<StockLevel> {
          const { minQuantity } = thresholds;
          const maxQuantity = thresholds.maxQuantity ?? null;

          if (!Number.isInteger(minQuantity) || minQuantity < 0) {
               throw new InvalidQuantityError(`Minimum quantity must be a non-negative integer, got ${minQuantity}`);
          }
          if (maxQuantity !== null && (!Number.isInteger(maxQuantity) || maxQuantity < minQuantity)) {
               throw new InvalidQuantityError(
                    `Maximum quantity must be an integer no lower than the minimum ${minQuantity}, got ${maxQuantity}`
               );
          }

          const current = await this.getOrCreate(repos, key);
          const next: StockLevel = { ...current, minQuantity, maxQuantity };

          await repos.ledger.update(next);
          logger.info({ ...key, minQuantity, maxQuantity }, 'Stock thresholds configured');
          return next;
     }

     /**
      * Total on hand across warehouses, with the per-warehouse rows behind it
      */
     async itemStock(repos: StockRepositories, itemId: number): Promise<ItemStock> {
          const total = await repos.items.findStockTotal(itemId);
          if (!total) {
               throw new NotFoundError('Item', itemId);
          }

          const levels = await repos.ledger.listByItem(itemId);
          return { ...total, levels: levels.map(toSnapshot) };
     }

     private async record(
          repos: StockRepositories,
          before: StockLevel,
          after: StockLevel,
          type: StockMovementType,
          eventType: StockEventType,
          referenceId: string,
          unitCost?: number
     ): Promise<void> {
          const quantityDelta = after.quantity - before.quantity;
          const reservedDelta = after.reservedQuantity - before.reservedQuantity;

          await repos.ledger.recordMovement({
               stockLedgerId: after.id,
               type,
               quantityDelta,
               reservedDelta,
               unitCost,
               referenceId,
          });

          const event: StockMovedEvent = {
               stockLedgerId: after.id,
               itemId: after.itemId,
               warehouseId: after.warehouseId,
               quantityDelta,
               reservedDelta,
               quantity: after.quantity,
               reservedQuantity: after.reservedQuantity,
               referenceId,
               timestamp: new Date().toISOString(),
          };
          await repos.events.append(eventType, { ...event });
     }
}
