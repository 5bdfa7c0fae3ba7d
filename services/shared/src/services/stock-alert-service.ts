import { StockRepositories } from '../repositories/repositories';
import { LowStockAlertRaisedEvent, StockAlert, StockLevel } from '../types/stock.types';
import { InvalidTransitionError, NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

export function lowStockMessage(level: StockLevel): string {
     return `Low stock alert for ${level.itemName} in ${level.warehouseName}. Current quantity: ${level.quantity}, Minimum required: ${level.minQuantity}`;
}

export class StockAlertMonitor {
     /**
      * Raise or refresh the pending alert of one ledger row. Acknowledged alerts are left as they are.
      */
     async evaluate(repos: StockRepositories, stockLedgerId: number): Promise<StockAlert | null> {
          const level = await repos.ledger.findById(stockLedgerId);
          if (!level) {
               logger.warn({ stockLedgerId }, 'Stock ledger row vanished before alert evaluation');
               return null;
          }

          if (level.quantity > level.minQuantity) {
               return null;
          }

          const pending = await repos.alerts.findPending(stockLedgerId);
          if (pending) {
               if (pending.currentQuantity === level.quantity) {
                    return pending;
               }

               const refreshed: StockAlert = {
                    ...pending,
                    currentQuantity: level.quantity,
                    minQuantity: level.minQuantity,
                    message: lowStockMessage(level),
               };
               await repos.alerts.update(refreshed);
               logger.debug({ alertId: pending.id, quantity: level.quantity }, 'Stock alert refreshed');
               return refreshed;
          }

          const alert = await repos.alerts.insert({
               stockLedgerId,
               itemId: level.itemId,
               warehouseId: level.warehouseId,
               currentQuantity: level.quantity,
               minQuantity: level.minQuantity,
               status: 'PENDING',
               message: lowStockMessage(level),
          });

          if (!alert) {
               // a concurrent evaluation raised it first
               return repos.alerts.findPending(stockLedgerId);
          }

          const event: LowStockAlertRaisedEvent = {
               alertId: alert.id,
               stockLedgerId,
               itemId: alert.itemId,
               warehouseId: alert.warehouseId,
               currentQuantity: alert.currentQuantity,
               minQuantity: alert.minQuantity,
               message: alert.message,
               timestamp: new Date().toISOString(),
          };
          await repos.events.append('LowStockAlertRaised', { ...event });

          logger.warn(
               {
                    alertId: alert.id,
                    itemId: alert.itemId,
                    warehouseId: alert.warehouseId,
                    quantity: alert.currentQuantity,
                    minQuantity: alert.minQuantity,
               },
               'Low stock alert raised'
          );
          return alert;
     }

     async acknowledge(repos: StockRepositories, alertId: number): Promise<StockAlert> {
          const alert = await this.lockAlert(repos, alertId);
          if (alert.status !== 'PENDING') {
               throw new InvalidTransitionError('Stock alert', alertId, alert.status, 'acknowledge');
          }

          const updated: StockAlert = { ...alert, status: 'ACKNOWLEDGED', acknowledgedAt: new Date() };
          await repos.alerts.update(updated);

          logger.info({ alertId }, 'Stock alert acknowledged');
          return updated;
     }

     async resolve(repos: StockRepositories, alertId: number): Promise<StockAlert> {
          const alert = await this.lockAlert(repos, alertId);
          if (alert.status === 'RESOLVED') {
               throw new InvalidTransitionError('Stock alert', alertId, alert.status, 'resolve');
          }

          const updated: StockAlert = { ...alert, status: 'RESOLVED', resolvedAt: new Date() };
          await repos.alerts.update(updated);

          logger.info({ alertId }, 'Stock alert resolved');
          return updated;
     }

     async listPending(repos: StockRepositories, warehouseId?: number): Promise<StockAlert[]> {
          return repos.alerts.listPending(warehouseId);
     }

     private async lockAlert(repos: StockRepositories, alertId: number): Promise<StockAlert> {
          const alert = await repos.alerts.findById(alertId, { forUpdate: true });
          if (!alert) {
               throw new NotFoundError('Stock alert', alertId);
          }
          return alert;
     }
}
