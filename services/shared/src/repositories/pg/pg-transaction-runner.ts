import { PoolClient } from 'pg';
import { withConnection, withTransaction } from '../../db/client';
import { StockRepositories, TransactionRunner } from '../repositories';
import { PgAccountingRepository } from './pg-accounting-repository';
import { PgDomainEventRepository } from './pg-domain-event-repository';
import { PgItemRepository } from './pg-item-repository';
import { PgPurchaseOrderRepository } from './pg-purchase-order-repository';
import { PgSalesOrderRepository } from './pg-sales-order-repository';
import { PgStockAlertRepository } from './pg-stock-alert-repository';
import { PgStockLedgerRepository } from './pg-stock-ledger-repository';

export function createPgRepositories(client: PoolClient): StockRepositories {
     return {
          ledger: new PgStockLedgerRepository(client),
          items: new PgItemRepository(client),
          purchases: new PgPurchaseOrderRepository(client),
          sales: new PgSalesOrderRepository(client),
          alerts: new PgStockAlertRepository(client),
          accounting: new PgAccountingRepository(client),
          events: new PgDomainEventRepository(client),
     };
}

export class PgTransactionRunner implements TransactionRunner {
     constructor(
          private readonly lockTimeoutMs: number = parseInt(
               process.env.STOCK_LOCK_TIMEOUT_MS || '3000',
               10
          )
     ) {}

     async transaction<T>(fn: (repos: StockRepositories) => Promise<T>): Promise<T> {
          return withTransaction((client) => fn(createPgRepositories(client)), {
               lockTimeoutMs: this.lockTimeoutMs,
          });
     }

     async read<T>(fn: (repos: StockRepositories) => Promise<T>): Promise<T> {
          return withConnection((client) => fn(createPgRepositories(client)));
     }
}
