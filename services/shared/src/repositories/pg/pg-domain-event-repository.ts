import { PoolClient } from 'pg';
import { DomainEventRepository } from '../repositories';
import { StockEventType } from '../../types/stock.types';

export class PgDomainEventRepository implements DomainEventRepository {
     constructor(private readonly client: PoolClient) {}

     async append(type: StockEventType, payload: Record<string, unknown>): Promise<void> {
          await this.client.query(
               `
      INSERT INTO domain_event (type, payload)
      VALUES ($1, $2::jsonb)
    `,
               [type, JSON.stringify(payload)]
          );
     }
}
