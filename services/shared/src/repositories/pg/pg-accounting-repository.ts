import { PoolClient } from 'pg';
import { AccountingRepository } from '../repositories';
import { LedgerTotals, ProfitLoss, ProfitLossReport } from '../../types/stock.types';
import { toNumber } from '../../utils/money';

interface ProfitLossReportRow {
     id: string | number;
     period_start: string;
     period_end: string;
     total_revenue: string | number;
     total_cost_of_goods_sold: string | number;
     total_expenses: string | number;
     gross_profit: string | number;
     net_profit: string | number;
     created_at: Date;
}

const REPORT_COLUMNS = `
        id,
        to_char(period_start, 'YYYY-MM-DD') AS period_start,
        to_char(period_end, 'YYYY-MM-DD') AS period_end,
        total_revenue,
        total_cost_of_goods_sold,
        total_expenses,
        gross_profit,
        net_profit,
        created_at`;

function mapReport(row: ProfitLossReportRow): ProfitLossReport {
     return {
          id: toNumber(row.id),
          periodStart: row.period_start,
          periodEnd: row.period_end,
          revenue: toNumber(row.total_revenue),
          cogs: toNumber(row.total_cost_of_goods_sold),
          expenses: toNumber(row.total_expenses),
          grossProfit: toNumber(row.gross_profit),
          netProfit: toNumber(row.net_profit),
          createdAt: row.created_at,
     };
}

export class PgAccountingRepository implements AccountingRepository {
     constructor(private readonly client: PoolClient) {}

     async sumShippedSales(start: string, end: string): Promise<number> {
          const { rows } = await this.client.query<{ total: string | null }>(
               `
      SELECT COALESCE(SUM(total_amount), 0) AS total
      FROM sales_order
      WHERE status IN ('SHIPPED', 'DELIVERED')
        AND order_date BETWEEN $1 AND $2
    `,
               [start, end]
          );
          return toNumber(rows[0].total);
     }

     async sumReceivedPurchases(start: string, end: string): Promise<number> {
          const { rows } = await this.client.query<{ total: string | null }>(
               `
      SELECT COALESCE(SUM(total_amount), 0) AS total
      FROM purchase_order
      WHERE status = 'RECEIVED'
        AND order_date BETWEEN $1 AND $2
    `,
               [start, end]
          );
          return toNumber(rows[0].total);
     }

     async sumDebitPayments(start: string, end: string): Promise<number> {
          const { rows } = await this.client.query<{ total: string | null }>(
               `
      SELECT COALESCE(SUM(amount), 0) AS total
      FROM payment
      WHERE payment_type = 'DEBIT'
        AND date BETWEEN $1 AND $2
    `,
               [start, end]
          );
          return toNumber(rows[0].total);
     }

     async upsertProfitLossReport(
          start: string,
          end: string,
          values: ProfitLoss
     ): Promise<ProfitLossReport> {
          const { rows } = await this.client.query<ProfitLossReportRow>(
               `
      INSERT INTO profit_loss_report (
        period_start,
        period_end,
        total_revenue,
        total_cost_of_goods_sold,
        total_expenses,
        gross_profit,
        net_profit
      ) VALUES ($1, $2, $3, $4, $5, $6, $7)
      ON CONFLICT (period_start, period_end) DO UPDATE
      SET total_revenue = EXCLUDED.total_revenue,
          total_cost_of_goods_sold = EXCLUDED.total_cost_of_goods_sold,
          total_expenses = EXCLUDED.total_expenses,
          gross_profit = EXCLUDED.gross_profit,
          net_profit = EXCLUDED.net_profit
      RETURNING ${REPORT_COLUMNS}
    `,
               [
                    start,
                    end,
                    values.revenue,
                    values.cogs,
                    values.expenses,
                    values.grossProfit,
                    values.netProfit,
               ]
          );
          return mapReport(rows[0]);
     }

     async listProfitLossReports(): Promise<ProfitLossReport[]> {
          const { rows } = await this.client.query<ProfitLossReportRow>(
               `
      SELECT ${REPORT_COLUMNS}
      FROM profit_loss_report
      ORDER BY period_end DESC, id DESC
    `
          );
          return rows.map(mapReport);
     }

     async ledgerTotals(start: string, end: string): Promise<LedgerTotals> {
          const { rows } = await this.client.query<{
               debits: string | null;
               credits: string | null;
          }>(
               `
      SELECT
        COALESCE(SUM(debit_amount), 0) AS debits,
        COALESCE(SUM(credit_amount), 0) AS credits
      FROM ledger_entry
      WHERE date BETWEEN $1 AND $2
    `,
               [start, end]
          );
          return { debits: toNumber(rows[0].debits), credits: toNumber(rows[0].credits) };
     }
}
