import { StockRepositories } from '../repositories/repositories';
import { LedgerSummary, ProfitLoss, ProfitLossReport } from '../types/stock.types';
import { InvalidDateRangeError } from '../utils/errors';
import { logger } from '../utils/logger';
import { round2 } from '../utils/money';

// Dates are 'YYYY-MM-DD', so string order is calendar order
function assertRange(start: string, end: string): void {
     if (start > end) {
          throw new InvalidDateRangeError(start, end);
     }
}

export class ProfitLossAggregator {
     /**
      * Revenue from shipped or delivered sales, cost of goods from received purchases,
      * expenses from debit payments; every bound is inclusive
      */
     async calculate(repos: StockRepositories, start: string, end: string): Promise<ProfitLoss> {
          assertRange(start, end);

          const revenue = await repos.accounting.sumShippedSales(start, end);
          const cogs = await repos.accounting.sumReceivedPurchases(start, end);
          const expenses = await repos.accounting.sumDebitPayments(start, end);

          const grossProfit = round2(revenue - cogs);
          return {
               revenue: round2(revenue),
               cogs: round2(cogs),
               expenses: round2(expenses),
               grossProfit,
               netProfit: round2(grossProfit - expenses),
          };
     }

     async createReport(repos: StockRepositories, start: string, end: string): Promise<ProfitLossReport> {
          const values = await this.calculate(repos, start, end);
          const report = await repos.accounting.upsertProfitLossReport(start, end, values);

          logger.info(
               { reportId: report.id, periodStart: start, periodEnd: end, netProfit: report.netProfit },
               'Profit and loss report saved'
          );
          return report;
     }

     async listReports(repos: StockRepositories): Promise<ProfitLossReport[]> {
          return repos.accounting.listProfitLossReports();
     }

     async ledgerSummary(repos: StockRepositories, start: string, end: string): Promise<LedgerSummary> {
          assertRange(start, end);

          const { debits, credits } = await repos.accounting.ledgerTotals(start, end);
          return {
               startDate: start,
               endDate: end,
               totalDebits: round2(debits),
               totalCredits: round2(credits),
               balance: round2(credits - debits),
          };
     }
}
