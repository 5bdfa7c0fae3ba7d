import { FastifyInstance } from 'fastify';
import { StockEngine } from '@spareline/shared/src/services/stock-engine';
import {
     createProfitLossReportSchema,
     ledgerSummarySchema,
     listProfitLossReportsSchema,
     profitLossSchema,
} from '../schemas/accounting.schemas';
import { sendError } from './errors';

interface DateRange {
     start: string;
     end: string;
}

export async function registerAccountingRoutes(app: FastifyInstance, options: { engine: StockEngine }) {
     const { engine } = options;

     app.get<{ Querystring: DateRange }>(
          '/profit-loss',
          { schema: profitLossSchema },
          async (request, reply) => {
               try {
                    const { start, end } = request.query;
                    return reply.send(await engine.calculateProfitLoss(start, end));
               } catch (error) {
                    return sendError(reply, error, 'Failed to calculate profit and loss');
               }
          }
     );

     app.post<{ Body: DateRange }>(
          '/profit-loss/reports',
          { schema: createProfitLossReportSchema },
          async (request, reply) => {
               try {
                    const { start, end } = request.body;
                    return reply.code(201).send(await engine.createProfitLossReport(start, end));
               } catch (error) {
                    return sendError(reply, error, 'Failed to create profit and loss report');
               }
          }
     );

     app.get(
          '/profit-loss/reports',
          { schema: listProfitLossReportsSchema },
          async (_request, reply) => {
               try {
                    return reply.send(await engine.listProfitLossReports());
               } catch (error) {
                    return sendError(reply, error, 'Failed to list profit and loss reports');
               }
          }
     );

     app.get<{ Querystring: DateRange }>(
          '/ledger-summary',
          { schema: ledgerSummarySchema },
          async (request, reply) => {
               try {
                    const { start, end } = request.query;
                    return reply.send(await engine.ledgerSummary(start, end));
               } catch (error) {
                    return sendError(reply, error, 'Failed to summarise ledger');
               }
          }
     );
}
