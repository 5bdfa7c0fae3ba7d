import { dateRangeQuery, stockErrorResponses } from './common.schemas';

export const profitLossSchema = {
     tags: ['accounting'],
     summary: 'Profit and loss over an inclusive date range',
     querystring: dateRangeQuery,
     response: stockErrorResponses,
};

export const createProfitLossReportSchema = {
     tags: ['accounting'],
     summary: 'Persist a profit and loss report for a period',
     body: dateRangeQuery,
     response: stockErrorResponses,
};

export const listProfitLossReportsSchema = {
     tags: ['accounting'],
     summary: 'List saved profit and loss reports, newest period first',
     response: stockErrorResponses,
};

export const ledgerSummarySchema = {
     tags: ['accounting'],
     summary: 'Debit and credit totals over an inclusive date range',
     querystring: dateRangeQuery,
     response: stockErrorResponses,
};
