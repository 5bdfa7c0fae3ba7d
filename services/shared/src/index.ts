// Database
export * from './db/client';

// Messaging
export * from './messaging/client';

// Repositories
export * from './repositories/repositories';
export * from './repositories/pg/pg-transaction-runner';

// Services
export * from './services/landed-cost';
export * from './services/stock-ledger-service';
export * from './services/purchase-fulfillment-service';
export * from './services/sales-fulfillment-service';
export * from './services/stock-alert-service';
export * from './services/profit-loss-service';
export * from './services/stock-engine';

// Types
export * from './types/stock.types';

// Utils
export * from './utils/logger';
export * from './utils/errors';
export * from './utils/money';
