import { idParam, MAX_QUANTITY, stockErrorResponses } from './common.schemas';

const orderParams = {
     type: 'object',
     required: ['id'],
     properties: idParam('id', 'Purchase order id'),
};

const receiptLines = {
     type: 'array',
     items: {
          type: 'object',
          required: ['lineId', 'quantity'],
          properties: {
               lineId: { type: 'integer', minimum: 1 },
               quantity: { type: 'integer', minimum: 0, maximum: MAX_QUANTITY },
          },
     },
};

const costFields = {
     unitCost: { type: 'number', minimum: 0, example: 12.5 },
     freightCost: { type: 'number', minimum: 0, default: 0 },
     customsDuty: { type: 'number', minimum: 0, default: 0 },
     otherCosts: { type: 'number', minimum: 0, default: 0 },
};

export const createPurchaseOrderSchema = {
     tags: ['purchase-orders'],
     summary: 'Create a purchase order',
     description: 'Creates a PENDING purchase order; landed cost is computed per line.',
     body: {
          type: 'object',
          required: ['vendorId', 'orderNumber', 'orderDate', 'lines'],
          properties: {
               vendorId: { type: 'integer', minimum: 1 },
               orderNumber: { type: 'string', minLength: 1, maxLength: 50, example: 'PO-2024-0001' },
               orderDate: { type: 'string', format: 'date', example: '2024-03-01' },
               warehouseId: { type: 'integer', minimum: 1, nullable: true },
               notes: { type: 'string', nullable: true },
               lines: {
                    type: 'array',
                    minItems: 1,
                    items: {
                         type: 'object',
                         required: ['itemId', 'quantity', 'unitCost'],
                         properties: {
                              itemId: { type: 'integer', minimum: 1 },
                              warehouseId: { type: 'integer', minimum: 1, nullable: true },
                              quantity: { type: 'integer', minimum: 1, maximum: MAX_QUANTITY, example: 100 },
                              ...costFields,
                         },
                    },
               },
          },
     },
     response: stockErrorResponses,
};

export const getPurchaseOrderSchema = {
     tags: ['purchase-orders'],
     summary: 'Get a purchase order with its lines',
     params: orderParams,
     response: stockErrorResponses,
};

export const updatePurchaseLineSchema = {
     tags: ['purchase-orders'],
     summary: 'Edit a line of a PENDING purchase order',
     params: {
          type: 'object',
          required: ['id', 'lineId'],
          properties: {
               ...idParam('id', 'Purchase order id'),
               ...idParam('lineId', 'Purchase line id'),
          },
     },
     body: {
          type: 'object',
          minProperties: 1,
          properties: {
               quantity: { type: 'integer', minimum: 1, maximum: MAX_QUANTITY },
               unitCost: { type: 'number', minimum: 0 },
               freightCost: { type: 'number', minimum: 0 },
               customsDuty: { type: 'number', minimum: 0 },
               otherCosts: { type: 'number', minimum: 0 },
          },
     },
     response: stockErrorResponses,
};

export const receivePurchaseOrderSchema = {
     tags: ['purchase-orders'],
     summary: 'Receive a purchase order into stock',
     description:
          'Marks every line received (ordered quantity unless given) and applies the unapplied quantity to stock at landed cost.',
     params: orderParams,
     body: {
          type: 'object',
          properties: {
               receivedQuantities: receiptLines,
          },
     },
     response: stockErrorResponses,
};

export const recordReceiptSchema = {
     tags: ['purchase-orders'],
     summary: 'Record a partial receipt',
     params: orderParams,
     body: {
          type: 'object',
          required: ['lines'],
          properties: {
               lines: { ...receiptLines, minItems: 1 },
          },
     },
     response: stockErrorResponses,
};

export const cancelPurchaseOrderSchema = {
     tags: ['purchase-orders'],
     summary: 'Cancel a PENDING purchase order',
     params: orderParams,
     response: stockErrorResponses,
};
