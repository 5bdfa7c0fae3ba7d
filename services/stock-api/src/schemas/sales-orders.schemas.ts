import { idParam, MAX_QUANTITY, stockErrorResponses } from './common.schemas';

const orderParams = {
     type: 'object',
     required: ['id'],
     properties: idParam('id', 'Sales order id'),
};

const lineParams = {
     type: 'object',
     required: ['id', 'lineId'],
     properties: {
          ...idParam('id', 'Sales order id'),
          ...idParam('lineId', 'Sales line id'),
     },
};

const salesLine = {
     type: 'object',
     required: ['itemId', 'quantity', 'unitPrice'],
     properties: {
          itemId: { type: 'integer', minimum: 1 },
          quantity: { type: 'integer', minimum: 1, maximum: MAX_QUANTITY, example: 5 },
          unitPrice: { type: 'number', minimum: 0, example: 29.9 },
          discountPercentage: { type: 'number', minimum: 0, maximum: 100, default: 0 },
     },
};

export const createSalesOrderSchema = {
     tags: ['sales-orders'],
     summary: 'Create a sales order and reserve its stock',
     description: 'All-or-nothing: either every line is reserved or nothing is.',
     body: {
          type: 'object',
          required: ['clientId', 'orderNumber', 'orderDate', 'lines'],
          properties: {
               clientId: { type: 'integer', minimum: 1 },
               orderNumber: { type: 'string', minLength: 1, maxLength: 50, example: 'SO-2024-0001' },
               orderDate: { type: 'string', format: 'date', example: '2024-03-05' },
               warehouseId: { type: 'integer', minimum: 1, nullable: true },
               discountAmount: { type: 'number', minimum: 0, default: 0 },
               notes: { type: 'string', nullable: true },
               lines: { type: 'array', minItems: 1, items: salesLine },
          },
     },
     response: stockErrorResponses,
};

export const salesOrderActionSchema = (summary: string) => ({
     tags: ['sales-orders'],
     summary,
     params: orderParams,
     response: stockErrorResponses,
});

export const addSalesLineSchema = {
     tags: ['sales-orders'],
     summary: 'Add a line to a PENDING sales order',
     params: orderParams,
     body: salesLine,
     response: stockErrorResponses,
};

export const updateSalesLineSchema = {
     tags: ['sales-orders'],
     summary: 'Edit a line of a PENDING sales order',
     description: 'Only the quantity delta is reserved or released.',
     params: lineParams,
     body: {
          type: 'object',
          minProperties: 1,
          properties: {
               quantity: { type: 'integer', minimum: 1, maximum: MAX_QUANTITY },
               unitPrice: { type: 'number', minimum: 0 },
               discountPercentage: { type: 'number', minimum: 0, maximum: 100 },
          },
     },
     response: stockErrorResponses,
};

export const removeSalesLineSchema = {
     tags: ['sales-orders'],
     summary: 'Remove a line from a PENDING sales order',
     params: lineParams,
     response: stockErrorResponses,
};
