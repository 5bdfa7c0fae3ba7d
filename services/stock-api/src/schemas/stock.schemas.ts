import { idParam, MAX_QUANTITY, stockErrorResponses, warehouseQuery } from './common.schemas';

const stockParams = {
     type: 'object',
     required: ['itemId', 'warehouseId'],
     properties: {
          ...idParam('itemId', 'Item id'),
          ...idParam('warehouseId', 'Warehouse id'),
     },
};

export const getStockSnapshotSchema = {
     tags: ['stock'],
     summary: 'Stock snapshot of one item in one warehouse',
     params: stockParams,
     response: stockErrorResponses,
};

export const configureThresholdsSchema = {
     tags: ['stock'],
     summary: 'Set minimum and maximum stock levels',
     params: stockParams,
     body: {
          type: 'object',
          required: ['minQuantity'],
          properties: {
               minQuantity: { type: 'integer', minimum: 0, maximum: MAX_QUANTITY, example: 10 },
               maxQuantity: { type: 'integer', minimum: 0, maximum: MAX_QUANTITY, nullable: true, example: 200 },
          },
     },
     response: stockErrorResponses,
};

export const listStockSchema = (summary: string) => ({
     tags: ['stock'],
     summary,
     querystring: warehouseQuery,
     response: stockErrorResponses,
});

export const listAlertsSchema = {
     tags: ['alerts'],
     summary: 'List pending low-stock alerts',
     querystring: warehouseQuery,
     response: stockErrorResponses,
};

export const alertActionSchema = (summary: string) => ({
     tags: ['alerts'],
     summary,
     params: {
          type: 'object',
          required: ['id'],
          properties: idParam('id', 'Alert id'),
     },
     response: stockErrorResponses,
});

export const getItemStockSchema = {
     tags: ['items'],
     summary: 'Total stock of an item across every warehouse',
     params: {
          type: 'object',
          required: ['itemId'],
          properties: idParam('itemId', 'Item id'),
     },
     response: stockErrorResponses,
};

export const listItemsBelowReorderLevelSchema = {
     tags: ['items'],
     summary: 'Active items whose total stock is at or below their reorder level',
     response: stockErrorResponses,
};
