export const MAX_QUANTITY = 2147483647;

export const errorResponse = (description: string, example: string) => ({
     description,
     type: 'object',
     properties: {
          error: { type: 'string', example },
          message: { type: 'string' },
          details: { type: 'object', additionalProperties: true },
     },
});

export const stockErrorResponses = {
     400: errorResponse('Invalid request', 'INVALID_QUANTITY'),
     404: errorResponse('Record not found', 'NOT_FOUND'),
     409: errorResponse('Stock or state conflict', 'INSUFFICIENT_STOCK'),
     500: errorResponse('Internal server error', 'INTERNAL_ERROR'),
     503: errorResponse('Stock row lock not acquired in time, retry', 'LOCK_TIMEOUT'),
};

export const idParam = (name: string, description: string) => ({
     [name]: { type: 'integer', minimum: 1, description },
});

export const warehouseQuery = {
     type: 'object',
     properties: {
          warehouseId: { type: 'integer', minimum: 1, description: 'Restrict to one warehouse' },
     },
};

export const dateRangeQuery = {
     type: 'object',
     required: ['start', 'end'],
     properties: {
          start: { type: 'string', format: 'date', example: '2024-01-01' },
          end: { type: 'string', format: 'date', example: '2024-01-31' },
     },
};
