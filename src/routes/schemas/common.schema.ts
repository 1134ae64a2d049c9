export const errorSchema = {
    type: 'object',
    properties: {
        error: {
            type: 'object',
            properties: {
                code: { type: 'string' },
                message: { type: 'string' },
                details: { type: ['string', 'null'] },
            },
            required: ['code', 'message', 'details'],
        },
    },
    required: ['error'],
};

export const healthSchema = {
    tags: ['Health'],
    summary: 'Health check',
    response: {
        200: {
            type: 'object',
            properties: {
                status: { type: 'string' },
                service: { type: 'string' },
                version: { type: 'string' },
            },
            required: ['status', 'service', 'version'],
        },
    },
};
