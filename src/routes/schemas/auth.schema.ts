import { errorSchema } from './common.schema.js';

const publicUserSchema = {
    type: 'object',
    properties: {
        id: { type: 'string' },
        username: { type: 'string' },
        email: { type: 'string' },
        createdAt: { type: 'string' },
    },
    required: ['id', 'username', 'email', 'createdAt'],
    additionalProperties: false,
};

const sessionSchema = {
    type: 'object',
    properties: {
        token: { type: 'string', description: 'Bearer token for protected routes' },
        user: publicUserSchema,
    },
    required: ['token', 'user'],
    additionalProperties: false,
};

export const registerSchema = {
    tags: ['Authentication'],
    summary: 'Register',
    description: 'Creates a new user account and returns an access token.',
    body: {
        type: 'object',
        properties: {
            username: { type: 'string', minLength: 1, maxLength: 50 },
            email: { type: 'string', format: 'email', maxLength: 254 },
            password: { type: 'string', minLength: 8, maxLength: 128 },
        },
        required: ['username', 'email', 'password'],
        additionalProperties: false,
    },
    response: {
        200: sessionSchema,
        400: errorSchema,
    },
};

export const loginSchema = {
    tags: ['Authentication'],
    summary: 'Login',
    description: 'Authenticates with email + password and returns an access token.',
    body: {
        type: 'object',
        properties: {
            email: { type: 'string', minLength: 1, maxLength: 254 },
            password: { type: 'string', minLength: 1, maxLength: 128 },
        },
        required: ['email', 'password'],
        additionalProperties: false,
    },
    response: {
        200: sessionSchema,
        401: errorSchema,
    },
};
