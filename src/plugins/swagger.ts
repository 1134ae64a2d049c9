import fp from 'fastify-plugin';
import { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import { API_PREFIX, SERVICE_NAME, SERVICE_VERSION } from '../types/constants.js';

export default fp(async function configSwagger(app: FastifyInstance) {
    // Generates the OpenAPI document from route schemas
    await app.register(swagger, {
        openapi: {
            info: {
                title: SERVICE_NAME,
                description: 'REST API for cloud-based media storage and management',
                version: SERVICE_VERSION,
            },
            components: {
                securitySchemes: {
                    // token from POST /api/auth/login or /api/auth/register
                    bearerAuth: {
                        type: 'http',
                        scheme: 'bearer',
                        bearerFormat: 'JWT',
                    },
                },
            },
        },
    });

    // Serves the Swagger UI
    await app.register(swaggerUI, {
        routePrefix: `${API_PREFIX}/docs`,
        staticCSP: true,
        uiConfig: {
            docExpansion: 'list',
            deepLinking: true,
        },
    });

    app.get(`${API_PREFIX}/openapi.json`, { schema: { hide: true } }, async () => app.swagger());
});
