import fp from 'fastify-plugin';
import { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';

export default fp<{ allowedOrigins: string[] }>(async function configCors(app: FastifyInstance, { allowedOrigins }) {
    await app.register(cors, {
        // "*" reflects the caller's origin, which credentials mode requires
        origin: allowedOrigins.includes('*') ? true : allowedOrigins,
        credentials: true,
        methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS']
    });
});
