import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { CredentialService } from '../services/credentials.service.js';
import { UnauthorizedError } from '../utils/errors.js';

const BEARER = /^Bearer\s+(\S+)$/i;

// resolve the current user from the bearer token
// runs on request so unauthenticated calls never reach validation or body parsing
export default fp<{ credentials: CredentialService }>(async function userContext(app: FastifyInstance, { credentials }) {
    app.addHook('onRequest', async (request: FastifyRequest) => {
        const header = request.headers.authorization;
        const match = header ? BEARER.exec(header) : null;

        if (!match) {
            throw new UnauthorizedError('Not authenticated');
        }

        request.user = credentials.verifyToken(match[1]);
    });
});
