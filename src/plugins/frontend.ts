import fp from 'fastify-plugin';
import { FastifyInstance } from 'fastify';
import fastifyStatic from '@fastify/static';
import fs from 'fs';
import path from 'path';
import { API_PREFIX, SERVICE_NAME, SERVICE_VERSION } from '../types/constants.js';
import { NotFoundError } from '../utils/errors.js';

/**========================================================================
 **                    FRONTEND + NOT FOUND HANDLING
 *? with a built single-page app in staticDir: serve it, and send
 *? index.html for unknown GET paths outside the api (client routing)
 *? without one: GET / describes the api
 *========================================================================**/

export default fp<{ staticDir: string }>(async function serveFrontend(app: FastifyInstance, { staticDir }) {
    const hasFrontend = fs.existsSync(path.join(staticDir, 'index.html'));

    if (hasFrontend) {
        await app.register(fastifyStatic, {
            root: staticDir,
            prefix: '/',
            wildcard: false
        });
    } else {
        app.get('/', { schema: { hide: true } }, async () => ({
            message: SERVICE_NAME,
            version: SERVICE_VERSION,
            docs: `${API_PREFIX}/docs`
        }));
    }

    app.setNotFoundHandler(async (request, reply) => {
        const isApiRoute = request.url === API_PREFIX || request.url.startsWith(`${API_PREFIX}/`);

        if (!hasFrontend || isApiRoute || request.method !== 'GET') {
            return reply.sendError(new NotFoundError('Endpoint not found'));
        }
        return reply.sendFile('index.html');
    });
});
