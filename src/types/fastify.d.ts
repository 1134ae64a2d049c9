/**========================================================================
 * *                      TYPE DECLARATIONS: FASTIFY
 * 
 *   - extends fastify to include custom definitions
 *========================================================================**/

import type { AuthUser } from '../services/credentials.service.js';

declare module 'fastify' {
    interface FastifyReply {
        sendError(error: unknown, fallbackMessage?: string): FastifyReply;
    }

    interface FastifyRequest {
        user: AuthUser;
    }
}
