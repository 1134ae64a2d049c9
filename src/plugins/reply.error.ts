import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply } from 'fastify';
import { translateError } from '../utils/errors.js';

export interface ErrorReplyOptions {
    exposeDetails: boolean;
}

// every error leaves the api as { error: { code, message, details } }
export default fp<ErrorReplyOptions>(async function setErrorReply(app: FastifyInstance, { exposeDetails }) {
    app.decorateReply('sendError', function sendError(
        this: FastifyReply,
        error: unknown,
        fallbackMessage?: string
    ) {
        const appError = translateError(error, fallbackMessage, exposeDetails);

        if (appError.statusCode >= 500) {
            this.request.log.error({ err: error }, appError.message);
        } else {
            this.request.log.info({ code: appError.code }, appError.message);
        }

        return this.status(appError.statusCode).send(appError.toBody());
    });

    // thrown errors, schema validation failures, plugin errors
    app.setErrorHandler(function (error, request, reply) {
        return reply.sendError(error);
    });
});
