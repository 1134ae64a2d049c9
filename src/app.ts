import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import { loadConfig, type AppConfig } from './config.js';
import connectStores from './plugins/stores.js';
import configCors from './plugins/cors.js';
import configUploads from './plugins/uploads.js';
import setErrorReply from './plugins/reply.error.js';
import configSwagger from './plugins/swagger.js';
import serveFrontend from './plugins/frontend.js';
import { authRoutes } from './routes/auth.routes.js';
import { mediaRoutes } from './routes/media.routes.js';
import { healthSchema } from './routes/schemas/common.schema.js';
import { CredentialService } from './services/credentials.service.js';
import { PostgresDocumentStore } from './stores/postgres.store.js';
import { LocalBlobStore } from './stores/local.blob.store.js';
import { API_PREFIX, SERVICE_NAME, SERVICE_VERSION, UPLOADS_PREFIX } from './types/constants.js';
import type { Services, Stores } from './types/stores.js';

export interface BuildAppOptions extends FastifyServerOptions {
    config?: AppConfig;
    // store handles; built from config when omitted
    stores?: Stores;
}

export function createStores(config: AppConfig): Stores {
    return {
        documents: new PostgresDocumentStore(config.databaseUrl, config.dbConnectRetries),
        blobs: new LocalBlobStore(config.uploadsDir, `${config.publicBaseUrl}${UPLOADS_PREFIX}`)
    };
}

/**========================================================================
 **                           BUILD APP
 *? creates an instance of the app with routes & plugins registered
 *? separate from server logic to enable component testing
 *@param options: fastify options + app config + store handles
 *@return app: fastify instance
 *========================================================================**/

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
    const { config = loadConfig(), stores, ...fastifyOptions } = options;
    const app = Fastify(fastifyOptions);

    // init store handles; closed again when the app closes
    const { documents, blobs } = stores ?? createStores(config);
    await app.register(connectStores, { documents, blobs });

    app.register(configCors, { allowedOrigins: config.allowedOrigins });

    // handle file uploads + serve stored files
    app.register(configUploads, { uploadsDir: config.uploadsDir, maxFileSize: config.maxFileSize });

    // register error handler for requests
    app.register(setErrorReply, { exposeDetails: config.exposeErrorDetails });

    // register swagger; awaited so it sees every route declared below
    await app.register(configSwagger);

    const services: Services = {
        config,
        documents,
        blobs,
        credentials: new CredentialService({
            secret: config.jwtSecret,
            expiresIn: config.jwtExpiresIn,
            saltRounds: config.bcryptRounds
        })
    };

    app.get(`${API_PREFIX}/health`, { schema: healthSchema }, async () => ({
        status: 'healthy',
        service: SERVICE_NAME,
        version: SERVICE_VERSION
    }));

    // define application routes
    app.register(authRoutes, { prefix: API_PREFIX, ...services });
    app.register(mediaRoutes, { prefix: API_PREFIX, ...services });

    // frontend last: owns "/" and the not-found handler
    app.register(serveFrontend, { staticDir: config.staticDir });

    return app;
}
