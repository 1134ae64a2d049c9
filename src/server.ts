import 'dotenv/config';
import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { SERVICE_NAME } from './types/constants.js';
import { debugPrint } from './utils/debug.print.js';

const config = loadConfig();

debugPrint({ ...config, jwtSecret: '********' }, SERVICE_NAME);

const server = await buildApp({
    config,
    logger: {
        level: config.logLevel,
        ...(config.environment !== 'production'
            ? { transport: { target: 'pino-pretty' } }
            : {})
    }
});

// close stores before exiting
const shutdown = async (signal: string) => {
    server.log.info(`${signal} received, shutting down ${SERVICE_NAME}...`);
    try {
        await server.close();
        process.exit(0);
    } catch (err) {
        server.log.error(err);
        process.exit(1);
    }
};

process.once('SIGINT', () => void shutdown('SIGINT'));
process.once('SIGTERM', () => void shutdown('SIGTERM'));

// start server
const start = async () => {
    try {
        await server.listen({ port: config.port, host: config.host });
    } catch (err) {
        server.log.error(err);
        process.exit(1);
    }
};

await start();
