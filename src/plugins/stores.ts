import fp from 'fastify-plugin';
import { FastifyInstance } from 'fastify';
import type { Stores } from '../types/stores.js';

// explicit init / teardown of the store handles the app was built with
export default fp<Stores>(async function connectStores(app: FastifyInstance, { documents, blobs }) {
    app.log.info('Connecting stores...');

    try {
        await documents.init(app.log);
        await blobs.init(app.log);
    } catch (err) {
        app.log.error({ err }, 'Failed to initialize stores');
        throw err;
    }

    app.addHook('onClose', async () => {
        app.log.info('Closing stores...');
        await documents.close();
        await blobs.close();
    });
});
