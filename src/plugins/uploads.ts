import fp from 'fastify-plugin';
import { FastifyInstance } from 'fastify';
import fastifyMultipart from '@fastify/multipart';
import fastifyStatic from '@fastify/static';
import fs from 'fs';
import { UPLOADS_PREFIX } from '../types/constants.js';

export interface UploadOptions {
    uploadsDir: string;
    maxFileSize: number;
}

export default fp<UploadOptions>(async function configUploads(app: FastifyInstance, { uploadsDir, maxFileSize }) {
    app.register(fastifyMultipart, {
        limits: {
            fieldNameSize: 100,
            fieldSize: 10000, // max 10kb for description / tags
            fields: 10,
            fileSize: maxFileSize,
            files: 1, // one media file per request
            headerPairs: 2000,
            parts: 20
        },
        // oversized files are truncated and rejected by validateFileSize
        throwFileSizeLimit: false
    });

    fs.mkdirSync(uploadsDir, { recursive: true });

    // stored blobs are downloadable at /uploads/<stored name>
    app.register(fastifyStatic, {
        root: uploadsDir,
        prefix: `${UPLOADS_PREFIX}/`,
        decorateReply: false
    });
});
