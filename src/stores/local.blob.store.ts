import type { FastifyBaseLogger } from 'fastify';
import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import type { BlobStore, StoredBlob } from '../types/stores.js';

// keep only characters that are safe in a url path segment
export function sanitizeFileName(filename: string): string {
    const base = path.basename(filename).replace(/[^A-Za-z0-9._-]/g, '_');
    return base.replace(/^\.+/, '_') || 'file';
}

/**========================================================================
 **                       LOCAL DISK BLOB STORE
 *? blobs live under rootDir/<ownerId>/<uuid>_<filename>
 *? and are served read-only by the uploads plugin at baseUrl
 *========================================================================**/

export class LocalBlobStore implements BlobStore {
    constructor(
        private rootDir: string,
        private baseUrl = '/uploads'
    ) {}

    async init(log: FastifyBaseLogger): Promise<void> {
        await fs.promises.mkdir(this.rootDir, { recursive: true });
        log.info({ rootDir: this.rootDir }, 'Blob store ready');
    }

    async close(): Promise<void> {
        // nothing held open between requests
    }

    async uploadFile(
        content: Buffer | Readable,
        ownerId: string,
        filename: string,
        // served by extension, so the declared type isn't persisted locally
        contentType: string
    ): Promise<StoredBlob> {
        const storedName = `${sanitizeFileName(ownerId)}/${crypto.randomUUID()}_${sanitizeFileName(filename)}`;
        const target = this.resolve(storedName);

        await fs.promises.mkdir(path.dirname(target), { recursive: true });
        const source = Buffer.isBuffer(content) ? Readable.from([content]) : content;
        await pipeline(source, fs.createWriteStream(target));

        return { storedName, url: `${this.baseUrl}/${storedName}` };
    }

    async deleteFile(storedName: string): Promise<void> {
        await fs.promises.unlink(this.resolve(storedName));
    }

    private resolve(storedName: string): string {
        const root = path.resolve(this.rootDir);
        const target = path.resolve(root, storedName);
        if (!target.startsWith(root + path.sep)) {
            throw new Error(`Blob name escapes the storage root: ${storedName}`);
        }
        return target;
    }
}
