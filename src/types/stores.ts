import type { FastifyBaseLogger } from 'fastify';
import type { Readable } from 'stream';
import type { AppConfig } from '../config.js';
import type { CredentialService } from '../services/credentials.service.js';
import type { Media, MediaChanges, MediaType, Page, PageRequest, User } from './models.js';

/**========================================================================
 * *                     STORE CONTRACTS
 *
 *   - document store: user + media records
 *   - blob store: binary content addressed by stored name
 *   - both are constructed by the caller and handed to buildApp
 *========================================================================**/

export interface DocumentStore {
    init(log: FastifyBaseLogger): Promise<void>;
    close(): Promise<void>;

    getUserByEmail(email: string): Promise<User | null>;
    createUser(user: User): Promise<User>;

    getMediaById(mediaId: string): Promise<Media | null>;
    createMedia(media: Media): Promise<Media>;
    updateMedia(mediaId: string, userId: string, changes: MediaChanges): Promise<Media | null>;
    deleteMedia(mediaId: string, userId: string): Promise<boolean>;
    getUserMedia(userId: string, options: PageRequest & { mediaType?: MediaType }): Promise<Page<Media>>;
    searchMedia(userId: string, query: string, options: PageRequest): Promise<Page<Media>>;
}

export interface StoredBlob {
    storedName: string;
    url: string;
}

export interface BlobStore {
    init(log: FastifyBaseLogger): Promise<void>;
    close(): Promise<void>;

    uploadFile(content: Buffer | Readable, ownerId: string, filename: string, contentType: string): Promise<StoredBlob>;
    deleteFile(storedName: string): Promise<void>;
}

export interface Stores {
    documents: DocumentStore;
    blobs: BlobStore;
}

// shared handles passed to route plugins
export interface Services extends Stores {
    config: AppConfig;
    credentials: CredentialService;
}
