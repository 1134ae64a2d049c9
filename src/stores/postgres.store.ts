import type { FastifyBaseLogger } from 'fastify';
import pg from 'pg';
import { MediaModel } from '../models/media.model.js';
import { UserModel } from '../models/user.model.js';
import type { Media, MediaChanges, MediaType, Page, PageRequest, User } from '../types/models.js';
import type { DocumentStore } from '../types/stores.js';

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS users (
        id              TEXT PRIMARY KEY,
        username        TEXT NOT NULL,
        email           TEXT NOT NULL UNIQUE,
        hashed_password TEXT NOT NULL,
        created_at      TIMESTAMPTZ NOT NULL DEFAULT now()
    );

    CREATE TABLE IF NOT EXISTS media (
        id                  TEXT PRIMARY KEY,
        user_id             TEXT NOT NULL REFERENCES users(id),
        file_name           TEXT NOT NULL UNIQUE,
        original_file_name  TEXT NOT NULL,
        media_type          TEXT NOT NULL CHECK (media_type IN ('image', 'video')),
        file_size           BIGINT NOT NULL,
        mime_type           TEXT NOT NULL,
        blob_url            TEXT NOT NULL,
        thumbnail_url       TEXT,
        thumbnail_file_name TEXT,
        description         TEXT,
        tags                TEXT[],
        uploaded_at         TIMESTAMPTZ NOT NULL,
        updated_at          TIMESTAMPTZ NOT NULL
    );

    CREATE INDEX IF NOT EXISTS media_user_uploaded_idx ON media (user_id, uploaded_at DESC);
`;

// wait to connect to postgres
async function waitForDb(pool: pg.Pool, log: FastifyBaseLogger, retries: number) {
    while (retries--) {
        try {
            await pool.query('SELECT 1');
            return;
        } catch (err) {
            log.warn({ err }, `Database not ready yet, retrying... [${retries} attempts left]`);
            await new Promise(resolve => setTimeout(resolve, 1000));
        }
    }
    throw new Error('Database not ready');
}

export class PostgresDocumentStore implements DocumentStore {
    private pool: pg.Pool;
    private users: UserModel;
    private media: MediaModel;

    constructor(connectionString: string, private connectRetries = 30) {
        // the pool connects lazily, so construction never touches the network
        this.pool = new pg.Pool({ connectionString });
        this.users = new UserModel(this.pool);
        this.media = new MediaModel(this.pool);
    }

    async init(log: FastifyBaseLogger): Promise<void> {
        await waitForDb(this.pool, log, this.connectRetries);
        await this.pool.query(SCHEMA);
        log.info('Document store ready');
    }

    async close(): Promise<void> {
        await this.pool.end();
    }

    getUserByEmail(email: string): Promise<User | null> {
        return this.users.findByEmail(email);
    }

    createUser(user: User): Promise<User> {
        return this.users.create(user);
    }

    getMediaById(mediaId: string): Promise<Media | null> {
        return this.media.findById(mediaId);
    }

    createMedia(media: Media): Promise<Media> {
        return this.media.create(media);
    }

    updateMedia(mediaId: string, userId: string, changes: MediaChanges): Promise<Media | null> {
        return this.media.update(mediaId, userId, changes);
    }

    deleteMedia(mediaId: string, userId: string): Promise<boolean> {
        return this.media.delete(mediaId, userId);
    }

    getUserMedia(userId: string, options: PageRequest & { mediaType?: MediaType }): Promise<Page<Media>> {
        return this.media.findAllFromUser(userId, options);
    }

    searchMedia(userId: string, query: string, options: PageRequest): Promise<Page<Media>> {
        return this.media.search(userId, query, options);
    }
}
