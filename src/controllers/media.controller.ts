import crypto from 'crypto';
import { FastifyReply, FastifyRequest } from 'fastify';
import type { AppConfig } from '../config.js';
import { authorizeMediaAccess } from '../services/media.access.js';
import { readMediaUpload, type MediaUpload } from '../services/media.upload.js';
import {
    advanceTimestamp,
    generateThumbnail,
    resolveThumbnailFileName,
    thumbnailFileNameFor
} from '../services/media.utils.js';
import { THUMBNAIL_MIME_TYPE } from '../types/constants.js';
import type { Media, MediaChanges, MediaType } from '../types/models.js';
import type { BlobStore, DocumentStore, StoredBlob } from '../types/stores.js';
import { NotFoundError } from '../utils/errors.js';

export interface ListQuery {
    page: number;
    pageSize: number;
    mediaType?: MediaType;
}

export interface SearchQuery {
    query: string;
    page: number;
    pageSize: number;
}

export interface IdParams {
    id: string;
}

export interface UpdateBody {
    description?: string | null;
    tags?: string[] | null;
}

export class MediaController {
    constructor(
        private documents: DocumentStore,
        private blobs: BlobStore,
        private config: AppConfig
    ) {}

    // POST /media
    async upload(request: FastifyRequest, reply: FastifyReply) {
        const user_id = request.user.id;

        try {
            // type, size and tags are all checked before anything is written
            const upload = await readMediaUpload(request, this.config.maxFileSize);

            const stored = await this.blobs.uploadFile(upload.content, user_id, upload.filename, upload.mimetype);

            const thumbnail = upload.mediaType === 'image'
                ? await this.storeThumbnail(request, upload, user_id)
                : null;

            const now = new Date().toISOString();
            const newMedia = await this.documents.createMedia({
                id: crypto.randomUUID(),
                userId: user_id,
                fileName: stored.storedName,
                originalFileName: upload.filename,
                mediaType: upload.mediaType,
                fileSize: upload.size,
                mimeType: upload.mimetype,
                blobUrl: stored.url,
                thumbnailUrl: thumbnail?.url ?? null,
                thumbnailFileName: thumbnail?.storedName ?? null,
                description: upload.description,
                tags: upload.tags,
                uploadedAt: now,
                updatedAt: now
            });
            request.log.info({ mediaId: newMedia.id, fileName: newMedia.fileName }, 'Media uploaded');

            return reply.status(201).send(newMedia);
        } catch (err) {
            return reply.sendError(err, 'Failed to upload media');
        }
    }

    // best effort: a missing thumbnail never fails the upload
    private async storeThumbnail(request: FastifyRequest, upload: MediaUpload, user_id: string): Promise<StoredBlob | null> {
        const bytes = await generateThumbnail(upload.content, request.log, this.config.thumbnailSize);
        if (!bytes) return null;

        try {
            return await this.blobs.uploadFile(bytes, user_id, thumbnailFileNameFor(upload.filename), THUMBNAIL_MIME_TYPE);
        } catch (err) {
            request.log.warn({ err }, 'Failed to upload thumbnail');
            return null;
        }
    }

    // GET /media
    async findAllFromUser(request: FastifyRequest<{ Querystring: ListQuery }>, reply: FastifyReply) {
        const user_id = request.user.id;
        const { page, pageSize, mediaType } = request.query;

        try {
            const { items, total } = await this.documents.getUserMedia(user_id, { page, pageSize, mediaType });
            return reply.status(200).send({ items, total, page, pageSize });
        } catch (err) {
            return reply.sendError(err, 'Failed to retrieve media list');
        }
    }

    // GET /media/search
    async search(request: FastifyRequest<{ Querystring: SearchQuery }>, reply: FastifyReply) {
        const user_id = request.user.id;
        const { query, page, pageSize } = request.query;

        try {
            const { items, total } = await this.documents.searchMedia(user_id, query, { page, pageSize });
            return reply.status(200).send({ items, total, page, pageSize });
        } catch (err) {
            return reply.sendError(err, 'Failed to search media');
        }
    }

    // GET /media/:id
    async findById(request: FastifyRequest<{ Params: IdParams }>, reply: FastifyReply) {
        try {
            const media = await this.findOwned(request.params.id, request.user.id);
            return reply.status(200).send(media);
        } catch (err) {
            return reply.sendError(err, 'Failed to retrieve media');
        }
    }

    // PUT /media/:id - description / tags only; null means "leave as is"
    async update(request: FastifyRequest<{ Params: IdParams; Body: UpdateBody }>, reply: FastifyReply) {
        const user_id = request.user.id;
        const media_id = request.params.id;
        const { description, tags } = request.body;

        try {
            const media = await this.findOwned(media_id, user_id);

            const changes: MediaChanges = { updatedAt: advanceTimestamp(media.updatedAt) };
            if (description !== undefined && description !== null) {
                changes.description = description;
            }
            if (tags !== undefined && tags !== null) {
                changes.tags = tags;
            }

            const updated = await this.documents.updateMedia(media_id, user_id, changes);
            if (!updated) {
                throw new NotFoundError('Media resource not found');
            }

            return reply.status(200).send(updated);
        } catch (err) {
            return reply.sendError(err, 'Failed to update media');
        }
    }

    // DELETE /media/:id
    async delete(request: FastifyRequest<{ Params: IdParams }>, reply: FastifyReply) {
        const user_id = request.user.id;
        const media_id = request.params.id;

        try {
            const media = await this.findOwned(media_id, user_id);

            // the primary blob must go; the thumbnail may already be gone
            await this.blobs.deleteFile(media.fileName);

            const thumbnailName = resolveThumbnailFileName(media);
            if (thumbnailName) {
                try {
                    await this.blobs.deleteFile(thumbnailName);
                } catch (err) {
                    request.log.warn({ err, thumbnailName }, 'Thumbnail deletion failed');
                }
            }

            await this.documents.deleteMedia(media_id, user_id);
            request.log.info({ mediaId: media_id }, 'Media deleted');

            return reply.status(204).send();
        } catch (err) {
            return reply.sendError(err, 'Failed to delete media');
        }
    }

    private async findOwned(media_id: string, user_id: string): Promise<Media> {
        return authorizeMediaAccess(await this.documents.getMediaById(media_id), user_id);
    }
}
