import type { FastifyBaseLogger } from 'fastify';
import path from 'path';
import sharp from 'sharp';
import { BadRequestError } from '../utils/errors.js';
import { THUMBNAIL_PREFIX } from '../types/constants.js';
import { MEDIA_TYPES, type Media, type MediaType } from '../types/models.js';

// accepted content types per media type, with the extensions each may carry
const SUPPORTED_TYPES: Record<MediaType, Record<string, string[]>> = {
    image: {
        'image/jpeg': ['.jpg', '.jpeg'],
        'image/png': ['.png'],
        'image/gif': ['.gif'],
        'image/webp': ['.webp']
    },
    video: {
        'video/mp4': ['.mp4'],
        'video/quicktime': ['.mov'],
        'video/x-msvideo': ['.avi'],
        'video/webm': ['.webm'],
        'video/x-matroska': ['.mkv']
    }
};

export const SUPPORTED_MIME_TYPES = Object.values(SUPPORTED_TYPES).flatMap(Object.keys);

/**============================================
 *              FILE VALIDATION
 *=============================================**/

export function validateFileType(file: { filename: string; mimetype: string }): MediaType {
    const mimetype = file.mimetype.toLowerCase();
    const ext = path.extname(file.filename).toLowerCase();

    for (const mediaType of MEDIA_TYPES) {
        const extensions: string[] | undefined = SUPPORTED_TYPES[mediaType][mimetype];
        if (!extensions) continue;

        if (!extensions.includes(ext)) {
            throw new BadRequestError(
                `File extension "${ext || '(none)'}" does not match content type ${mimetype}`,
                `Expected one of: ${extensions.join(', ')}`
            );
        }
        return mediaType;
    }

    throw new BadRequestError(
        `Unsupported file type: ${file.mimetype}`,
        `Allowed types: ${SUPPORTED_MIME_TYPES.join(', ')}`
    );
}

export function validateFileSize(size: number, maxFileSize: number, truncated = false): number {
    if (truncated || size > maxFileSize) {
        const maxMb = (maxFileSize / (1024 * 1024)).toFixed(1);
        throw new BadRequestError(`File size exceeds maximum allowed size of ${maxMb} MB`);
    }
    if (size === 0) {
        throw new BadRequestError('Uploaded file is empty');
    }
    return size;
}

// tags arrive as a JSON array string in a multipart field
export function parseTags(raw: string | undefined): string[] | null {
    if (raw === undefined || raw === '') return null;

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new BadRequestError('Invalid tags format. Must be a JSON array.');
    }

    if (!Array.isArray(parsed)) {
        throw new BadRequestError('Invalid tags format. Must be a JSON array.');
    }

    const tags: string[] = [];
    for (const tag of parsed) {
        if (typeof tag !== 'string') {
            throw new BadRequestError('Tags must be strings');
        }
        tags.push(tag);
    }
    return tags;
}

/**============================================
 *                 THUMBNAILS
 *=============================================**/

// best effort: null on any failure
export async function generateThumbnail(
    bytes: Buffer,
    log: Pick<FastifyBaseLogger, 'warn'>,
    maxDimension = 300
): Promise<Buffer | null> {
    try {
        return await sharp(bytes)
            .rotate()
            .resize(maxDimension, maxDimension, { fit: 'inside', withoutEnlargement: true })
            .jpeg({ quality: 80 })
            .toBuffer();
    } catch (err) {
        log.warn({ err }, 'Thumbnail generation failed');
        return null;
    }
}

export function thumbnailFileNameFor(filename: string): string {
    const base = path.basename(filename, path.extname(filename));
    return `${THUMBNAIL_PREFIX}${base}.jpg`;
}

// records written before thumbnailFileName existed only carry the thumbnail url
export function resolveThumbnailFileName(media: Pick<Media, 'fileName' | 'originalFileName' | 'thumbnailUrl' | 'thumbnailFileName'>): string | null {
    if (media.thumbnailFileName) return media.thumbnailFileName;
    if (!media.thumbnailUrl) return null;

    const original = media.originalFileName.split('/').pop() ?? '';
    const at = original ? media.fileName.lastIndexOf(original) : -1;
    if (at < 0) return null;

    return media.fileName.slice(0, at) + THUMBNAIL_PREFIX + original + media.fileName.slice(at + original.length);
}

// ISO timestamp strictly after `previous`
export function advanceTimestamp(previous: string, now = new Date()): string {
    const prev = Date.parse(previous);
    const next = Number.isNaN(prev) ? now.getTime() : Math.max(now.getTime(), prev + 1);
    return new Date(next).toISOString();
}
