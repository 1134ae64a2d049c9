import type { FastifyRequest } from 'fastify';
import type { MediaType } from '../types/models.js';
import { BadRequestError } from '../utils/errors.js';
import { parseTags, validateFileSize, validateFileType } from './media.utils.js';

export interface MediaUpload {
    filename: string;
    mimetype: string;
    mediaType: MediaType;
    content: Buffer;
    size: number;
    description: string | null;
    tags: string[] | null;
}

function fieldValue(value: unknown): string | undefined {
    if (typeof value === 'string') return value;
    if (Buffer.isBuffer(value)) return value.toString('utf-8');
    return undefined;
}

/**============================================
 *          MULTIPART MEDIA UPLOAD
 *? expects one `file` part plus optional
 *? `description` and `tags` (JSON array) fields
 *? everything is validated before anything is stored
 *=============================================**/

export async function readMediaUpload(request: FastifyRequest, maxFileSize: number): Promise<MediaUpload> {
    if (!request.isMultipart()) {
        throw new BadRequestError('Request must be multipart/form-data');
    }

    let file: Pick<MediaUpload, 'filename' | 'mimetype' | 'mediaType' | 'content' | 'size'> | null = null;
    let description: string | undefined;
    let rawTags: string | undefined;

    for await (const part of request.parts()) {
        if (part.type === 'file') {
            if (part.fieldname !== 'file' || file !== null) {
                throw new BadRequestError('Exactly one file must be sent in the "file" field');
            }
            if (!part.filename) {
                throw new BadRequestError('Uploaded file must have a filename');
            }

            // reject unsupported types before reading the body
            const mediaType = validateFileType(part);
            const content = await part.toBuffer();
            const size = validateFileSize(content.length, maxFileSize, part.file.truncated);

            file = { filename: part.filename, mimetype: part.mimetype, mediaType, content, size };
            continue;
        }

        if (part.fieldnameTruncated || part.valueTruncated) {
            throw new BadRequestError(`Field "${part.fieldname}" exceeds the maximum allowed size`);
        }

        if (part.fieldname === 'description') {
            description = fieldValue(part.value);
        }
        if (part.fieldname === 'tags') {
            rawTags = fieldValue(part.value);
        }
    }

    if (file === null) {
        throw new BadRequestError('No file uploaded');
    }

    return {
        ...file,
        description: description ? description : null,
        tags: parseTags(rawTags)
    };
}
