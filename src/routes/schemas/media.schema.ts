import { SUPPORTED_MIME_TYPES } from '../../services/media.utils.js';
import { MEDIA_TYPES } from '../../types/models.js';
import { errorSchema } from './common.schema.js';

const security = [{ bearerAuth: [] }];

// thumbnailFileName stays internal: it is not listed, so it is never serialized
export const mediaPayloadSchema = {
    type: 'object',
    properties: {
        id: { type: 'string' },
        userId: { type: 'string' },
        fileName: { type: 'string' },
        originalFileName: { type: 'string' },
        mediaType: { type: 'string', enum: MEDIA_TYPES },
        fileSize: { type: 'integer' },
        mimeType: { type: 'string' },
        blobUrl: { type: 'string' },
        thumbnailUrl: { type: ['string', 'null'] },
        description: { type: ['string', 'null'] },
        tags: { type: ['array', 'null'], items: { type: 'string' } },
        uploadedAt: { type: 'string' },
        updatedAt: { type: 'string' },
    },
    required: [
        'id', 'userId', 'fileName', 'originalFileName', 'mediaType', 'fileSize',
        'mimeType', 'blobUrl', 'thumbnailUrl', 'description', 'tags', 'uploadedAt', 'updatedAt'
    ],
    additionalProperties: false,
};

const mediaListSchema = {
    type: 'object',
    properties: {
        items: { type: 'array', items: mediaPayloadSchema },
        total: { type: 'integer' },
        page: { type: 'integer' },
        pageSize: { type: 'integer' },
    },
    required: ['items', 'total', 'page', 'pageSize'],
    additionalProperties: false,
};

const paginationProperties = {
    page: { type: 'integer', minimum: 1, default: 1 },
    pageSize: { type: 'integer', minimum: 1, maximum: 100, default: 20 },
};

const idParamSchema = {
    params: {
        type: 'object',
        properties: {
            id: { type: 'string', minLength: 1, maxLength: 100 },
        },
        required: ['id'],
    },
};

const accessErrors = {
    403: errorSchema,
    404: errorSchema,
};

/**============================================
 *               POST /media
 *=============================================**/
export const uploadMediaSchema = {
    tags: ['Media Management'],
    summary: 'Upload media',
    description: `
        Upload one image or video using multipart/form-data.

        Fields:
        - file (required): ${SUPPORTED_MIME_TYPES.join(', ')}
        - description (optional): free text
        - tags (optional): JSON array of strings, e.g. ["beach","2024"]
    `.trim(),
    security,
    consumes: ['multipart/form-data'],
    response: {
        201: mediaPayloadSchema,
        400: errorSchema,
    },
};

/**============================================
 *               GET /media
 *=============================================**/
export const listMediaSchema = {
    tags: ['Media Management'],
    summary: 'List own media',
    description: 'Paginated list of the caller\'s media, newest first.',
    security,
    querystring: {
        type: 'object',
        properties: {
            ...paginationProperties,
            mediaType: { type: 'string', enum: MEDIA_TYPES },
        },
        additionalProperties: false,
    },
    response: {
        200: mediaListSchema,
        400: errorSchema,
    },
};

/**============================================
 *               GET /media/search
 *=============================================**/
export const searchMediaSchema = {
    tags: ['Media Management'],
    summary: 'Search own media',
    description: 'Case-insensitive match on file name, description and tags.',
    security,
    querystring: {
        type: 'object',
        properties: {
            query: { type: 'string', minLength: 1, maxLength: 200 },
            ...paginationProperties,
        },
        required: ['query'],
        additionalProperties: false,
    },
    response: {
        200: mediaListSchema,
        400: errorSchema,
    },
};

/**============================================
 *               GET /media/:id
 *=============================================**/
export const getMediaSchema = {
    tags: ['Media Management'],
    summary: 'Get media',
    security,
    ...idParamSchema,
    response: {
        200: mediaPayloadSchema,
        ...accessErrors,
    },
};

/**============================================
 *               PUT /media/:id
 *=============================================**/
export const updateMediaSchema = {
    tags: ['Media Management'],
    summary: 'Update media metadata',
    description: 'Only description and tags can change; omitted or null fields keep their value.',
    security,
    ...idParamSchema,
    body: {
        type: 'object',
        properties: {
            description: { type: ['string', 'null'], maxLength: 2000 },
            tags: {
                type: ['array', 'null'],
                items: { type: 'string', maxLength: 100 },
                maxItems: 50,
            },
        },
        additionalProperties: false,
    },
    response: {
        200: mediaPayloadSchema,
        400: errorSchema,
        ...accessErrors,
    },
};

/**============================================
 *               DELETE /media/:id
 *=============================================**/
export const deleteMediaSchema = {
    tags: ['Media Management'],
    summary: 'Delete media',
    description: 'Removes the stored file, its thumbnail and the metadata record.',
    security,
    ...idParamSchema,
    response: {
        204: { type: 'null' },
        ...accessErrors,
    },
};
