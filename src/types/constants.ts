export const SERVICE_NAME = 'Cloud Media API';
export const SERVICE_VERSION = '1.0.0';

export const API_PREFIX = '/api';
export const UPLOADS_PREFIX = '/uploads';

export const THUMBNAIL_PREFIX = 'thumb_';
export const THUMBNAIL_MIME_TYPE = 'image/jpeg';
