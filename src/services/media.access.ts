import type { Media } from '../types/models.js';
import { ForbiddenError, NotFoundError } from '../utils/errors.js';

// single ownership gate for read / update / delete
export function authorizeMediaAccess(media: Media | null, userId: string): Media {
    if (!media) {
        throw new NotFoundError('Media resource not found');
    }
    if (media.userId !== userId) {
        throw new ForbiddenError('Access denied: insufficient permissions for this media');
    }
    return media;
}
