/**========================================================================
 * *                       DOMAIN MODELS
 *
 *   - timestamps are ISO-8601 strings
 *   - ids are UUIDs
 *========================================================================**/

export type MediaType = 'image' | 'video';

export const MEDIA_TYPES: readonly MediaType[] = ['image', 'video'];

export interface User {
    id: string;
    username: string;
    email: string;
    hashedPassword: string;
    createdAt: string;
}

export type PublicUser = Omit<User, 'hashedPassword'>;

export interface Media {
    id: string;
    userId: string;
    fileName: string;
    originalFileName: string;
    mediaType: MediaType;
    fileSize: number;
    mimeType: string;
    blobUrl: string;
    thumbnailUrl: string | null;
    thumbnailFileName: string | null;
    description: string | null;
    tags: string[] | null;
    uploadedAt: string;
    updatedAt: string;
}

// fields a metadata update may touch; updatedAt always moves
export interface MediaChanges {
    description?: string;
    tags?: string[];
    updatedAt: string;
}

export interface PageRequest {
    page: number;
    pageSize: number;
}

export interface Page<T> {
    items: T[];
    total: number;
}

export function toPublicUser({ id, username, email, createdAt }: User): PublicUser {
    return { id, username, email, createdAt };
}
