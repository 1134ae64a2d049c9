import type pg from 'pg';
import type { Media, MediaChanges, MediaType, Page, PageRequest } from '../types/models.js';

export type MediaRow = {
    id: string;
    user_id: string;
    file_name: string;
    original_file_name: string;
    media_type: MediaType;
    file_size: string | number; // BIGINT comes back as a string
    mime_type: string;
    blob_url: string;
    thumbnail_url: string | null;
    thumbnail_file_name: string | null;
    description: string | null;
    tags: string[] | null;
    uploaded_at: Date;
    updated_at: Date;
};

const MEDIA_COLUMNS = `
    id, user_id, file_name, original_file_name, media_type, file_size, mime_type,
    blob_url, thumbnail_url, thumbnail_file_name, description, tags, uploaded_at, updated_at
`;

export function toMedia(row: MediaRow): Media {
    return {
        id: row.id,
        userId: row.user_id,
        fileName: row.file_name,
        originalFileName: row.original_file_name,
        mediaType: row.media_type,
        fileSize: Number(row.file_size),
        mimeType: row.mime_type,
        blobUrl: row.blob_url,
        thumbnailUrl: row.thumbnail_url,
        thumbnailFileName: row.thumbnail_file_name,
        description: row.description,
        tags: row.tags,
        uploadedAt: row.uploaded_at.toISOString(),
        updatedAt: row.updated_at.toISOString()
    };
}

// escape LIKE wildcards so user input matches literally
export function escapeLike(term: string): string {
    return term.replace(/[\\%_]/g, match => `\\${match}`);
}

export function pageOffset({ page, pageSize }: PageRequest): number {
    return (page - 1) * pageSize;
}

// build "SET col = $n" pairs for the columns present in changes
export function buildUpdateSet(changes: MediaChanges, firstIndex: number): { clause: string; values: unknown[] } {
    const columns: [string, unknown][] = [['updated_at', changes.updatedAt]];
    if (changes.description !== undefined) columns.push(['description', changes.description]);
    if (changes.tags !== undefined) columns.push(['tags', changes.tags]);

    return {
        clause: columns.map(([column], i) => `${column} = $${firstIndex + i}`).join(', '),
        values: columns.map(([, value]) => value)
    };
}

export class MediaModel {
    constructor(private db: pg.Pool) {}

    async findById(media_id: string): Promise<Media | null> {
        const result = await this.db.query<MediaRow>(
            `SELECT ${MEDIA_COLUMNS} FROM media WHERE id = $1`,
            [media_id]
        );
        return result.rows.length > 0 ? toMedia(result.rows[0]) : null;
    }

    async create(media: Media): Promise<Media> {
        const query = `
            INSERT INTO media (${MEDIA_COLUMNS})
            VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
            RETURNING ${MEDIA_COLUMNS}
        `;
        const values = [
            media.id, media.userId, media.fileName, media.originalFileName, media.mediaType,
            media.fileSize, media.mimeType, media.blobUrl, media.thumbnailUrl, media.thumbnailFileName,
            media.description, media.tags, media.uploadedAt, media.updatedAt
        ];
        const result = await this.db.query<MediaRow>(query, values);

        if (result.rows.length === 0) {
            throw new Error('Media INSERT failed');
        }
        return toMedia(result.rows[0]);
    }

    async update(media_id: string, user_id: string, changes: MediaChanges): Promise<Media | null> {
        const { clause, values } = buildUpdateSet(changes, 3);
        const result = await this.db.query<MediaRow>(
            `UPDATE media SET ${clause} WHERE id = $1 AND user_id = $2 RETURNING ${MEDIA_COLUMNS}`,
            [media_id, user_id, ...values]
        );
        return result.rows.length > 0 ? toMedia(result.rows[0]) : null;
    }

    async delete(media_id: string, user_id: string): Promise<boolean> {
        const result = await this.db.query('DELETE FROM media WHERE id = $1 AND user_id = $2', [media_id, user_id]);
        return (result.rowCount ?? 0) > 0;
    }

    // newest first, optionally narrowed to one media type
    async findAllFromUser(user_id: string, options: PageRequest & { mediaType?: MediaType }): Promise<Page<Media>> {
        const where = options.mediaType !== undefined
            ? { clause: 'user_id = $1 AND media_type = $2', values: [user_id, options.mediaType] }
            : { clause: 'user_id = $1', values: [user_id] };

        return await this.findPage(where, options);
    }

    // case-insensitive substring match on filename, description and tags
    async search(user_id: string, query: string, options: PageRequest): Promise<Page<Media>> {
        const where = {
            clause: `user_id = $1 AND (
                original_file_name ILIKE $2
                OR description ILIKE $2
                OR EXISTS (SELECT 1 FROM unnest(tags) AS tag WHERE tag ILIKE $2)
            )`,
            values: [user_id, `%${escapeLike(query)}%`]
        };

        return await this.findPage(where, options);
    }

    private async findPage(
        where: { clause: string; values: unknown[] },
        options: PageRequest
    ): Promise<Page<Media>> {
        const limitIndex = where.values.length + 1;

        const [rows, count] = await Promise.all([
            this.db.query<MediaRow>(
                `SELECT ${MEDIA_COLUMNS} FROM media WHERE ${where.clause}
                 ORDER BY uploaded_at DESC, id DESC
                 LIMIT $${limitIndex} OFFSET $${limitIndex + 1}`,
                [...where.values, options.pageSize, pageOffset(options)]
            ),
            this.db.query<{ total: string }>(
                `SELECT COUNT(*) AS total FROM media WHERE ${where.clause}`,
                where.values
            )
        ]);

        return {
            items: rows.rows.map(toMedia),
            total: Number(count.rows[0]?.total ?? 0)
        };
    }
}
