import { describe, it } from 'mocha';
import { expect } from 'chai';
import sharp from 'sharp';
import {
    advanceTimestamp,
    generateThumbnail,
    parseTags,
    resolveThumbnailFileName,
    thumbnailFileNameFor,
    validateFileSize,
    validateFileType
} from '../src/services/media.utils.js';
import { authorizeMediaAccess } from '../src/services/media.access.js';
import type { Media } from '../src/types/models.js';
import { BadRequestError, ForbiddenError, NotFoundError } from '../src/utils/errors.js';
import { pngBytes } from './media.test.utils.js';

describe('MEDIA UTILS TESTS:', () => {
    describe('validateFileType', () => {
        it('should classify images and videos', () => {
            expect(validateFileType({ filename: 'a.JPG', mimetype: 'image/jpeg' })).to.equal('image');
            expect(validateFileType({ filename: 'b.webp', mimetype: 'image/webp' })).to.equal('image');
            expect(validateFileType({ filename: 'c.mov', mimetype: 'video/quicktime' })).to.equal('video');
            expect(validateFileType({ filename: 'd.mkv', mimetype: 'VIDEO/X-MATROSKA' })).to.equal('video');
        });

        it('should reject an extension that does not belong to the content type', () => {
            expect(() => validateFileType({ filename: 'a.png', mimetype: 'image/jpeg' }))
                .to.throw(BadRequestError, 'File extension ".png" does not match content type image/jpeg');
            expect(() => validateFileType({ filename: 'noext', mimetype: 'video/mp4' }))
                .to.throw(BadRequestError, 'File extension "(none)" does not match content type video/mp4');
        });

        it('should reject unsupported content types', () => {
            expect(() => validateFileType({ filename: 'a.pdf', mimetype: 'application/pdf' }))
                .to.throw(BadRequestError, 'Unsupported file type: application/pdf');
        });
    });

    describe('validateFileSize', () => {
        const max = 100 * 1024 * 1024;

        it('should accept sizes up to the limit', () => {
            expect(validateFileSize(1, max)).to.equal(1);
            expect(validateFileSize(max, max)).to.equal(max);
        });

        it('should reject oversized and truncated files', () => {
            expect(() => validateFileSize(max + 1, max))
                .to.throw(BadRequestError, 'File size exceeds maximum allowed size of 100.0 MB');
            expect(() => validateFileSize(10, max, true))
                .to.throw(BadRequestError, 'File size exceeds maximum allowed size of 100.0 MB');
        });

        it('should reject empty files', () => {
            expect(() => validateFileSize(0, max)).to.throw(BadRequestError, 'Uploaded file is empty');
        });
    });

    describe('parseTags', () => {
        it('should treat a missing or empty field as no tags', () => {
            expect(parseTags(undefined)).to.equal(null);
            expect(parseTags('')).to.equal(null);
        });

        it('should parse a JSON array of strings', () => {
            expect(parseTags('["beach","2024"]')).to.deep.equal(['beach', '2024']);
            expect(parseTags('[]')).to.deep.equal([]);
        });

        it('should reject anything but an array', () => {
            for (const raw of ['beach', '{"a":1}', '"beach"', '42', '   ']) {
                expect(() => parseTags(raw)).to.throw(BadRequestError, 'Invalid tags format. Must be a JSON array.');
            }
        });

        it('should reject non-string tags', () => {
            expect(() => parseTags('["ok", 1]')).to.throw(BadRequestError, 'Tags must be strings');
        });
    });

    describe('generateThumbnail', () => {
        const warnings: unknown[][] = [];
        const log = {
            warn: (...args: unknown[]) => {
                warnings.push(args);
            }
        };

        it('should fit the image inside the bounding box as jpeg', async () => {
            const thumbnail = await generateThumbnail(await pngBytes(640, 480), log, 100);
            expect(thumbnail).to.not.equal(null);

            const meta = await sharp(thumbnail ?? Buffer.alloc(0)).metadata();
            expect(meta.format).to.equal('jpeg');
            expect(meta.width).to.equal(100);
            expect(meta.height).to.equal(75);
        });

        it('should not enlarge small images', async () => {
            const thumbnail = await generateThumbnail(await pngBytes(50, 40), log, 100);

            const meta = await sharp(thumbnail ?? Buffer.alloc(0)).metadata();
            expect(meta.width).to.equal(50);
            expect(meta.height).to.equal(40);
        });

        it('should return null and warn for bytes that are not an image', async () => {
            warnings.length = 0;

            const thumbnail = await generateThumbnail(Buffer.from('not an image'), log, 100);

            expect(thumbnail).to.equal(null);
            expect(warnings).to.have.length(1);
            expect(warnings[0][1]).to.equal('Thumbnail generation failed');
        });
    });

    describe('thumbnail names', () => {
        it('should name thumbnails after the original as jpeg', () => {
            expect(thumbnailFileNameFor('beach.png')).to.equal('thumb_beach.jpg');
            expect(thumbnailFileNameFor('archive.tar.gz')).to.equal('thumb_archive.tar.jpg');
            expect(thumbnailFileNameFor('noext')).to.equal('thumb_noext.jpg');
        });

        const legacy = {
            fileName: 'user-1/1234_beach.png',
            originalFileName: 'beach.png',
            thumbnailUrl: 'https://blobs.test/user-1/1234_thumb_beach.png',
            thumbnailFileName: null
        };

        it('should prefer the stored thumbnail name', () => {
            expect(resolveThumbnailFileName({ ...legacy, thumbnailFileName: 'user-1/99_thumb_beach.jpg' }))
                .to.equal('user-1/99_thumb_beach.jpg');
        });

        it('should derive the name for records without one', () => {
            expect(resolveThumbnailFileName(legacy)).to.equal('user-1/1234_thumb_beach.png');
        });

        it('should return null without a thumbnail or a derivable name', () => {
            expect(resolveThumbnailFileName({ ...legacy, thumbnailUrl: null })).to.equal(null);
            expect(resolveThumbnailFileName({ ...legacy, originalFileName: 'other.png' })).to.equal(null);
        });
    });

    describe('advanceTimestamp', () => {
        it('should use the current time when it is later', () => {
            expect(advanceTimestamp('2024-01-01T00:00:00.000Z', new Date('2024-06-01T12:00:00.000Z')))
                .to.equal('2024-06-01T12:00:00.000Z');
        });

        it('should move at least one millisecond past the previous value', () => {
            expect(advanceTimestamp('2024-06-01T12:00:00.000Z', new Date('2024-06-01T12:00:00.000Z')))
                .to.equal('2024-06-01T12:00:00.001Z');
            expect(advanceTimestamp('2030-01-01T00:00:00.000Z', new Date('2024-06-01T12:00:00.000Z')))
                .to.equal('2030-01-01T00:00:00.001Z');
        });

        it('should fall back to now for an unreadable previous value', () => {
            expect(advanceTimestamp('garbage', new Date('2024-06-01T12:00:00.000Z')))
                .to.equal('2024-06-01T12:00:00.000Z');
        });
    });

    describe('authorizeMediaAccess', () => {
        const media: Media = {
            id: 'media-1',
            userId: 'owner',
            fileName: 'owner/1_a.png',
            originalFileName: 'a.png',
            mediaType: 'image',
            fileSize: 1,
            mimeType: 'image/png',
            blobUrl: 'https://blobs.test/owner/1_a.png',
            thumbnailUrl: null,
            thumbnailFileName: null,
            description: null,
            tags: null,
            uploadedAt: '2024-01-01T00:00:00.000Z',
            updatedAt: '2024-01-01T00:00:00.000Z'
        };

        it('should return the record to its owner', () => {
            expect(authorizeMediaAccess(media, 'owner')).to.equal(media);
        });

        it('should forbid everyone else', () => {
            expect(() => authorizeMediaAccess(media, 'intruder'))
                .to.throw(ForbiddenError, 'Access denied: insufficient permissions for this media');
        });

        it('should report a missing record as not found', () => {
            expect(() => authorizeMediaAccess(null, 'owner')).to.throw(NotFoundError, 'Media resource not found');
        });
    });
});
