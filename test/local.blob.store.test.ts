import fs from 'fs';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { describe, it, before, after } from 'mocha';
import { expect } from 'chai';
import Fastify from 'fastify';
import { LocalBlobStore, sanitizeFileName } from '../src/stores/local.blob.store.js';

async function caught(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (err) {
        return err;
    }
    return null;
}

describe('LOCAL BLOB STORE TESTS:', () => {
    let rootDir: string;
    let store: LocalBlobStore;

    before(async () => {
        rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cloud-media-blobs-'));
        store = new LocalBlobStore(path.join(rootDir, 'blobs'), '/uploads');
        await store.init(Fastify({ logger: false }).log);
    });

    after(async () => {
        await store.close();
        fs.rmSync(rootDir, { recursive: true, force: true });
    });

    it('should create the root directory on init', () => {
        expect(fs.statSync(path.join(rootDir, 'blobs')).isDirectory()).to.equal(true);
    });

    it('should store a buffer under the owner with a unique name', async () => {
        const blob = await store.uploadFile(Buffer.from('hello'), 'owner-1', 'my photo.png', 'image/png');

        expect(blob.storedName).to.match(/^owner-1\/[0-9a-f-]{36}_my_photo\.png$/);
        expect(blob.url).to.equal(`/uploads/${blob.storedName}`);
        expect(fs.readFileSync(path.join(rootDir, 'blobs', blob.storedName), 'utf-8')).to.equal('hello');
    });

    it('should never reuse a stored name', async () => {
        const first = await store.uploadFile(Buffer.from('a'), 'owner-1', 'same.png', 'image/png');
        const second = await store.uploadFile(Buffer.from('b'), 'owner-1', 'same.png', 'image/png');

        expect(first.storedName).to.not.equal(second.storedName);
    });

    it('should store a stream', async () => {
        const blob = await store.uploadFile(Readable.from([Buffer.from('ab'), Buffer.from('cd')]), 'owner-2', 'clip.mp4', 'video/mp4');

        expect(fs.readFileSync(path.join(rootDir, 'blobs', blob.storedName), 'utf-8')).to.equal('abcd');
    });

    it('should delete a stored blob', async () => {
        const blob = await store.uploadFile(Buffer.from('bye'), 'owner-1', 'gone.png', 'image/png');

        await store.deleteFile(blob.storedName);

        expect(fs.existsSync(path.join(rootDir, 'blobs', blob.storedName))).to.equal(false);
        const err = await caught(store.deleteFile(blob.storedName));
        expect(err).to.be.instanceOf(Error);
    });

    it('should refuse names outside the root', async () => {
        const err = await caught(store.deleteFile('../outside.txt'));

        expect(err).to.be.instanceOf(Error);
        expect(err instanceof Error ? err.message : '').to.equal('Blob name escapes the storage root: ../outside.txt');
    });

    describe('sanitizeFileName', () => {
        it('should keep safe characters only', () => {
            expect(sanitizeFileName('a b&c.png')).to.equal('a_b_c.png');
            expect(sanitizeFileName('beach-2024_01.JPG')).to.equal('beach-2024_01.JPG');
        });

        it('should drop directories and leading dots', () => {
            expect(sanitizeFileName('../../etc/passwd')).to.equal('passwd');
            expect(sanitizeFileName('.env')).to.equal('_env');
            expect(sanitizeFileName('')).to.equal('file');
        });
    });
});
