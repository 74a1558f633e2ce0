import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { FileLyricsCache } from './FileLyricsCache';
import { MemoryLyricsCache } from './MemoryLyricsCache';
import { durationBucket, trackSignature } from './TrackSignature';
import type { ScaledLyrics } from '../models/LyricsData';

function scaled(signature: string, overrides: Partial<ScaledLyrics> = {}): ScaledLyrics {
    return {
        lines: [
            { timestampSeconds: 0, text: '' },
            { timestampSeconds: 13.333, text: 'First line' }
        ],
        scaleFactor: 240 / 180,
        lowConfidence: false,
        originSignature: signature,
        liveDurationSeconds: 240,
        referenceDurationSeconds: 180,
        resolvedAt: Date.parse('2024-05-01T10:00:00.000Z'),
        source: { title: 'Song', artist: 'Artist', album: 'Album' },
        ...overrides
    };
}

describe('TrackSignature', () => {
    it('should bucket durations to the nearest granularity', () => {
        expect(durationBucket(200, 5)).toBe(200);
        expect(durationBucket(201, 5)).toBe(200);
        expect(durationBucket(206, 5)).toBe(205);
        expect(durationBucket(260, 5)).toBe(260);
    });

    it('should share a signature within a bucket', () => {
        expect(trackSignature('Artist', 'Song', 200.0, 5)).toBe(trackSignature('Artist', 'Song', 201.0, 5));
    });

    it('should isolate different edits of the same song', () => {
        const nominal = trackSignature('Artist', 'Song', 200.0, 5);

        expect(trackSignature('Artist', 'Song', 206.0, 5)).not.toBe(nominal);
        expect(trackSignature('Artist', 'Song', 260.0, 5)).not.toBe(nominal);
    });

    it('should fold case, accents and punctuation', () => {
        expect(trackSignature('Beyoncé', "Halo (Live!)", 240, 5)).toBe('beyonce|halo-live|240');
        expect(trackSignature(undefined, 'Song', 180, 5)).toBe('_|song|180');
    });
});

describe('MemoryLyricsCache', () => {
    it('should store, read and clear entries', async () => {
        const cache = new MemoryLyricsCache();
        const entry = scaled('a|b|240');

        expect(await cache.get('a|b|240')).toBeUndefined();
        await cache.put('a|b|240', entry);
        expect(await cache.get('a|b|240')).toBe(entry);
        expect(await cache.clear()).toBe(1);
        expect(cache.size).toBe(0);
    });
});

describe('FileLyricsCache', () => {
    let dir: string;
    let cache: FileLyricsCache;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'stretch-cache-'));
        cache = new FileLyricsCache(path.join(dir, 'lyrics'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should miss when nothing is stored', async () => {
        expect(await cache.get('artist|song|240')).toBeUndefined();
    });

    it('should round-trip an entry through disk', async () => {
        const entry = scaled('artist|song|240');
        await cache.put('artist|song|240', entry);

        expect(await cache.get('artist|song|240')).toEqual(entry);
    });

    it('should overwrite on collision', async () => {
        await cache.put('artist|song|240', scaled('artist|song|240'));
        await cache.put('artist|song|240', scaled('artist|song|240', { scaleFactor: 1.25, lowConfidence: true }));

        const stored = await cache.get('artist|song|240');
        expect(stored?.scaleFactor).toBe(1.25);
        expect(stored?.lowConfidence).toBe(true);
        expect(await readdir(path.join(dir, 'lyrics'))).toHaveLength(1);
    });

    it('should treat unparseable entries as a miss and overwrite them later', async () => {
        await cache.put('artist|song|240', scaled('artist|song|240'));
        const file = cache.fileFor('artist|song|240');
        await writeFile(file, '{"version":1,"lines":');

        expect(await cache.get('artist|song|240')).toBeUndefined();

        await cache.put('artist|song|240', scaled('artist|song|240'));
        expect(await cache.get('artist|song|240')).toBeDefined();
    });

    it('should treat schema mismatches as a miss', async () => {
        await cache.put('artist|song|240', scaled('artist|song|240'));
        await writeFile(cache.fileFor('artist|song|240'), JSON.stringify({ version: 1, signature: 'artist|song|240' }));

        expect(await cache.get('artist|song|240')).toBeUndefined();
    });

    it('should not collide on concurrent writes of the same signature', async () => {
        await Promise.all([
            cache.put('artist|song|240', scaled('artist|song|240')),
            cache.put('artist|song|240', scaled('artist|song|240', { scaleFactor: 1.25 }))
        ]);

        const stored = await cache.get('artist|song|240');
        expect([240 / 180, 1.25]).toContain(stored?.scaleFactor);
        expect(await readdir(path.join(dir, 'lyrics'))).toEqual([path.basename(cache.fileFor('artist|song|240'))]);
    });

    it('should keep long signatures apart', () => {
        const long = 'a'.repeat(100);

        expect(cache.fileFor(`${long}|x|240`)).not.toBe(cache.fileFor(`${long}|y|240`));
    });

    it('should clear all entries', async () => {
        await cache.put('a|one|200', scaled('a|one|200'));
        await cache.put('a|two|200', scaled('a|two|200'));

        expect(await cache.clear()).toBe(2);
        expect(await cache.get('a|one|200')).toBeUndefined();
    });

    it('should remove leftover temp files on clear', async () => {
        await cache.put('a|one|200', scaled('a|one|200'));
        await writeFile(`${cache.fileFor('a|two|200')}.1234.tmp`, '{"version":1');

        expect(await cache.clear()).toBe(1);
        expect(await readdir(path.join(dir, 'lyrics'))).toEqual([]);
    });

    it('should clear a missing directory', async () => {
        expect(await new FileLyricsCache(path.join(dir, 'missing')).clear()).toBe(0);
    });
});
