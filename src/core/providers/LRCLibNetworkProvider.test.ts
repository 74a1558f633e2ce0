import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { LRCLibNetworkProvider } from './LRCLibNetworkProvider';
import { ServiceUnavailableError } from '../utils/Errors';

function jsonResponse(body: unknown, status: number = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' }
    });
}

describe('LRCLibNetworkProvider', () => {
    let provider: LRCLibNetworkProvider;
    const fetchMock = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>();

    beforeEach(() => {
        fetchMock.mockReset();
        vi.stubGlobal('fetch', fetchMock);
        provider = new LRCLibNetworkProvider({ apiBase: 'https://lyrics.test/api/', timeoutMs: 1000 });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should be named LRCLIB', () => {
        expect(provider.name).toBe('LRCLIB');
    });

    it('should build search URLs from the query fields', () => {
        expect(provider.buildSearchUrl({ title: 'Song & Dance', artist: 'Artist', album: 'Album' }))
            .toBe('https://lyrics.test/api/search?track_name=Song+%26+Dance&artist_name=Artist&album_name=Album');
        expect(provider.buildSearchUrl({ title: 'Song' }))
            .toBe('https://lyrics.test/api/search?track_name=Song');
    });

    it('should map records with synced lyrics to candidates', async () => {
        fetchMock.mockResolvedValueOnce(jsonResponse([
            {
                id: 42,
                trackName: 'Song',
                artistName: 'Artist',
                albumName: 'Album',
                duration: 180,
                instrumental: false,
                plainLyrics: 'Hello\nWorld',
                syncedLyrics: '[00:10.00]Hello\n[00:12.50]World'
            },
            {
                id: 43,
                trackName: 'Song',
                artistName: 'Other',
                albumName: null,
                duration: 200,
                instrumental: false,
                plainLyrics: 'Only plain',
                syncedLyrics: null
            }
        ]));

        const results = await provider.lookup({ title: 'Song', artist: 'Artist' });

        expect(results).toEqual([{
            id: '42',
            referenceDurationSeconds: 180,
            syncedLines: [
                { timestampSeconds: 10, text: 'Hello' },
                { timestampSeconds: 12.5, text: 'World' }
            ],
            sourceTitle: 'Song',
            sourceArtist: 'Artist',
            sourceAlbum: 'Album',
            source: 'LRCLIB'
        }]);
        expect(fetchMock).toHaveBeenCalledTimes(1);
        expect(fetchMock.mock.calls[0][0]).toBe('https://lyrics.test/api/search?track_name=Song&artist_name=Artist');
    });

    it('should skip instrumental and malformed records', async () => {
        fetchMock.mockResolvedValueOnce(jsonResponse([
            { id: 1, trackName: 'Song', artistName: 'A', duration: 100, instrumental: true, syncedLyrics: '[00:01.00]x' },
            { id: 'bad' },
            { id: 2, trackName: 'Song', artistName: 'B', duration: null, syncedLyrics: '[00:01.00]y' }
        ]));

        const results = await provider.lookup({ title: 'Song' });

        expect(results).toHaveLength(1);
        expect(results[0].sourceArtist).toBe('B');
        expect(results[0].referenceDurationSeconds).toBe(0);
    });

    it('should return an empty list when nothing matches', async () => {
        fetchMock.mockResolvedValueOnce(jsonResponse([]));

        expect(await provider.lookup({ title: 'Nothing' })).toEqual([]);
    });

    it('should report HTTP errors as service unavailable', async () => {
        fetchMock.mockResolvedValueOnce(jsonResponse({ message: 'down' }, 503));

        const failure = provider.lookup({ title: 'Song' });
        await expect(failure).rejects.toBeInstanceOf(ServiceUnavailableError);
        await expect(failure).rejects.toMatchObject({ status: 503, code: 'SERVICE_UNAVAILABLE' });
    });

    it('should report network errors as service unavailable', async () => {
        fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

        await expect(provider.lookup({ title: 'Song' })).rejects.toBeInstanceOf(ServiceUnavailableError);
    });

    it('should reject bodies that are not a list', async () => {
        fetchMock.mockResolvedValueOnce(jsonResponse({ code: 400 }));

        await expect(provider.lookup({ title: 'Song' })).rejects.toThrow(/unexpected response shape/);
    });
});
