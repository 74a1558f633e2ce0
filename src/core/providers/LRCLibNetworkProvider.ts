import { z } from "zod";
import { Logger } from "../utils/Logger";
import type { LyricsProvider, LyricsQuery } from "../interfaces/LyricsProvider";
import type { LyricsCandidate } from "../interfaces/LyricsCandidate";
import { StandardLrcParser } from "../parsers/StandardLrcParser";
import { ServiceUnavailableError } from "../utils/Errors";

const LrcLibRecordSchema = z.object({
    id: z.number(),
    trackName: z.string(),
    artistName: z.string(),
    albumName: z.string().nullish(),
    duration: z.number().nullish(),
    instrumental: z.boolean().optional(),
    plainLyrics: z.string().nullish(),
    syncedLyrics: z.string().nullish(),
});

type LrcLibRecord = z.infer<typeof LrcLibRecordSchema>;

export interface LRCLibOptions {
    /** e.g. https://lrclib.net/api */
    apiBase: string;
    timeoutMs: number;
    userAgent?: string;
}

export class LRCLibNetworkProvider implements LyricsProvider {
    public name = "LRCLIB";
    private readonly parser = new StandardLrcParser();

    constructor(private readonly options: LRCLibOptions) { }

    public async lookup(query: LyricsQuery): Promise<LyricsCandidate[]> {
        const searchUrl = this.buildSearchUrl(query);
        Logger.info(`[LRCLIB] Searching: ${searchUrl}`);

        let response: Response;
        try {
            response = await fetch(searchUrl, {
                headers: {
                    'Accept': 'application/json',
                    'User-Agent': this.options.userAgent ?? 'stretch-lyrics/0.1.0'
                },
                signal: AbortSignal.timeout(this.options.timeoutMs)
            });
        } catch (error) {
            throw new ServiceUnavailableError(`Request to ${this.name} failed`, undefined, error);
        }

        if (!response.ok) {
            throw new ServiceUnavailableError(`${this.name} search failed with status ${response.status}`, response.status);
        }

        let data: unknown;
        try {
            data = await response.json();
        } catch (error) {
            throw new ServiceUnavailableError(`${this.name} returned a body that is not JSON`, response.status, error);
        }
        if (!Array.isArray(data)) {
            throw new ServiceUnavailableError(`${this.name} returned an unexpected response shape`, response.status);
        }

        const candidates: LyricsCandidate[] = [];
        for (const item of data) {
            const parsed = LrcLibRecordSchema.safeParse(item);
            if (!parsed.success) {
                Logger.debug(`[LRCLIB] Skipping malformed record`, parsed.error.issues);
                continue;
            }
            const candidate = this.mapToCandidate(parsed.data);
            if (candidate) candidates.push(candidate);
        }

        Logger.info(`[LRCLIB] ${data.length} records, ${candidates.length} with synced lyrics`);
        return candidates;
    }

    public buildSearchUrl(query: LyricsQuery): string {
        const params = new URLSearchParams({ track_name: query.title });
        if (query.artist) params.set('artist_name', query.artist);
        if (query.album) params.set('album_name', query.album);
        return `${this.options.apiBase.replace(/\/+$/, '')}/search?${params.toString()}`;
    }

    private mapToCandidate(record: LrcLibRecord): LyricsCandidate | null {
        if (record.instrumental || !record.syncedLyrics) return null;

        return {
            id: String(record.id),
            // lrclib reports seconds; a missing duration is left for the resolver to discard
            referenceDurationSeconds: record.duration ?? 0,
            syncedLines: this.parser.parse(record.syncedLyrics).lines,
            sourceTitle: record.trackName,
            sourceArtist: record.artistName,
            sourceAlbum: record.albumName ?? undefined,
            source: this.name
        };
    }
}
