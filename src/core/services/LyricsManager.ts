import { Logger } from "../utils/Logger";
import type { LyricsCache } from "../interfaces/LyricsCache";
import type { NormalizedTitle } from "../interfaces/NormalizedTitle";
import type { ScaledLyrics } from "../models/LyricsData";
import { LyricsResolver } from "./LyricsResolver";
import { TimestampScaler } from "./TimestampScaler";
import { trackSignature } from "../cache/TrackSignature";
import { ErrorCode, InvalidDurationError, ServiceUnavailableError } from "../utils/Errors";

export type LoadOutcome =
    | { kind: 'ready'; lyrics: ScaledLyrics; fromCache: boolean }
    | { kind: 'not-found'; reason: string }
    | { kind: 'unavailable'; error: ServiceUnavailableError };

export interface LoadOptions {
    album?: string;
    /** Skip the cache lookup (the result is still stored). */
    ignoreCache?: boolean;
}

/**
 * Anything that can turn a normalized title into lyrics for the alignment loop.
 */
export interface LyricsLoader {
    loadLyricsForTrack(title: NormalizedTitle, liveDurationSeconds: number, options?: LoadOptions): Promise<LoadOutcome>;
}

/**
 * Main facade of the pipeline: cache, then resolve and scale, then store.
 */
export class LyricsManager implements LyricsLoader {
    constructor(
        private readonly resolver: LyricsResolver,
        private readonly scaler: TimestampScaler,
        private readonly cache: LyricsCache,
        private readonly bucketSeconds: number
    ) { }

    public signatureFor(title: NormalizedTitle, liveDurationSeconds: number): string {
        return trackSignature(title.artist, title.cleanTitle, liveDurationSeconds, this.bucketSeconds);
    }

    public async loadLyricsForTrack(title: NormalizedTitle, liveDurationSeconds: number, options: LoadOptions = {}): Promise<LoadOutcome> {
        if (!Number.isFinite(liveDurationSeconds) || liveDurationSeconds <= 0) {
            Logger.warn(`[LyricsManager] ${ErrorCode.INVALID_DURATION}: live duration ${liveDurationSeconds} for '${title.cleanTitle}'`);
            return { kind: 'not-found', reason: 'Track reports no duration' };
        }

        const signature = this.signatureFor(title, liveDurationSeconds);
        Logger.info(`[LyricsManager] LoadLyrics. Signature: ${signature}. IgnoreCache: ${options.ignoreCache ?? false}`);

        if (!options.ignoreCache) {
            const cached = await this.readCache(signature, liveDurationSeconds);
            if (cached) {
                return { kind: 'ready', lyrics: cached, fromCache: true };
            }
        }

        const outcome = await this.resolver.resolve(title, liveDurationSeconds, options.album);
        if (outcome.kind === 'not-found') {
            return { kind: 'not-found', reason: 'No synced lyrics found' };
        }
        if (outcome.kind === 'unavailable') {
            // Never cached, so the next attempt asks the service again
            return outcome;
        }

        let lyrics: ScaledLyrics;
        try {
            lyrics = this.scaler.scale(outcome.candidate, liveDurationSeconds, signature);
        } catch (error) {
            if (!(error instanceof InvalidDurationError)) throw error;
            Logger.warn(`[LyricsManager] ${error.message}`);
            return { kind: 'not-found', reason: 'Matched lyrics have no usable duration' };
        }

        Logger.info(`[LyricsManager] Scale factor ${lyrics.scaleFactor.toFixed(3)}x (${lyrics.referenceDurationSeconds.toFixed(1)}s -> ${liveDurationSeconds.toFixed(1)}s)${lyrics.lowConfidence ? ' LOW CONFIDENCE' : ''}`);

        // Low-confidence results are stored too; clearing the cache is the remedy
        try {
            await this.cache.put(signature, lyrics);
        } catch (error) {
            Logger.warn(`[LyricsManager] Failed to store ${signature} in the cache`, error);
        }

        return { kind: 'ready', lyrics, fromCache: false };
    }

    public async clearCache(): Promise<number> {
        return this.cache.clear();
    }

    private async readCache(signature: string, liveDurationSeconds: number): Promise<ScaledLyrics | undefined> {
        let cached: ScaledLyrics | undefined;
        try {
            cached = await this.cache.get(signature);
        } catch (error) {
            Logger.warn(`[LyricsManager] Cache read failed for ${signature}`, error);
            return undefined;
        }
        if (!cached) return undefined;

        // A stale scale factor must not leak onto a different edit of the same song
        const drift = Math.abs(cached.liveDurationSeconds - liveDurationSeconds);
        if (drift > this.bucketSeconds) {
            Logger.info(`[LyricsManager] Ignoring cached ${signature}: stored for ${cached.liveDurationSeconds.toFixed(1)}s, playing ${liveDurationSeconds.toFixed(1)}s`);
            return undefined;
        }

        Logger.info(`[LyricsManager] Cache hit for ${signature}`);
        return cached;
    }
}
