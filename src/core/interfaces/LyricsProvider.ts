import type { LyricsCandidate } from "./LyricsCandidate";

/**
 * A single lookup against a lyrics service.
 */
export interface LyricsQuery {
    title: string;
    artist?: string;
    album?: string;
}

/**
 * Interface for a source of synced lyrics.
 */
export interface LyricsProvider {
    /**
     * Name of the provider.
     */
    name: string;

    /**
     * Look up candidates for a query. Resolves to an empty list when the
     * service has nothing; rejects with ServiceUnavailableError when the
     * service could not be asked.
     */
    lookup(query: LyricsQuery): Promise<LyricsCandidate[]>;
}
