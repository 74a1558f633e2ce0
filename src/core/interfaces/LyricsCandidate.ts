import type { TimedLine } from "../models/LyricsData";

/**
 * One synced-lyrics result returned by a lyrics provider.
 */
export interface LyricsCandidate {
    /**
     * Optional ID on the source platform.
     */
    id?: string;

    /**
     * Duration in seconds of the recording the lyrics were timed against.
     */
    referenceDurationSeconds: number;

    /**
     * Timed lines, timestamps non-decreasing.
     */
    syncedLines: TimedLine[];

    /**
     * Title, artist and album as found on the provider (for verifying match).
     */
    sourceTitle: string;
    sourceArtist: string;
    sourceAlbum?: string;

    /**
     * Provider source identifier (e.g. "LRCLIB").
     */
    source: string;
}
