/**
 * A single timed line of lyrics.
 */
export interface TimedLine {
    /** Absolute start time in seconds */
    timestampSeconds: number;

    /** Text content (may be empty for instrumental gaps) */
    text: string;
}

/**
 * Parsed content of an LRC document.
 */
export interface LyricsData {
    /** Lines sorted by timestamp, non-decreasing. */
    lines: TimedLine[];

    /**
     * Metadata extracted from ID tags (e.g. [ti:Title], [ar:Artist]).
     * Key-value format.
     */
    metadata: Record<string, string>;
}

/**
 * Where a set of scaled lyrics came from.
 */
export interface LyricsSourceInfo {
    title: string;
    artist: string;
    album?: string;
}

/**
 * Lyrics re-timed to the duration of the track that is actually playing.
 * Created once per resolved track and never mutated afterwards.
 */
export interface ScaledLyrics {
    lines: TimedLine[];

    /** liveDuration / referenceDuration */
    scaleFactor: number;

    /** Set when scaleFactor falls outside the confident band (a likely bad match). */
    lowConfidence: boolean;

    /** Cache key the lyrics were stored or loaded under. */
    originSignature: string;

    liveDurationSeconds: number;
    referenceDurationSeconds: number;

    /** Epoch ms of the resolution. */
    resolvedAt: number;

    source: LyricsSourceInfo;
}
