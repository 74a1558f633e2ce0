import type { ScaledLyrics } from "../models/LyricsData";

/**
 * Store of scaled lyrics keyed by track signature.
 * Absence always means "resolve again".
 */
export interface LyricsCache {
    get(signature: string): Promise<ScaledLyrics | undefined>;

    /** Overwrites on collision; the same signature implies an equivalent result. */
    put(signature: string, lyrics: ScaledLyrics): Promise<void>;

    /** Removes every entry. Returns the number removed. */
    clear(): Promise<number>;
}
