import type { LyricsCache } from "../interfaces/LyricsCache";
import type { ScaledLyrics } from "../models/LyricsData";

/**
 * Process-local cache, used by tests and by one-shot commands run with --no-cache.
 */
export class MemoryLyricsCache implements LyricsCache {
    private entries = new Map<string, ScaledLyrics>();

    public async get(signature: string): Promise<ScaledLyrics | undefined> {
        return this.entries.get(signature);
    }

    public async put(signature: string, lyrics: ScaledLyrics): Promise<void> {
        this.entries.set(signature, lyrics);
    }

    public async clear(): Promise<number> {
        const count = this.entries.size;
        this.entries.clear();
        return count;
    }

    public get size(): number {
        return this.entries.size;
    }
}
