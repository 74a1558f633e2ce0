import { createHash, randomUUID } from "node:crypto";
import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { LyricsCache } from "../interfaces/LyricsCache";
import type { ScaledLyrics } from "../models/LyricsData";
import { CacheCorruptError } from "../utils/Errors";
import { Logger } from "../utils/Logger";

const CACHE_VERSION = 1;

const CacheEntrySchema = z.object({
    version: z.literal(CACHE_VERSION),
    signature: z.string(),
    scaleFactor: z.number().positive(),
    lowConfidence: z.boolean(),
    liveDurationSeconds: z.number().positive(),
    referenceDurationSeconds: z.number().positive(),
    resolvedAt: z.string().datetime(),
    source: z.object({
        title: z.string(),
        artist: z.string(),
        album: z.string().optional(),
    }),
    lines: z.array(z.object({
        t: z.number().nonnegative(),
        text: z.string(),
    })),
});

type CacheEntry = z.infer<typeof CacheEntrySchema>;

/**
 * One JSON file per signature under `directory`:
 *
 * ```json
 * { "version": 1, "signature": "artist|song|240", "scaleFactor": 1.333,
 *   "resolvedAt": "2024-05-01T10:00:00.000Z", "lines": [{ "t": 13.33, "text": "..." }], ... }
 * ```
 *
 * Writes go through a temp file and a rename, so a reader never sees half an entry.
 */
export class FileLyricsCache implements LyricsCache {
    constructor(private readonly directory: string) { }

    public async get(signature: string): Promise<ScaledLyrics | undefined> {
        const file = this.fileFor(signature);
        let raw: string;
        try {
            raw = await readFile(file, "utf8");
        } catch (error) {
            if (!isMissingFile(error)) {
                Logger.warn(`[Cache] Cannot read ${file}`, error);
            }
            return undefined;
        }

        try {
            return this.decode(raw, signature);
        } catch (error) {
            // Treated as a miss; the next successful resolution overwrites it
            Logger.warn(`[Cache] Ignoring corrupt entry for ${signature}`, error);
            return undefined;
        }
    }

    public async put(signature: string, lyrics: ScaledLyrics): Promise<void> {
        await mkdir(this.directory, { recursive: true });
        const file = this.fileFor(signature);
        const temp = `${file}.${randomUUID()}.tmp`;
        await writeFile(temp, JSON.stringify(this.encode(signature, lyrics)), "utf8");
        await rename(temp, file);
        Logger.debug(`[Cache] Stored ${signature} -> ${path.basename(file)}`);
    }

    public async clear(): Promise<number> {
        let names: string[];
        try {
            names = await readdir(this.directory);
        } catch (error) {
            if (isMissingFile(error)) return 0;
            throw error;
        }

        const entries = names.filter(name => name.endsWith(".json"));
        // Leftovers of interrupted writes
        const temps = names.filter(name => name.endsWith(".tmp"));
        await Promise.all([...entries, ...temps].map(name => rm(path.join(this.directory, name), { force: true })));
        Logger.info(`[Cache] Cleared ${entries.length} entries from ${this.directory}`);
        return entries.length;
    }

    /**
     * Readable prefix plus a hash of the full signature, so long titles cannot collide.
     */
    public fileFor(signature: string): string {
        const readable = signature.replace(/[^a-z0-9_.-]+/gi, "_").slice(0, 80);
        const hash = createHash("sha1").update(signature).digest("hex").slice(0, 12);
        return path.join(this.directory, `${readable}-${hash}.json`);
    }

    private encode(signature: string, lyrics: ScaledLyrics): CacheEntry {
        return {
            version: CACHE_VERSION,
            signature,
            scaleFactor: lyrics.scaleFactor,
            lowConfidence: lyrics.lowConfidence,
            liveDurationSeconds: lyrics.liveDurationSeconds,
            referenceDurationSeconds: lyrics.referenceDurationSeconds,
            resolvedAt: new Date(lyrics.resolvedAt).toISOString(),
            source: lyrics.source,
            lines: lyrics.lines.map(line => ({ t: line.timestampSeconds, text: line.text })),
        };
    }

    private decode(raw: string, signature: string): ScaledLyrics {
        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (error) {
            throw new CacheCorruptError(`Entry for ${signature} is not JSON`, error);
        }

        const parsed = CacheEntrySchema.safeParse(json);
        if (!parsed.success) {
            throw new CacheCorruptError(`Entry for ${signature} does not match the cache schema`, parsed.error.issues);
        }
        const entry = parsed.data;
        if (entry.signature !== signature) {
            throw new CacheCorruptError(`Entry for ${signature} was stored under ${entry.signature}`);
        }

        return {
            lines: entry.lines.map(line => ({ timestampSeconds: line.t, text: line.text })),
            scaleFactor: entry.scaleFactor,
            lowConfidence: entry.lowConfidence,
            originSignature: entry.signature,
            liveDurationSeconds: entry.liveDurationSeconds,
            referenceDurationSeconds: entry.referenceDurationSeconds,
            resolvedAt: Date.parse(entry.resolvedAt),
            source: entry.source,
        };
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}
