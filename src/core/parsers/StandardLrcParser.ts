import type { LyricsData, TimedLine } from "../models/LyricsData";

/**
 * Parses standard LRC format `[mm:ss.xx]Text`, as returned in
 * the `syncedLyrics` field of LRCLIB.
 */
export class StandardLrcParser {
    // [mm:ss], [mm:ss.x], [mm:ss.xx] or [mm:ss.xxx]
    private static TIMESTAMP_REGEX = /\[(\d{1,3}):(\d{2}(?:\.\d{1,3})?)\]/g;
    private static HAS_TIMESTAMP = /\[\d{1,3}:\d{2}(?:\.\d{1,3})?\]/;
    private static META_REGEX = /^\[([a-zA-Z]+):([^\]]*)\]$/;
    // Word-level tags of enhanced LRC, only stripped here
    private static WORD_TAG_REGEX = /<\d{1,3}:\d{2}(?:\.\d{1,3})?>/g;

    public parse(rawText: string): LyricsData {
        const metadata: Record<string, string> = {};
        const entries: { time: number; text: string; order: number }[] = [];

        rawText.split(/\r?\n/).forEach((rawLine) => {
            const line = rawLine.trim();
            if (!line) return;

            if (!StandardLrcParser.HAS_TIMESTAMP.test(line)) {
                const metaMatch = line.match(StandardLrcParser.META_REGEX);
                if (metaMatch) {
                    metadata[metaMatch[1].toLowerCase()] = metaMatch[2].trim();
                }
                return;
            }

            // A line may carry several timestamps: [00:01.00][00:10.00]Repeated lyrics
            const matches = [...line.matchAll(StandardLrcParser.TIMESTAMP_REGEX)];
            const text = line
                .replace(StandardLrcParser.TIMESTAMP_REGEX, '')
                .replace(StandardLrcParser.WORD_TAG_REGEX, '')
                .trim();

            for (const match of matches) {
                const minutes = parseInt(match[1], 10);
                const seconds = parseFloat(match[2]);
                entries.push({ time: minutes * 60 + seconds, text, order: entries.length });
            }
        });

        const offsetSeconds = this.parseOffset(metadata['offset']);

        // Sort by time, keeping file order for identical timestamps
        entries.sort((a, b) => a.time - b.time || a.order - b.order);

        const lines: TimedLine[] = entries.map(entry => ({
            // A positive [offset:] makes lyrics appear sooner
            timestampSeconds: Math.max(0, roundMillis(entry.time - offsetSeconds)),
            text: entry.text
        }));

        return { lines, metadata };
    }

    private parseOffset(raw: string | undefined): number {
        if (!raw) return 0;
        const ms = Number(raw);
        return Number.isFinite(ms) ? ms / 1000 : 0;
    }
}

function roundMillis(seconds: number): number {
    return Math.round(seconds * 1000) / 1000;
}
