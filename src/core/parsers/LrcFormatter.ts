import type { TimedLine } from "../models/LyricsData";

/**
 * Formats seconds as an LRC timestamp, `[mm:ss.xx]`.
 */
export function formatLrcTimestamp(seconds: number): string {
    const centis = Math.max(0, Math.round(seconds * 100));
    const minutes = Math.floor(centis / 6000);
    const rest = (centis % 6000) / 100;
    return `[${String(minutes).padStart(2, '0')}:${rest.toFixed(2).padStart(5, '0')}]`;
}

/**
 * Renders timed lines back to LRC text, optionally with ID tags first.
 */
export function formatLrc(lines: TimedLine[], tags: Record<string, string> = {}): string {
    const header = Object.entries(tags)
        .filter(([, value]) => value.length > 0)
        .map(([key, value]) => `[${key}:${value}]`);
    const body = lines.map(line => `${formatLrcTimestamp(line.timestampSeconds)}${line.text}`);
    return [...header, ...body].join('\n');
}
