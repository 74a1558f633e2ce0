import { foldForComparison } from "../utils/Levenshtein";

/**
 * Rounds a live duration to the nearest bucket, so re-plays of the same edit
 * share an entry while edits of a different length do not.
 */
export function durationBucket(durationSeconds: number, bucketSeconds: number): number {
    return Math.round(durationSeconds / bucketSeconds) * bucketSeconds;
}

function slug(value: string | undefined): string {
    if (!value) return "_";
    const folded = foldForComparison(value)
        .replace(/[^\p{L}\p{N}]+/gu, "-")
        .replace(/^-+|-+$/g, "");
    return folded || "_";
}

/**
 * Cache key for an (artist, title, duration bucket) tuple,
 * e.g. `the-artist|song-title|240`.
 */
export function trackSignature(
    artist: string | undefined,
    title: string,
    liveDurationSeconds: number,
    bucketSeconds: number
): string {
    return `${slug(artist)}|${slug(title)}|${durationBucket(liveDurationSeconds, bucketSeconds)}`;
}
