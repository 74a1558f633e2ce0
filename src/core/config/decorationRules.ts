import type { DecorationRule } from "../interfaces/NormalizedTitle";

/**
 * Decorations uploaders add to re-timed edits, in match order.
 * The first tempo-changing rule that matches decides the tempo ratio, so the
 * "super slowed" forms come before the plain ones.
 */
export const DEFAULT_DECORATION_RULES: readonly DecorationRule[] = [
    // (super slowed + reverb), [super slowed]
    { name: "super-slowed-bracketed", pattern: String.raw`[(\[]\s*super\s*slowed\b[^)\]]*[)\]]`, modifiesTempo: true, tempoRatio: 1.5 },
    // (slowed + reverb), (slowed & reverb), [slowed]
    { name: "slowed-bracketed", pattern: String.raw`[(\[]\s*slowed\b[^)\]]*[)\]]`, modifiesTempo: true, tempoRatio: 1.3 },
    { name: "sped-down-bracketed", pattern: String.raw`[(\[]\s*(?:sped|pitched)\s*down\b[^)\]]*[)\]]`, modifiesTempo: true, tempoRatio: 1.3 },
    { name: "sped-up-bracketed", pattern: String.raw`[(\[]\s*(?:sped\s*up|speed\s*up|nightcore)\b[^)\]]*[)\]]`, modifiesTempo: true, tempoRatio: 0.8 },
    // ~ super slowed, - super slowed ...
    { name: "super-slowed-suffix", pattern: String.raw`\s*[~|\-–—]\s*super\s*slowed\b.*$`, modifiesTempo: true, tempoRatio: 1.5 },
    { name: "slowed-suffix", pattern: String.raw`\s*[~|\-–—]\s*slowed\b.*$`, modifiesTempo: true, tempoRatio: 1.3 },
    { name: "super-slowed-bare", pattern: String.raw`\bsuper\s*slowed\b(?:\s*(?:(?:and|\+|&)\s*)?reverb\b)?`, modifiesTempo: true, tempoRatio: 1.5 },
    { name: "slowed-reverb-bare", pattern: String.raw`\bslowed\s*(?:(?:and|\+|&)\s*)?reverb\b`, modifiesTempo: true, tempoRatio: 1.3 },
    { name: "slowed-version", pattern: String.raw`\bslowed\s*version\b`, modifiesTempo: true, tempoRatio: 1.3 },
    { name: "sped-down-bare", pattern: String.raw`\b(?:sped|pitched)\s*down\b`, modifiesTempo: true, tempoRatio: 1.3 },
    { name: "sped-up-bare", pattern: String.raw`\bsped\s*up\b`, modifiesTempo: true, tempoRatio: 0.8 },
    { name: "slowed-trailing", pattern: String.raw`\s+slowed\s*$`, modifiesTempo: true, tempoRatio: 1.3 },

    { name: "youtube-music-suffix", pattern: String.raw`\s*-\s*YouTube Music\s*$`, modifiesTempo: false },
    { name: "video-tags", pattern: String.raw`[(\[]\s*(?:official\s*)?(?:music\s*|lyric\s*)?(?:video|audio|lyrics?|visuali[sz]er)\s*[)\]]`, modifiesTempo: false },
    { name: "featuring", pattern: String.raw`[(\[]\s*(?:feat\.?|ft\.?|featuring)\s[^)\]]*[)\]]`, modifiesTempo: false },
    { name: "effect-tags", pattern: String.raw`[(\[]\s*(?:reverb|8d(?:\s*audio)?|bass\s*boosted)\s*[)\]]`, modifiesTempo: false },
];
