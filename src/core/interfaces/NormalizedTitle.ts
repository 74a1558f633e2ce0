/**
 * Where the artist of a NormalizedTitle came from.
 * - metadata: the session reported an artist
 * - title: split off the raw title ("Artist - Song")
 * - none: unknown
 */
export type ArtistSource = 'metadata' | 'title' | 'none';

/**
 * Best-guess identity of the original song behind a decorated title.
 */
export interface NormalizedTitle {
    cleanTitle: string;
    artist?: string;
    artistSource: ArtistSource;

    /** True if a tempo-changing decoration ("slowed + reverb", "sped up") was stripped. */
    isModified: boolean;

    /**
     * Expected live/original duration ratio hinted by the first tempo-changing
     * decoration that matched (e.g. 1.3 for "slowed").
     */
    tempoRatio?: number;
}

/**
 * One entry of the decoration rule set. Rules are data: adding one never
 * touches the normalizer.
 */
export interface DecorationRule {
    name: string;

    /** Regular expression source, applied case-insensitively. */
    pattern: string;

    /** Whether a match means the audio was re-timed. */
    modifiesTempo: boolean;

    /** live/original duration ratio implied by the rule. */
    tempoRatio?: number;
}
