import type { LyricsCandidate } from "../interfaces/LyricsCandidate";
import type { NormalizedTitle } from "../interfaces/NormalizedTitle";
import type { ResolverSettings } from "../config/AppConfig";
import { calculateSimilarity, isSameName } from "../utils/Levenshtein";
import { Logger } from "../utils/Logger";

export type ArtistMatch = 'exact' | 'approximate' | 'none';

const ARTIST_MATCH_RANK: Record<ArtistMatch, number> = {
    exact: 2,
    approximate: 1,
    none: 0
};

export interface RankedCandidate {
    candidate: LyricsCandidate;

    /** |reference duration - target duration| in seconds */
    durationDelta: number;

    artistMatch: ArtistMatch;
    withinTolerance: boolean;
}

/**
 * Orders same-titled candidates by how well their reference duration fits
 * the track that is playing.
 */
export class CandidateRanker {
    constructor(private readonly settings: ResolverSettings) { }

    /**
     * The duration the original recording is expected to have. A slowed edit
     * runs longer than its original, so the live duration is divided by the
     * edit's tempo ratio.
     */
    public targetDuration(title: NormalizedTitle, liveDurationSeconds: number): number {
        if (!title.isModified) return liveDurationSeconds;
        const ratio = title.tempoRatio ?? this.settings.assumedTempoRatio;
        return liveDurationSeconds / ratio;
    }

    /**
     * Half-width of the accepted band: the larger of the absolute and the relative tolerance.
     */
    public tolerance(targetDurationSeconds: number): number {
        return Math.max(this.settings.toleranceSeconds, this.settings.toleranceFraction * targetDurationSeconds);
    }

    /**
     * Drops candidates whose title does not resemble the queried one, then
     * sorts by duration delta, breaking ties by artist match.
     */
    public rank(candidates: LyricsCandidate[], title: string, artist: string | undefined, targetDurationSeconds: number): RankedCandidate[] {
        const tolerance = this.tolerance(targetDurationSeconds);

        return candidates
            .filter(candidate => this.titleMatches(title, candidate))
            .map(candidate => {
                const durationDelta = Math.abs(candidate.referenceDurationSeconds - targetDurationSeconds);
                return {
                    candidate,
                    durationDelta,
                    artistMatch: this.matchArtist(artist, candidate.sourceArtist),
                    withinTolerance: durationDelta <= tolerance
                };
            })
            .sort((a, b) => a.durationDelta - b.durationDelta
                || ARTIST_MATCH_RANK[b.artistMatch] - ARTIST_MATCH_RANK[a.artistMatch]);
    }

    /**
     * Best candidate inside the tolerance band, if any.
     */
    public pick(candidates: LyricsCandidate[], title: string, artist: string | undefined, targetDurationSeconds: number): RankedCandidate | undefined {
        const [best] = this.rank(candidates, title, artist, targetDurationSeconds);
        if (!best) return undefined;

        if (!best.withinTolerance) {
            Logger.debug(`[Ranker] Closest candidate '${best.candidate.sourceArtist} - ${best.candidate.sourceTitle}' is ${best.durationDelta.toFixed(1)}s off (tolerance ${this.tolerance(targetDurationSeconds).toFixed(1)}s)`);
            return undefined;
        }
        return best;
    }

    public matchArtist(expected: string | undefined, actual: string): ArtistMatch {
        if (!expected || !actual) return 'none';
        if (isSameName(expected, actual)) return 'exact';
        return calculateSimilarity(expected, actual) >= this.settings.approximateArtistSimilarity ? 'approximate' : 'none';
    }

    private titleMatches(title: string, candidate: LyricsCandidate): boolean {
        return isSameName(title, candidate.sourceTitle)
            || calculateSimilarity(title, candidate.sourceTitle) >= this.settings.minTitleSimilarity;
    }
}
