import type { LyricsCandidate } from "../interfaces/LyricsCandidate";
import type { LyricsProvider } from "../interfaces/LyricsProvider";
import type { NormalizedTitle } from "../interfaces/NormalizedTitle";
import type { ResolverSettings } from "../config/AppConfig";
import { CandidateRanker } from "./CandidateRanker";
import { SearchQueryResolver, type LookupStep } from "../utils/SearchQueryResolver";
import { ErrorCode, ServiceUnavailableError } from "../utils/Errors";
import { Logger } from "../utils/Logger";

export type ResolveOutcome =
    | {
        kind: 'found';
        candidate: LyricsCandidate;
        step: LookupStep;
        durationDelta: number;
        targetDurationSeconds: number;
    }
    | { kind: 'not-found' }
    | { kind: 'unavailable'; error: ServiceUnavailableError };

/**
 * Finds the synced lyrics that belong to a normalized title, walking the
 * degradation path until a candidate falls inside the duration tolerance.
 */
export class LyricsResolver {
    private readonly ranker: CandidateRanker;

    constructor(
        private readonly provider: LyricsProvider,
        settings: ResolverSettings,
        private readonly planner: SearchQueryResolver = new SearchQueryResolver()
    ) {
        this.ranker = new CandidateRanker(settings);
    }

    public async resolve(title: NormalizedTitle, liveDurationSeconds: number, album?: string): Promise<ResolveOutcome> {
        const target = this.ranker.targetDuration(title, liveDurationSeconds);
        const steps = this.planner.plan(title, album);
        let lastFailure: ServiceUnavailableError | undefined;

        Logger.info(`[Resolver] Resolving '${title.cleanTitle}' by '${title.artist ?? 'Unknown'}' (live ${liveDurationSeconds.toFixed(1)}s, target ${target.toFixed(1)}s, ${steps.length} lookups)`);

        for (const step of steps) {
            let candidates: LyricsCandidate[];
            try {
                candidates = await this.provider.lookup(step.query);
            } catch (error) {
                if (!(error instanceof ServiceUnavailableError)) throw error;
                Logger.warn(`[Resolver] ${this.provider.name} unavailable for ${step.kind} lookup: ${error.message}`);
                lastFailure = error;
                continue;
            }

            const usable = candidates.filter(candidate => this.isUsable(candidate));
            const best = this.ranker.pick(usable, step.query.title, step.rankingArtist, target);
            Logger.debug(`[Resolver] ${step.kind}: ${candidates.length} candidates, ${usable.length} usable`);

            if (best) {
                Logger.info(`[Resolver] Matched '${best.candidate.sourceArtist} - ${best.candidate.sourceTitle}' (${best.candidate.referenceDurationSeconds.toFixed(1)}s, off by ${best.durationDelta.toFixed(1)}s, artist ${best.artistMatch}) via ${step.kind}`);
                return {
                    kind: 'found',
                    candidate: best.candidate,
                    step,
                    durationDelta: best.durationDelta,
                    targetDurationSeconds: target
                };
            }
        }

        // A failed lookup might have held the match, so the outcome stays retryable
        if (lastFailure) {
            return { kind: 'unavailable', error: lastFailure };
        }

        Logger.info(`[Resolver] ${ErrorCode.NO_CANDIDATE_FOUND}: nothing within tolerance for '${title.cleanTitle}'`);
        return { kind: 'not-found' };
    }

    private isUsable(candidate: LyricsCandidate): boolean {
        const duration = candidate.referenceDurationSeconds;
        if (!Number.isFinite(duration) || duration <= 0) {
            Logger.debug(`[Resolver] ${ErrorCode.INVALID_DURATION}: dropping '${candidate.sourceTitle}' (duration ${duration})`);
            return false;
        }
        if (candidate.syncedLines.length === 0) {
            Logger.debug(`[Resolver] Dropping '${candidate.sourceTitle}': no synced lines`);
            return false;
        }
        return true;
    }
}
