import type { LyricsCandidate } from "../interfaces/LyricsCandidate";
import type { ScaledLyrics } from "../models/LyricsData";
import type { ScalerSettings } from "../config/AppConfig";
import { InvalidDurationError } from "../utils/Errors";

const MIN_DURATION_SECONDS = 0.001;

const DEFAULT_SETTINGS: ScalerSettings = {
    minConfidentFactor: 0.3,
    maxConfidentFactor: 3.0
};

/**
 * Re-times a candidate's lines to the duration of the live track with a
 * single linear factor.
 */
export class TimestampScaler {
    constructor(private readonly settings: ScalerSettings = DEFAULT_SETTINGS) { }

    public scaleFactor(referenceDurationSeconds: number, liveDurationSeconds: number): number {
        assertDuration("reference", referenceDurationSeconds);
        assertDuration("live", liveDurationSeconds);
        return liveDurationSeconds / referenceDurationSeconds;
    }

    public isConfident(factor: number): boolean {
        return factor >= this.settings.minConfidentFactor && factor <= this.settings.maxConfidentFactor;
    }

    /**
     * A factor outside the confident band still yields lyrics, flagged
     * lowConfidence; whether to show them is the caller's call.
     */
    public scale(candidate: LyricsCandidate, liveDurationSeconds: number, signature: string, now: number = Date.now()): ScaledLyrics {
        const factor = this.scaleFactor(candidate.referenceDurationSeconds, liveDurationSeconds);

        return {
            lines: candidate.syncedLines.map(line => ({
                timestampSeconds: line.timestampSeconds * factor,
                text: line.text
            })),
            scaleFactor: factor,
            lowConfidence: !this.isConfident(factor),
            originSignature: signature,
            liveDurationSeconds,
            referenceDurationSeconds: candidate.referenceDurationSeconds,
            resolvedAt: now,
            source: {
                title: candidate.sourceTitle,
                artist: candidate.sourceArtist,
                album: candidate.sourceAlbum
            }
        };
    }
}

function assertDuration(kind: string, seconds: number) {
    if (!Number.isFinite(seconds) || seconds < MIN_DURATION_SECONDS) {
        throw new InvalidDurationError(`The ${kind} duration must be positive, got ${seconds}`, seconds);
    }
}
