import type { AlignmentSettings } from "../config/AppConfig";
import type { AlignmentFrame, AlignmentStatus } from "../interfaces/LyricsRenderer";
import type { NormalizedTitle } from "../interfaces/NormalizedTitle";
import type { PlaybackSnapshot, SessionReading } from "../interfaces/PlaybackSnapshot";
import type { ScaledLyrics } from "../models/LyricsData";
import type { LoadOutcome, LyricsLoader } from "./LyricsManager";
import { PlaybackSynchronizer } from "./PlaybackSynchronizer";
import { TitleNormalizer } from "./TitleNormalizer";
import { foldForComparison } from "../utils/Levenshtein";
import { isLyricsError } from "../utils/Errors";
import { Logger } from "../utils/Logger";

const WAITING_MESSAGE = "Waiting for song info...";

type Completion =
    | { ticket: number; trackId: string; outcome: LoadOutcome }
    | { ticket: number; trackId: string; failure: unknown };

interface CurrentTrack {
    trackId: string;
    title: NormalizedTitle;
    durationSeconds: number;
    album?: string;
}

/**
 * Per-track state machine. Each tick takes the latest session reading and
 * returns the frame to draw; lyrics resolution runs in the background and
 * is picked up by the first tick after it settles.
 */
export class AlignmentLoop {
    private status: AlignmentStatus = 'no-track';
    private track?: CurrentTrack;
    private lyrics?: ScaledLyrics;
    private activeIndex = -1;
    private message?: string;

    // Bumped on every launch and reset; a completion is applied only if its ticket is current
    private ticket = 0;
    private completion?: Completion;
    private inFlight?: Promise<void>;
    private launchedAt = 0;
    private retryAt?: number;

    constructor(
        private readonly loader: LyricsLoader,
        private readonly settings: AlignmentSettings,
        private readonly normalizer: TitleNormalizer = new TitleNormalizer(),
        private readonly synchronizer: PlaybackSynchronizer = new PlaybackSynchronizer()
    ) { }

    /**
     * Settles once the resolution in flight (if any) has completed. Its
     * result is still only applied by the next tick.
     */
    public async whenIdle(): Promise<void> {
        await this.inFlight;
    }

    public tick(reading: SessionReading): AlignmentFrame {
        if (reading.kind === 'no-session') {
            this.reset(reading.reason);
            return this.frame();
        }

        const snapshot = reading.snapshot;
        if (this.isIgnored(snapshot.rawTitle)) {
            this.reset(WAITING_MESSAGE);
            return this.frame();
        }

        if (snapshot.trackId !== this.track?.trackId) {
            this.beginTrack(snapshot);
        } else {
            this.applyCompletion();
            if (this.status === 'not-found' && this.retryAt !== undefined && snapshot.sampledAt >= this.retryAt) {
                Logger.info(`[Alignment] Retrying lyrics for '${snapshot.rawTitle}'`);
                this.launch(snapshot.sampledAt);
            }
        }

        if (this.status === 'ready' && this.lyrics) {
            this.activeIndex = this.synchronizer.advance(this.lyrics.lines, this.activeIndex, snapshot.positionSeconds);
        }

        return this.frame(snapshot.positionSeconds);
    }

    private beginTrack(snapshot: PlaybackSnapshot) {
        const title = this.normalizer.normalize(snapshot.rawTitle, snapshot.rawArtist);
        Logger.info(`[Alignment] Track changed: '${snapshot.rawTitle}' -> '${title.cleanTitle}' by '${title.artist ?? 'Unknown'}' (${snapshot.durationSeconds.toFixed(1)}s)`);

        this.track = {
            trackId: snapshot.trackId,
            title,
            durationSeconds: snapshot.durationSeconds,
            album: snapshot.rawAlbum
        };
        this.launch(snapshot.sampledAt);
    }

    private launch(sampledAt: number) {
        const track = this.track;
        if (!track) return;

        this.status = 'resolving';
        this.lyrics = undefined;
        this.activeIndex = -1;
        this.message = undefined;
        this.retryAt = undefined;
        this.completion = undefined;
        this.launchedAt = sampledAt;

        const ticket = ++this.ticket;
        const trackId = track.trackId;
        this.inFlight = this.loader
            .loadLyricsForTrack(track.title, track.durationSeconds, { album: track.album })
            .then(
                outcome => this.complete({ ticket, trackId, outcome }),
                (failure: unknown) => this.complete({ ticket, trackId, failure })
            );
    }

    private complete(completion: Completion) {
        if (completion.ticket !== this.ticket) {
            Logger.debug(`[Alignment] Discarding stale result for ${completion.trackId}`);
            return;
        }
        this.completion = completion;
    }

    private applyCompletion() {
        const completion = this.completion;
        if (!completion) return;
        this.completion = undefined;

        if (completion.ticket !== this.ticket || completion.trackId !== this.track?.trackId) {
            return;
        }

        if ('failure' in completion) {
            Logger.error(`[Alignment] Lyrics pipeline failed for ${completion.trackId}`, completion.failure);
            this.status = 'not-found';
            this.message = isLyricsError(completion.failure)
                ? `Lyrics lookup failed (${completion.failure.code})`
                : "Lyrics lookup failed";
            return;
        }

        const outcome = completion.outcome;
        switch (outcome.kind) {
            case 'ready':
                if (outcome.lyrics.lowConfidence && this.settings.suppressLowConfidence) {
                    Logger.warn(`[Alignment] Suppressing low-confidence lyrics (factor ${outcome.lyrics.scaleFactor.toFixed(2)})`);
                    this.status = 'not-found';
                    this.message = `Lyrics timing looks wrong (x${outcome.lyrics.scaleFactor.toFixed(2)})`;
                    return;
                }
                this.status = 'ready';
                this.lyrics = outcome.lyrics;
                this.activeIndex = -1;
                this.message = undefined;
                return;
            case 'not-found':
                this.status = 'not-found';
                this.message = outcome.reason;
                return;
            case 'unavailable':
                this.status = 'not-found';
                this.message = "Lyrics service unavailable";
                this.retryAt = this.launchedAt + this.settings.serviceRetrySeconds * 1000;
                return;
        }
    }

    private reset(message: string) {
        if (this.track) {
            Logger.info(`[Alignment] Track cleared: ${message}`);
        }
        // Invalidate whatever is still in flight
        this.ticket++;
        this.status = 'no-track';
        this.track = undefined;
        this.lyrics = undefined;
        this.activeIndex = -1;
        this.completion = undefined;
        this.retryAt = undefined;
        this.message = message;
    }

    private isIgnored(rawTitle: string): boolean {
        const folded = foldForComparison(rawTitle);
        return this.settings.ignoredTitles.some(ignored => foldForComparison(ignored) === folded);
    }

    private frame(positionSeconds = 0): AlignmentFrame {
        const track = this.track;
        const lyrics = this.status === 'ready' ? this.lyrics : undefined;
        const active = lyrics?.lines[this.activeIndex];

        return {
            status: this.status,
            trackId: track?.trackId,
            title: track?.title.cleanTitle,
            artist: track?.title.artist,
            line: active?.text ?? '',
            lines: lyrics ? lyrics.lines.map(line => line.text) : [],
            activeIndex: lyrics ? this.activeIndex : -1,
            next: lyrics ? this.synchronizer.lookAhead(lyrics.lines, this.activeIndex, positionSeconds) : undefined,
            lowConfidence: lyrics?.lowConfidence ?? false,
            message: this.message
        };
    }
}
