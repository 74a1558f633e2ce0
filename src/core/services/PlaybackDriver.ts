import { setTimeout as sleep } from 'node:timers/promises';
import type { MediaSessionSource } from '../interfaces/MediaSessionSource';
import type { AlignmentFrame, LyricsRenderer } from '../interfaces/LyricsRenderer';
import { AlignmentLoop } from './AlignmentLoop';
import { Logger } from '../utils/Logger';

const MIN_TICK_MS = 20;

/**
 * Delay before the next tick. While playing, a line that falls due sooner
 * than the regular interval gets a tick of its own.
 */
export function nextTickDelay(frame: AlignmentFrame, isPlaying: boolean, intervalMs: number): number {
    if (frame.status !== 'ready' || !frame.next || !isPlaying) return intervalMs;
    const dueMs = Math.ceil(frame.next.dueInSeconds * 1000);
    return Math.min(intervalMs, Math.max(MIN_TICK_MS, dueMs));
}

/**
 * Periodic tick driver. Ticks never overlap: a slow session read pushes the
 * next tick back instead. The next tick is brought forward to when the next
 * line falls due.
 */
export class PlaybackDriver {
    private controller?: AbortController;
    private delayMs: number;

    constructor(
        private readonly session: MediaSessionSource,
        private readonly loop: AlignmentLoop,
        private readonly renderer: LyricsRenderer,
        private readonly intervalMs: number
    ) {
        this.delayMs = intervalMs;
    }

    public get running(): boolean {
        return this.controller !== undefined && !this.controller.signal.aborted;
    }

    public async tickOnce(): Promise<AlignmentFrame> {
        const reading = await this.session.read();
        const frame = this.loop.tick(reading);
        this.renderer.render(frame);
        this.delayMs = nextTickDelay(frame, reading.kind === 'snapshot' && reading.snapshot.isPlaying, this.intervalMs);
        return frame;
    }

    /**
     * Ticks until stop() is called. Resolves once the loop has exited.
     */
    public async start(): Promise<void> {
        if (this.running) return;
        const controller = new AbortController();
        this.controller = controller;
        Logger.info(`[Driver] Following ${this.session.name} every ${this.intervalMs}ms`);

        while (!controller.signal.aborted) {
            const startedAt = Date.now();
            try {
                await this.tickOnce();
            } catch (error) {
                Logger.error('[Driver] Tick failed', error);
                this.delayMs = this.intervalMs;
            }

            const wait = Math.max(0, this.delayMs - (Date.now() - startedAt));
            try {
                await sleep(wait, undefined, { signal: controller.signal });
            } catch (error) {
                if (!controller.signal.aborted) throw error;
            }
        }

        Logger.info('[Driver] Stopped');
    }

    public stop() {
        this.controller?.abort();
    }
}
