export type AlignmentStatus = 'no-track' | 'resolving' | 'ready' | 'not-found';

/**
 * What the renderer gets on every tick.
 */
export interface AlignmentFrame {
    status: AlignmentStatus;
    trackId?: string;

    /** Display title and artist of the current track. */
    title?: string;
    artist?: string;

    /** Text of the active line; blank before the first line or without lyrics. */
    line: string;

    /** Texts of every scaled line; empty unless ready. */
    lines: readonly string[];

    /** Index of the active line, -1 for none. */
    activeIndex: number;

    /** Look-ahead for pre-rendering. */
    next?: {
        text: string;
        dueInSeconds: number;
    };

    lowConfidence: boolean;

    /** Human-readable explanation for no-track / not-found. */
    message?: string;
}

export interface LyricsRenderer {
    render(frame: AlignmentFrame): void;

    /** Restores the terminal (cursor etc). */
    close(): void;
}
