/**
 * A point-in-time read of the media session (MPRIS-style).
 * Produced once per tick by a MediaSessionSource; read-only to the core.
 */
export interface PlaybackSnapshot {
    /** Opaque, stable per distinct track. */
    readonly trackId: string;

    readonly rawTitle: string;
    readonly rawArtist?: string;
    readonly rawAlbum?: string;

    /** Track length in seconds, > 0. */
    readonly durationSeconds: number;

    /** 0 <= position <= duration. Jumps on seek or loop. */
    readonly positionSeconds: number;

    readonly isPlaying: boolean;

    /** Epoch ms at which the snapshot was taken. */
    readonly sampledAt: number;
}

/**
 * What the session layer reports on each tick: a snapshot, or an explicit
 * signal that nothing is playing (player closed, no active session).
 */
export type SessionReading =
    | { readonly kind: 'snapshot'; readonly snapshot: PlaybackSnapshot }
    | { readonly kind: 'no-session'; readonly reason: string };
