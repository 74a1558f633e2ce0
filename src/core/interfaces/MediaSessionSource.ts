import type { SessionReading } from "./PlaybackSnapshot";

/**
 * Reads the state of the active media session.
 */
export interface MediaSessionSource {
    name: string;

    /** Never rejects: a failed read is reported as a no-session reading. */
    read(): Promise<SessionReading>;
}
