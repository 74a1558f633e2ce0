import type { TimedLine } from "../models/LyricsData";

/**
 * Handles time-based synchronization of the active line.
 */
export class PlaybackSynchronizer {
    /**
     * Finds the active lyric line for the given time by binary search.
     * @returns Index of the last line starting at or before the position, -1 for none.
     */
    public findLineIndex(lines: TimedLine[], positionSeconds: number): number {
        if (lines.length === 0) return -1;

        let low = 0;
        let high = lines.length - 1;
        let result = -1;

        while (low <= high) {
            const mid = Math.floor((low + high) / 2);
            if (lines[mid].timestampSeconds <= positionSeconds) {
                result = mid; // Candidate found
                low = mid + 1; // Try to find a later one that is still <= position
            } else {
                high = mid - 1;
            }
        }

        return result;
    }

    /**
     * Moves the active index to a new position. Playback normally only moves
     * forward, so the index is stepped from where it was; a backward seek
     * below the active line starts over with a full search.
     */
    public advance(lines: TimedLine[], currentIndex: number, positionSeconds: number): number {
        if (currentIndex >= lines.length || (currentIndex >= 0 && positionSeconds < lines[currentIndex].timestampSeconds)) {
            return this.findLineIndex(lines, positionSeconds);
        }

        let index = Math.max(currentIndex, -1);
        while (index + 1 < lines.length && lines[index + 1].timestampSeconds <= positionSeconds) {
            index++;
        }
        return index;
    }

    /**
     * The line after the active one and how long until it is due.
     */
    public lookAhead(lines: TimedLine[], activeIndex: number, positionSeconds: number): { text: string; dueInSeconds: number } | undefined {
        const next = lines[activeIndex + 1];
        if (!next) return undefined;
        return {
            text: next.text,
            dueInSeconds: Math.max(0, next.timestampSeconds - positionSeconds)
        };
    }
}
