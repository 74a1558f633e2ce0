import { describe, it, expect } from 'vitest';
import { TimestampScaler } from './TimestampScaler';
import { InvalidDurationError } from '../utils/Errors';
import type { LyricsCandidate } from '../interfaces/LyricsCandidate';

function candidate(referenceDurationSeconds: number, timestamps: number[]): LyricsCandidate {
    return {
        referenceDurationSeconds,
        syncedLines: timestamps.map((t, i) => ({ timestampSeconds: t, text: `line ${i}` })),
        sourceTitle: 'Song',
        sourceArtist: 'Artist',
        source: 'test'
    };
}

describe('TimestampScaler', () => {
    const scaler = new TimestampScaler();

    it('should scale a slowed edit', () => {
        const result = scaler.scale(candidate(180, [10]), 240, 'artist|song|240', 1000);

        expect(result.scaleFactor).toBeCloseTo(1.3333, 4);
        expect(result.lines[0].timestampSeconds).toBeCloseTo(13.33, 2);
        expect(result.lowConfidence).toBe(false);
        expect(result.originSignature).toBe('artist|song|240');
        expect(result.resolvedAt).toBe(1000);
        expect(result.source).toEqual({ title: 'Song', artist: 'Artist', album: undefined });
    });

    it('should reproduce the factor it was given', () => {
        const source = candidate(180, [0, 5.5, 12, 61.25]);
        const factor = 1.5;
        const result = scaler.scale(source, 180 * factor, 'sig');

        result.lines.forEach((line, i) => {
            expect(line.timestampSeconds).toBeCloseTo(source.syncedLines[i].timestampSeconds * factor, 9);
            expect(line.text).toBe(source.syncedLines[i].text);
        });
    });

    it('should preserve non-decreasing order for any positive factor', () => {
        const source = candidate(200, [0, 0, 3.2, 3.2, 7.9, 120]);

        for (const live of [61, 150, 200, 333.3, 590]) {
            const times = scaler.scale(source, live, 'sig').lines.map(l => l.timestampSeconds);
            for (let i = 1; i < times.length; i++) {
                expect(times[i]).toBeGreaterThanOrEqual(times[i - 1]);
            }
        }
    });

    it('should flag factors outside the confident band', () => {
        expect(scaler.scale(candidate(100, [1]), 350, 'sig').lowConfidence).toBe(true);
        expect(scaler.scale(candidate(100, [1]), 25, 'sig').lowConfidence).toBe(true);
        expect(scaler.scale(candidate(100, [1]), 300, 'sig').lowConfidence).toBe(false);
    });

    it('should honour a configured band', () => {
        const strict = new TimestampScaler({ minConfidentFactor: 0.9, maxConfidentFactor: 1.6 });

        expect(strict.scale(candidate(100, [1]), 170, 'sig').lowConfidence).toBe(true);
    });

    it('should reject non-positive durations', () => {
        expect(() => scaler.scale(candidate(0, [1]), 240, 'sig')).toThrow(InvalidDurationError);
        expect(() => scaler.scale(candidate(0.0000001, [1]), 240, 'sig')).toThrow(InvalidDurationError);
        expect(() => scaler.scale(candidate(180, [1]), -5, 'sig')).toThrow(InvalidDurationError);
        expect(() => scaler.scale(candidate(Number.NaN, [1]), 240, 'sig')).toThrow(InvalidDurationError);
    });
});
