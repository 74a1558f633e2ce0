import { describe, it, expect } from 'vitest';
import { StandardLrcParser } from './StandardLrcParser';
import { formatLrc, formatLrcTimestamp } from './LrcFormatter';

describe('StandardLrcParser', () => {
    const parser = new StandardLrcParser();

    it('should parse simple lyrics', () => {
        const lrc = `[00:01.00]Hello World
[00:02.50]Bye World`;
        const data = parser.parse(lrc);

        expect(data.lines).toHaveLength(2);
        expect(data.lines[0].timestampSeconds).toBe(1);
        expect(data.lines[0].text).toBe('Hello World');
        expect(data.lines[1].timestampSeconds).toBe(2.5);
    });

    it('should read centisecond and millisecond fractions', () => {
        const data = parser.parse(`[01:02.345]ms\n[00:03.5]tenths\n[00:04]whole`);

        expect(data.lines.map(l => l.timestampSeconds)).toEqual([3.5, 4, 62.345]);
    });

    it('should handle metadata', () => {
        const lrc = `[ti:Test Song]
[ar:Tester]
[00:01.00]Line 1`;
        const data = parser.parse(lrc);

        expect(data.metadata['ti']).toBe('Test Song');
        expect(data.metadata['ar']).toBe('Tester');
        expect(data.lines).toHaveLength(1);
    });

    it('should expand repeated timestamps and sort', () => {
        const data = parser.parse(`[00:10.00][00:01.00]Chorus\n[00:05.00]Verse`);

        expect(data.lines).toEqual([
            { timestampSeconds: 1, text: 'Chorus' },
            { timestampSeconds: 5, text: 'Verse' },
            { timestampSeconds: 10, text: 'Chorus' }
        ]);
    });

    it('should keep file order for identical timestamps', () => {
        const data = parser.parse(`[00:01.00]Original\n[00:01.00]Translation`);

        expect(data.lines.map(l => l.text)).toEqual(['Original', 'Translation']);
    });

    it('should strip word-level tags', () => {
        const data = parser.parse(`[00:01.00]<00:01.00>He<00:01.50>llo`);

        expect(data.lines[0].text).toBe('Hello');
    });

    it('should apply the offset tag', () => {
        const data = parser.parse(`[offset:+500]\n[00:02.00]Sooner`);

        expect(data.lines[0].timestampSeconds).toBe(1.5);
    });

    it('should keep empty instrumental lines', () => {
        const data = parser.parse(`[00:01.00]Sing\n[00:04.00]`);

        expect(data.lines[1]).toEqual({ timestampSeconds: 4, text: '' });
    });
});

describe('LrcFormatter', () => {
    it('should format timestamps', () => {
        expect(formatLrcTimestamp(13.333)).toBe('[00:13.33]');
        expect(formatLrcTimestamp(125.5)).toBe('[02:05.50]');
        expect(formatLrcTimestamp(0)).toBe('[00:00.00]');
    });

    it('should write tags before lines', () => {
        const text = formatLrc(
            [{ timestampSeconds: 1, text: 'One' }, { timestampSeconds: 2.25, text: 'Two' }],
            { ti: 'Song', ar: 'Artist', al: '' }
        );

        expect(text).toBe('[ti:Song]\n[ar:Artist]\n[00:01.00]One\n[00:02.25]Two');
    });
});
