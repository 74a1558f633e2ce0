import { describe, it, expect } from 'vitest';
import { configOverrides, parseCliArgs } from './CliArgs';
import { ConfigError } from '@/core/utils/Errors';

describe('parseCliArgs', () => {
    it('should default to watching the player', () => {
        expect(parseCliArgs([])).toEqual({ command: 'watch', noCache: false, verbose: false });
    });

    it('should read watch options in both flag forms', () => {
        const args = parseCliArgs(['watch', '--file', 'song.mp3', '--interval=500', '--players', 'spotify, firefox,']);

        expect(args).toEqual({
            command: 'watch',
            file: 'song.mp3',
            intervalMs: 500,
            players: ['spotify', 'firefox'],
            noCache: false,
            verbose: false
        });
    });

    it('should join the words of a resolve title', () => {
        const args = parseCliArgs(['resolve', 'Artist', '-', 'Song (Slowed)', '--duration', '240', '--album=Album', '--no-cache']);

        expect(args.command).toBe('resolve');
        expect(args.title).toBe('Artist - Song (Slowed)');
        expect(args.durationSeconds).toBe(240);
        expect(args.album).toBe('Album');
        expect(args.noCache).toBe(true);
    });

    it('should show help regardless of the other arguments', () => {
        expect(parseCliArgs(['resolve', '--help']).command).toBe('help');
        expect(parseCliArgs(['-h']).command).toBe('help');
    });

    it('should reject malformed input', () => {
        expect(() => parseCliArgs(['--bogus'])).toThrow(ConfigError);
        expect(() => parseCliArgs(['sing'])).toThrow('Unknown command sing');
        expect(() => parseCliArgs(['--interval'])).toThrow('Option --interval needs a value');
        expect(() => parseCliArgs(['--interval', 'soon'])).toThrow('Option --interval expects a number, got "soon"');
        expect(() => parseCliArgs(['resolve', '--duration', '240'])).toThrow('resolve needs a title');
        expect(() => parseCliArgs(['resolve', 'Song'])).toThrow('resolve needs --duration');
        expect(() => parseCliArgs(['clear-cache', 'now'])).toThrow('Unexpected argument now');
    });
});

describe('configOverrides', () => {
    it('should only carry the flags that were given', () => {
        expect(configOverrides(parseCliArgs([]))).toEqual({});
        expect(configOverrides(parseCliArgs(['--interval', '250', '--players', 'chromium', '--verbose']))).toEqual({
            tickIntervalMs: 250,
            players: ['chromium'],
            logLevel: 'debug'
        });
    });
});
