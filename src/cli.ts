import { loadConfig, type AppConfig } from '@/core/config/AppConfig';
import { MemoryLyricsCache } from '@/core/cache/MemoryLyricsCache';
import { formatLrc } from '@/core/parsers/LrcFormatter';
import { AlignmentLoop } from '@/core/services/AlignmentLoop';
import { PlaybackDriver } from '@/core/services/PlaybackDriver';
import { createLyricsServices } from '@/core/services/createLyricsServices';
import { LocalFileSession } from '@/core/sessions/LocalFileSession';
import { PlayerctlSession } from '@/core/sessions/PlayerctlSession';
import { ConfigError } from '@/core/utils/Errors';
import { attachFileSink } from '@/core/utils/LogFileSink';
import { Logger, formatLogEntry } from '@/core/utils/Logger';
import { TerminalRenderer } from '@/ui/TerminalRenderer';
import { USAGE, configOverrides, parseCliArgs, type CliArgs } from '@/cli/CliArgs';

async function watch(args: CliArgs, config: AppConfig) {
    const detachLog = await attachFileSink(config.logFile);
    // The renderer owns the terminal from here on
    Logger.setConsoleEnabled(false);

    const services = createLyricsServices(config, args.noCache ? { cache: new MemoryLyricsCache() } : {});
    const session = args.file ? new LocalFileSession(args.file) : new PlayerctlSession(config.players);
    const loop = new AlignmentLoop(services.manager, config.alignment, services.normalizer);
    const renderer = new TerminalRenderer(process.stdout);
    const driver = new PlaybackDriver(session, loop, renderer, config.tickIntervalMs);

    const shutdown = () => driver.stop();
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    try {
        await driver.start();
    } finally {
        renderer.close();
        process.off('SIGINT', shutdown);
        process.off('SIGTERM', shutdown);
        Logger.setConsoleEnabled(true);
        await detachLog();
    }
}

async function resolve(args: CliArgs, config: AppConfig) {
    // stdout carries the LRC only
    Logger.setConsoleEnabled(false);
    Logger.subscribe(entry => {
        process.stderr.write(`${formatLogEntry(entry)}\n`);
    });

    const title = args.title ?? '';
    const durationSeconds = args.durationSeconds ?? 0;
    const services = createLyricsServices(config, args.noCache ? { cache: new MemoryLyricsCache() } : {});
    const normalized = services.normalizer.normalize(title, args.artist);
    const outcome = await services.manager.loadLyricsForTrack(normalized, durationSeconds, { album: args.album });

    switch (outcome.kind) {
        case 'ready': {
            const lyrics = outcome.lyrics;
            process.stderr.write(`Matched '${lyrics.source.artist} - ${lyrics.source.title}', scaled ${lyrics.scaleFactor.toFixed(3)}x (${lyrics.referenceDurationSeconds.toFixed(1)}s -> ${lyrics.liveDurationSeconds.toFixed(1)}s)${outcome.fromCache ? ' from cache' : ''}${lyrics.lowConfidence ? ', timing may be off' : ''}\n`);
            process.stdout.write(`${formatLrc(lyrics.lines, {
                ti: lyrics.source.title,
                ar: lyrics.source.artist,
                al: lyrics.source.album ?? ''
            })}\n`);
            return;
        }
        case 'not-found':
            process.stderr.write(`${outcome.reason}\n`);
            process.exitCode = 1;
            return;
        case 'unavailable':
            process.stderr.write(`Lyrics service unavailable: ${outcome.error.message}\n`);
            process.exitCode = 1;
            return;
    }
}

async function clearCache(config: AppConfig) {
    const services = createLyricsServices(config);
    const removed = await services.manager.clearCache();
    process.stdout.write(`Removed ${removed} cached ${removed === 1 ? 'entry' : 'entries'} from ${config.cacheDir}\n`);
}

async function main(argv: string[]) {
    let args: CliArgs;
    let config: AppConfig;
    try {
        args = parseCliArgs(argv);
        if (args.command === 'help') {
            process.stdout.write(USAGE);
            return;
        }
        config = await loadConfig({ configPath: args.configPath, overrides: configOverrides(args) });
    } catch (error) {
        if (!(error instanceof ConfigError)) throw error;
        process.stderr.write(`${error.message}\n\n${USAGE}`);
        process.exitCode = 2;
        return;
    }

    Logger.setLevel(config.logLevel);

    switch (args.command) {
        case 'watch':
            await watch(args, config);
            return;
        case 'resolve':
            await resolve(args, config);
            return;
        case 'clear-cache':
            await clearCache(config);
            return;
    }
}

main(process.argv.slice(2)).catch((error: unknown) => {
    Logger.setConsoleEnabled(true);
    Logger.error('[CLI] Fatal error', error);
    process.exitCode = 1;
});
