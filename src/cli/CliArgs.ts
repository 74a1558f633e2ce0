import { ConfigError } from '@/core/utils/Errors';

export type CliCommand = 'watch' | 'resolve' | 'clear-cache' | 'help';

export interface CliArgs {
    command: CliCommand;
    /** Raw title to resolve. */
    title?: string;
    file?: string;
    configPath?: string;
    intervalMs?: number;
    players?: string[];
    durationSeconds?: number;
    artist?: string;
    album?: string;
    noCache: boolean;
    verbose: boolean;
}

export const USAGE = `Usage:
  stretch-lyrics [watch] [--file <audio>] [--config <path>] [--interval <ms>] [--players a,b]
  stretch-lyrics resolve "<raw title>" --duration <seconds> [--artist <a>] [--album <b>] [--no-cache]
  stretch-lyrics clear-cache [--config <path>]

Options:
  --file <audio>      Follow a local audio file instead of the MPRIS session
  --config <path>     Config file (default ~/.config/stretch-lyrics/config.json)
  --interval <ms>     Tick interval
  --players <a,b>     MPRIS players to follow, in priority order
  --duration <s>      Live track length for resolve
  --no-cache          Do not read or write the lyrics cache
  --verbose           Debug logging
  -h, --help          Show this help
`;

const COMMANDS: readonly CliCommand[] = ['watch', 'resolve', 'clear-cache', 'help'];
const VALUE_FLAGS = ['--file', '--config', '--interval', '--players', '--duration', '--artist', '--album'] as const;
type ValueFlag = typeof VALUE_FLAGS[number];

/**
 * Parses `process.argv.slice(2)`. Flags accept both `--flag value` and `--flag=value`.
 */
export function parseCliArgs(argv: string[]): CliArgs {
    const args: CliArgs = { command: 'watch', noCache: false, verbose: false };
    const positional: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg === '-h' || arg === '--help') {
            args.command = 'help';
            continue;
        }
        if (arg === '--no-cache') {
            args.noCache = true;
            continue;
        }
        if (arg === '--verbose') {
            args.verbose = true;
            continue;
        }
        if (!arg.startsWith('--')) {
            positional.push(arg);
            continue;
        }

        const eq = arg.indexOf('=');
        const name = eq === -1 ? arg : arg.slice(0, eq);
        const flag = VALUE_FLAGS.find(f => f === name);
        if (!flag) {
            throw new ConfigError(`Unknown option ${name}`);
        }

        let value: string | undefined;
        if (eq !== -1) {
            value = arg.slice(eq + 1);
        } else {
            value = argv[i + 1];
            i++;
        }
        if (value === undefined || value === '') {
            throw new ConfigError(`Option ${flag} needs a value`);
        }
        applyFlag(args, flag, value);
    }

    if (args.command === 'help') return args;

    const [first, ...rest] = positional;
    if (first !== undefined) {
        const command = COMMANDS.find(c => c === first);
        if (!command) {
            throw new ConfigError(`Unknown command ${first}`);
        }
        args.command = command;
    }

    if (args.command === 'resolve') {
        args.title = rest.join(' ').trim() || undefined;
        if (!args.title) throw new ConfigError('resolve needs a title');
        if (args.durationSeconds === undefined) throw new ConfigError('resolve needs --duration');
    } else if (rest.length > 0) {
        throw new ConfigError(`Unexpected argument ${rest[0]}`);
    }

    return args;
}

function applyFlag(args: CliArgs, flag: ValueFlag, value: string) {
    switch (flag) {
        case '--file':
            args.file = value;
            break;
        case '--config':
            args.configPath = value;
            break;
        case '--interval':
            args.intervalMs = parseNumber(flag, value);
            break;
        case '--players':
            args.players = value.split(',').map(p => p.trim()).filter(p => p.length > 0);
            break;
        case '--duration':
            args.durationSeconds = parseNumber(flag, value);
            break;
        case '--artist':
            args.artist = value;
            break;
        case '--album':
            args.album = value;
            break;
    }
}

function parseNumber(flag: string, value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
        throw new ConfigError(`Option ${flag} expects a number, got "${value}"`);
    }
    return parsed;
}

/**
 * Config overrides carried by the flags; validated together with the file.
 */
export function configOverrides(args: CliArgs): Record<string, unknown> {
    const overrides: Record<string, unknown> = {};
    if (args.intervalMs !== undefined) overrides.tickIntervalMs = args.intervalMs;
    if (args.players !== undefined) overrides.players = args.players;
    if (args.verbose) overrides.logLevel = 'debug';
    return overrides;
}
