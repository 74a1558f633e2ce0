import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { MediaSessionSource } from '../interfaces/MediaSessionSource';
import type { SessionReading } from '../interfaces/PlaybackSnapshot';
import { Logger } from '../utils/Logger';

const execFileAsync = promisify(execFile);

const FIELD_SEPARATOR = '\t';

/**
 * playerctl metadata template; lengths and positions are in microseconds.
 */
export const PLAYERCTL_FORMAT = [
    '{{mpris:trackid}}',
    '{{xesam:title}}',
    '{{xesam:artist}}',
    '{{xesam:album}}',
    '{{mpris:length}}',
    '{{position}}',
    '{{status}}'
].join(FIELD_SEPARATOR);

export type CommandRunner = (file: string, args: string[]) => Promise<string>;

const runCommand: CommandRunner = async (file, args) => {
    const { stdout } = await execFileAsync(file, args, { timeout: 2000 });
    return stdout;
};

/**
 * Reads the active MPRIS session through the `playerctl` binary, following
 * only the allowed players in priority order.
 */
export class PlayerctlSession implements MediaSessionSource {
    public readonly name = 'playerctl';

    constructor(
        private readonly players: string[],
        private readonly run: CommandRunner = runCommand,
        private readonly now: () => number = Date.now
    ) { }

    public async read(): Promise<SessionReading> {
        const args = ['metadata', '--format', PLAYERCTL_FORMAT];
        if (this.players.length > 0) {
            args.unshift(`--player=${this.players.join(',')}`);
        }

        let stdout: string;
        try {
            stdout = await this.run('playerctl', args);
        } catch (error) {
            // playerctl exits non-zero when none of the players is running
            Logger.debug('[playerctl] No session', error);
            return { kind: 'no-session', reason: 'No player running' };
        }

        return parsePlayerctlOutput(stdout, this.now());
    }
}

/**
 * Turns one line of PLAYERCTL_FORMAT output into a session reading.
 */
export function parsePlayerctlOutput(stdout: string, sampledAt: number): SessionReading {
    const line = stdout.split('\n').find(l => l.trim() !== '');
    if (line === undefined) {
        return { kind: 'no-session', reason: 'No player running' };
    }

    const [mprisTrackId = '', title = '', artist = '', album = '', lengthMicros = '', positionMicros = '', status = ''] = line.split(FIELD_SEPARATOR);

    if (status.trim() === 'Stopped') {
        return { kind: 'no-session', reason: 'Playback stopped' };
    }

    const durationSeconds = Number(lengthMicros) / 1_000_000;
    if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
        // Browsers report the length a moment after the title
        return { kind: 'no-session', reason: 'Waiting for track length...' };
    }

    const position = Number(positionMicros) / 1_000_000;
    const positionSeconds = Number.isFinite(position) ? Math.min(Math.max(position, 0), durationSeconds) : 0;
    const rawTitle = title.trim();
    const rawArtist = artist.trim() || undefined;

    return {
        kind: 'snapshot',
        snapshot: {
            trackId: [mprisTrackId.trim(), rawTitle, rawArtist ?? '', lengthMicros.trim()].join('|'),
            rawTitle,
            rawArtist,
            rawAlbum: album.trim() || undefined,
            durationSeconds,
            positionSeconds,
            isPlaying: status.trim() === 'Playing',
            sampledAt
        }
    };
}
