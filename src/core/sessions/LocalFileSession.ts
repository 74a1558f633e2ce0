import path from 'node:path';
import type { MediaSessionSource } from '../interfaces/MediaSessionSource';
import type { SessionReading } from '../interfaces/PlaybackSnapshot';
import { MetadataService, type AudioMetadata, type AudioMetadataReader } from '../services/MetadataService';

/**
 * Pretends a local audio file is playing from the moment of the first read,
 * looping at its end. Useful for trying an edit without a player.
 */
export class LocalFileSession implements MediaSessionSource {
    public readonly name = 'LocalFile';

    private metadata?: Promise<AudioMetadata>;
    private startedAt?: number;

    constructor(
        private readonly filePath: string,
        private readonly reader: AudioMetadataReader = new MetadataService(),
        private readonly now: () => number = Date.now
    ) { }

    public async read(): Promise<SessionReading> {
        if (!this.metadata) {
            this.metadata = this.reader.read(this.filePath);
        }
        const metadata = await this.metadata;
        const sampledAt = this.now();

        const duration = metadata.durationSeconds;
        if (duration === undefined || duration <= 0) {
            return { kind: 'no-session', reason: `Cannot determine the length of ${path.basename(this.filePath)}` };
        }

        if (this.startedAt === undefined) {
            this.startedAt = sampledAt;
        }
        const elapsed = Math.max(0, (sampledAt - this.startedAt) / 1000);

        return {
            kind: 'snapshot',
            snapshot: {
                trackId: `file:${path.resolve(this.filePath)}`,
                rawTitle: metadata.title ?? path.basename(this.filePath, path.extname(this.filePath)),
                rawArtist: metadata.artist,
                rawAlbum: metadata.album,
                durationSeconds: duration,
                positionSeconds: elapsed % duration,
                isPlaying: true,
                sampledAt
            }
        };
    }
}
