import { parseFile } from 'music-metadata';
import { Logger } from '../utils/Logger';

export interface AudioMetadata {
    title?: string;
    artist?: string;
    album?: string;
    durationSeconds?: number;
}

export interface AudioMetadataReader {
    read(filePath: string): Promise<AudioMetadata>;
}

export class MetadataService implements AudioMetadataReader {

    /**
     * Reads tags and duration of a local audio file.
     * Returns partial metadata (what is found).
     */
    public async read(filePath: string): Promise<AudioMetadata> {
        try {
            // duration: true makes music-metadata scan the whole file when the header has no length
            const metadata = await parseFile(filePath, { duration: true });
            const common = metadata.common;

            const result: AudioMetadata = {};

            if (common.title) result.title = common.title;
            if (common.artist) result.artist = common.artist;
            if (common.album) result.album = common.album;
            if (metadata.format.duration !== undefined && metadata.format.duration > 0) {
                result.durationSeconds = metadata.format.duration;
            }

            Logger.info(`[Metadata] ${filePath}: '${result.title ?? '?'}' by '${result.artist ?? '?'}', ${result.durationSeconds?.toFixed(1) ?? '?'}s`);
            return result;
        } catch (error) {
            Logger.warn(`[Metadata] Failed to parse ${filePath}`, error);
            return {};
        }
    }
}
