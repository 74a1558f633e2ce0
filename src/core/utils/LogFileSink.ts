import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { Logger, formatLogEntry } from './Logger';

/**
 * Mirrors every log entry into a file, truncated on attach.
 * Returns a detach function that also closes the file.
 */
export async function attachFileSink(logFile: string): Promise<() => Promise<void>> {
    await mkdir(path.dirname(logFile), { recursive: true });
    const stream = createWriteStream(logFile, { flags: 'w' });
    stream.on('error', error => {
        Logger.setConsoleEnabled(true);
        Logger.error(`[Log] Cannot write ${logFile}`, error);
    });

    const unsubscribe = Logger.subscribe(entry => {
        stream.write(`${formatLogEntry(entry)}\n`);
    });

    return () => new Promise<void>(resolve => {
        unsubscribe();
        stream.end(() => resolve());
    });
}
