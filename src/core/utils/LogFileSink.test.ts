import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { attachFileSink } from './LogFileSink';
import { Logger } from './Logger';

describe('attachFileSink', () => {
    let dir = '';

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should start a fresh file and append formatted entries', async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'log-sink-'));
        const logFile = path.join(dir, 'nested', 'debug.log');
        await attachFileSink(logFile).then(detach => detach());
        await writeFile(logFile, 'previous run\n');

        const detach = await attachFileSink(logFile);
        Logger.info('[Test] first');
        Logger.debug('[Test] filtered out');
        Logger.warn('[Test] second', { attempt: 2 });
        await detach();
        Logger.info('[Test] after detach');

        const lines = (await readFile(logFile, 'utf8')).trimEnd().split('\n');
        expect(lines).toHaveLength(2);
        expect(lines[0]).toMatch(/^\d{2}:\d{2}:\d{2} INFO \[Test\] first$/);
        expect(lines[1]).toMatch(/^\d{2}:\d{2}:\d{2} WARN \[Test\] second \{"attempt":2\}$/);
    });
});
