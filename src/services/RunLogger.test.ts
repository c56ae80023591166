import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { makeTempDir } from '../testing/FakeMediaTool';
import { fileTimestamp, RunLogger } from './RunLogger';

describe('RunLogger', () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTempDir();
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    it('routes levels to the matching console method', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const logger = new RunLogger();

        logger.info('one');
        logger.warn('two');
        logger.error('three');

        expect(log).toHaveBeenCalledWith('one');
        expect(warn).toHaveBeenCalledWith('two');
        expect(error).toHaveBeenCalledWith('three');
    });

    it('stays silent with echo off', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        new RunLogger({ echo: false }).info('hidden');
        expect(log).not.toHaveBeenCalled();
    });

    it('transcribes every line and closes when the task finishes', async () => {
        const transcript = path.join(dir, 'logs', 'run.log');
        const seen: RunLogger[] = [];

        await RunLogger.withTranscript(transcript, async (logger) => {
            seen.push(logger);
            logger.info('Processing: a.mkv');
            logger.error('  boom');
        }, { echo: false });

        expect(fs.readFileSync(transcript, 'utf-8')).toBe('Processing: a.mkv\n  boom\n');
        expect(seen.map(logger => logger.isOpen)).toEqual([false]);
    });

    it('closes the transcript when the task throws', async () => {
        const transcript = path.join(dir, 'run.log');
        const seen: RunLogger[] = [];

        await expect(RunLogger.withTranscript(transcript, async (logger) => {
            seen.push(logger);
            throw new Error('task failed');
        }, { echo: false })).rejects.toThrow('task failed');

        expect(seen.map(logger => logger.isOpen)).toEqual([false]);
    });
});

describe('fileTimestamp', () => {
    it('formats local time as YYYYMMDD_HHMMSS', () => {
        expect(fileTimestamp(new Date(2024, 0, 5, 7, 8, 9))).toBe('20240105_070809');
    });
});
