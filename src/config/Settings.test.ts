import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { makeTempDir } from '../testing/FakeMediaTool';
import { DEFAULT_SETTINGS, loadSettings, normalizeExtension } from './Settings';

describe('loadSettings', () => {
    let dir: string;
    let settingsPath: string;

    beforeEach(() => {
        dir = makeTempDir();
        settingsPath = path.join(dir, 'settings.json');
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    it('uses defaults without a file', () => {
        expect(loadSettings(settingsPath)).toEqual(DEFAULT_SETTINGS);
    });

    it('uses defaults for unparseable JSON', () => {
        fs.writeFileSync(settingsPath, '{ silence: ');
        expect(loadSettings(settingsPath)).toEqual(DEFAULT_SETTINGS);
    });

    it('reads configured values', () => {
        fs.writeFileSync(settingsPath, JSON.stringify({
            silence: { thresholdDb: -35, minDurationSec: 1.5 },
            extensions: ['MP4', '.mkv'],
            outputDirName: 'clean',
            cache: false
        }));

        expect(loadSettings(settingsPath)).toEqual({
            silence: { thresholdDb: -35, minDurationSec: 1.5 },
            extensions: ['.mp4', '.mkv'],
            outputDirName: 'clean',
            cache: false
        });
    });

    it('falls back field by field', () => {
        fs.writeFileSync(settingsPath, JSON.stringify({
            silence: { thresholdDb: 'loud' },
            extensions: [],
            outputDirName: ''
        }));

        expect(loadSettings(settingsPath)).toEqual(DEFAULT_SETTINGS);
    });

    it('warns about a non-object file', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        fs.writeFileSync(settingsPath, '[1, 2]');

        expect(loadSettings(settingsPath)).toEqual(DEFAULT_SETTINGS);
        expect(warn).toHaveBeenCalledTimes(1);
    });

    it('returns a copy that callers may modify', () => {
        const settings = loadSettings(settingsPath);
        settings.silence.thresholdDb = -10;
        expect(DEFAULT_SETTINGS.silence.thresholdDb).toBe(-40);
    });
});

describe('normalizeExtension', () => {
    it('lower-cases and adds the dot', () => {
        expect(normalizeExtension('MKV')).toBe('.mkv');
        expect(normalizeExtension(' .Mp4 ')).toBe('.mp4');
    });
});
