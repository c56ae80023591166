import * as fs from 'fs';
import * as path from 'path';

/**
 * Silence detection parameters. Both take part in cache validity.
 */
export interface SilenceSettings {
    thresholdDb: number;      // below this level counts as silence, e.g. -40
    minDurationSec: number;   // quieter passages shorter than this are ignored
}

export interface Settings {
    silence: SilenceSettings;
    extensions: string[];     // lower-case, with leading dot
    outputDirName: string;
    cache: boolean;
}

export const DEFAULT_SETTINGS: Settings = {
    silence: {
        thresholdDb: -40,
        minDurationSec: 2
    },
    extensions: ['.mkv'],
    outputDirName: 'trimmed',
    cache: true
};

export function defaultSettingsPath(): string {
    return path.join(process.cwd(), 'config', 'settings.json');
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const finiteOr = (value: unknown, fallback: number): number =>
    typeof value === 'number' && Number.isFinite(value) ? value : fallback;

export function normalizeExtension(ext: string): string {
    const lower = ext.trim().toLowerCase();
    return lower.startsWith('.') ? lower : `.${lower}`;
}

/**
 * Load settings from config/settings.json. Missing file or bad values fall
 * back to defaults field by field.
 */
export function loadSettings(settingsPath: string = defaultSettingsPath()): Settings {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(settingsPath, 'utf-8'));
    } catch {
        return structuredClone(DEFAULT_SETTINGS);
    }

    if (!isRecord(raw)) {
        console.warn(`[Settings] Ignoring ${settingsPath}: expected a JSON object`);
        return structuredClone(DEFAULT_SETTINGS);
    }

    const silence = isRecord(raw.silence) ? raw.silence : {};
    const extensions = Array.isArray(raw.extensions)
        ? raw.extensions.filter((ext): ext is string => typeof ext === 'string' && ext.trim() !== '')
        : [];

    return {
        silence: {
            thresholdDb: finiteOr(silence.thresholdDb, DEFAULT_SETTINGS.silence.thresholdDb),
            minDurationSec: finiteOr(silence.minDurationSec, DEFAULT_SETTINGS.silence.minDurationSec)
        },
        extensions: extensions.length > 0
            ? extensions.map(normalizeExtension)
            : [...DEFAULT_SETTINGS.extensions],
        outputDirName: typeof raw.outputDirName === 'string' && raw.outputDirName.trim() !== ''
            ? raw.outputDirName
            : DEFAULT_SETTINGS.outputDirName,
        cache: typeof raw.cache === 'boolean' ? raw.cache : DEFAULT_SETTINGS.cache
    };
}
