import * as fs from 'fs';
import * as path from 'path';
import { describeError } from '../errors';
import type { DetectionResult, SilenceInterval } from '../processing/SilenceParser';

type SilenceTriple = [number, number | null, number | null];

/**
 * On-disk layout of a cache sidecar.
 */
export interface SilenceCacheFile {
    video: string;
    threshold: number;
    min_duration: number;
    timestamp: string;
    silences: SilenceTriple[];
}

const isNumberOrNull = (value: unknown): value is number | null =>
    value === null || (typeof value === 'number' && Number.isFinite(value));

function isSilenceTriple(value: unknown): value is SilenceTriple {
    return Array.isArray(value)
        && value.length === 3
        && typeof value[0] === 'number'
        && Number.isFinite(value[0])
        && isNumberOrNull(value[1])
        && isNumberOrNull(value[2]);
}

function isCacheFile(value: unknown): value is SilenceCacheFile {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    return 'video' in value && typeof value.video === 'string'
        && 'threshold' in value && typeof value.threshold === 'number'
        && 'min_duration' in value && typeof value.min_duration === 'number'
        && 'timestamp' in value && typeof value.timestamp === 'string'
        && 'silences' in value && Array.isArray(value.silences)
        && value.silences.every(isSilenceTriple);
}

/**
 * Stored intervals must still read as a detection result: non-negative
 * ascending starts, closed intervals with `end > start` and a matching
 * duration, and at most one open interval, in last place.
 */
function isOrderedDetection(silences: readonly SilenceTriple[]): boolean {
    return silences.every(([start, end, duration], index) => {
        if (start < 0) {
            return false;
        }
        if (index > 0 && start <= silences[index - 1][0]) {
            return false;
        }
        if (end === null) {
            return duration === null && index === silences.length - 1;
        }
        return end > start && duration === end - start;
    });
}

/**
 * Detected silences persisted beside each video as a hidden JSON sidecar.
 * Stored results are only reused when detection parameters match exactly;
 * any problem reading a sidecar is treated as a miss.
 */
export class SilenceCache {
    private static SUFFIX = '.silence.json';

    /**
     * Sidecar path: same directory, hidden, named after the video.
     */
    public static getCachePath(videoPath: string): string {
        const resolved = path.resolve(videoPath);
        return path.join(path.dirname(resolved), `.${path.basename(resolved)}${SilenceCache.SUFFIX}`);
    }

    /**
     * Return cached intervals, or null on a miss.
     */
    public static load(videoPath: string, thresholdDb: number, minDurationSec: number): DetectionResult | null {
        const cachePath = SilenceCache.getCachePath(videoPath);
        if (!fs.existsSync(cachePath)) {
            return null;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(fs.readFileSync(cachePath, 'utf-8'));
        } catch {
            return null;
        }

        if (!isCacheFile(parsed) || !isOrderedDetection(parsed.silences)) {
            return null;
        }
        if (parsed.threshold !== thresholdDb || parsed.min_duration !== minDurationSec) {
            return null;
        }

        return parsed.silences.map(([start, end, duration]): SilenceInterval => ({ start, end, duration }));
    }

    /**
     * Persist intervals. Empty results are not written. Returns the sidecar
     * path, or null when nothing was written.
     */
    public static save(
        videoPath: string,
        thresholdDb: number,
        minDurationSec: number,
        result: DetectionResult
    ): string | null {
        if (result.length === 0) {
            return null;
        }

        const cachePath = SilenceCache.getCachePath(videoPath);
        const entry: SilenceCacheFile = {
            video: path.resolve(videoPath),
            threshold: thresholdDb,
            min_duration: minDurationSec,
            timestamp: new Date().toISOString(),
            silences: result.map((s): SilenceTriple => [s.start, s.end, s.duration])
        };

        try {
            fs.writeFileSync(cachePath, JSON.stringify(entry, null, 2), 'utf-8');
            return cachePath;
        } catch (error) {
            console.warn(`[SilenceCache] Could not write ${cachePath}: ${describeError(error)}`);
            return null;
        }
    }

    /**
     * Remove the sidecar for a video, if any. Returns false when there was
 * nothing to remove or it could not be removed.
     */
    public static clear(videoPath: string): boolean {
        const cachePath = SilenceCache.getCachePath(videoPath);
        if (!fs.existsSync(cachePath)) {
            return false;
        }
        try {
            fs.unlinkSync(cachePath);
            return true;
        } catch (error) {
            console.warn(`[SilenceCache] Could not remove ${cachePath}: ${describeError(error)}`);
            return false;
        }
    }
}
