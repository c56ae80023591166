import * as path from 'path';
import type { SilenceSettings } from '../config/Settings';
import { SilenceCache } from '../services/SilenceCache';
import { RunLogger } from '../services/RunLogger';
import { FfmpegMediaTool, type MediaTool } from './MediaTool';
import { type DetectionResult, SilenceParser } from './SilenceParser';

export interface SilenceDetectorOptions extends SilenceSettings {
    useCache?: boolean;       // default true
    refreshCache?: boolean;   // drop an existing sidecar before detecting
}

/**
 * Finds silence intervals in a video's audio, reusing the sidecar cache when
 * its parameters match.
 */
export class SilenceDetector {
    constructor(
        private readonly options: SilenceDetectorOptions,
        private readonly mediaTool: MediaTool = new FfmpegMediaTool(),
        private readonly logger: RunLogger = new RunLogger()
    ) {}

    public async detect(videoPath: string): Promise<DetectionResult> {
        const { thresholdDb, minDurationSec } = this.options;
        const useCache = this.options.useCache ?? true;

        if (useCache && this.options.refreshCache) {
            SilenceCache.clear(videoPath);
        }

        if (useCache) {
            const cached = SilenceCache.load(videoPath, thresholdDb, minDurationSec);
            if (cached) {
                this.logger.info(`  Using cached silence data (${cached.length} interval(s))`);
                return cached;
            }
        }

        this.logger.info(`  Detecting silence in ${path.basename(videoPath)} (threshold: ${thresholdDb}dB, min: ${minDurationSec}s)`);

        const parser = new SilenceParser();
        await this.mediaTool.analyzeSilence(
            { inputPath: videoPath, thresholdDb, minDurationSec },
            (line) => parser.feed(line)
        );
        const result = parser.finish();

        this.logger.info(`  Found ${result.length} silence interval(s)`);

        if (useCache) {
            SilenceCache.save(videoPath, thresholdDb, minDurationSec, result);
        }

        return result;
    }
}
