import ffmpeg from 'fluent-ffmpeg';
import * as path from 'path';
import { ExternalToolError } from '../errors';

export interface SilenceAnalysisRequest {
    inputPath: string;
    thresholdDb: number;
    minDurationSec: number;
}

/**
 * A range to copy. Without `end` the copy runs to the end of the file.
 */
export interface CutSpan {
    start: number;
    end?: number;
}

/**
 * External media collaborator: silence analysis and lossless stream copy.
 */
export interface MediaTool {
    analyzeSilence(request: SilenceAnalysisRequest, onLine: (line: string) => void): Promise<void>;
    copySegment(inputPath: string, outputPath: string, span: CutSpan): Promise<void>;
}

export function silenceDetectFilter(thresholdDb: number, minDurationSec: number): string {
    return `silencedetect=n=${thresholdDb}dB:d=${minDurationSec}`;
}

export function copyOptions(span: CutSpan): string[] {
    const options: string[] = [];
    if (span.start > 0) {
        options.push('-ss', span.start.toFixed(2));
    }
    if (span.end !== undefined) {
        options.push('-to', span.end.toFixed(2));
    }
    options.push('-c', 'copy');
    return options;
}

/**
 * MediaTool backed by the ffmpeg binary on PATH (or FFMPEG_PATH).
 */
export class FfmpegMediaTool implements MediaTool {
    /**
     * Run silencedetect over the audio and stream ffmpeg's stderr line by line.
     */
    public analyzeSilence(request: SilenceAnalysisRequest, onLine: (line: string) => void): Promise<void> {
        const { inputPath, thresholdDb, minDurationSec } = request;

        return new Promise((resolve, reject) => {
            ffmpeg(inputPath)
                .noVideo()
                .audioFilters(silenceDetectFilter(thresholdDb, minDurationSec))
                .format('null')
                .output('-')
                .on('stderr', (line: string) => onLine(line))
                .on('end', () => resolve())
                .on('error', (err: Error) => {
                    reject(new ExternalToolError(
                        `Silence analysis failed for ${path.basename(inputPath)}: ${err.message}`,
                        { cause: err }
                    ));
                })
                .run();
        });
    }

    /**
     * Copy the streams between span.start and span.end without re-encoding.
     */
    public copySegment(inputPath: string, outputPath: string, span: CutSpan): Promise<void> {
        return new Promise((resolve, reject) => {
            ffmpeg(inputPath)
                .outputOptions(copyOptions(span))
                .output(outputPath)
                .on('end', () => resolve())
                .on('error', (err: Error) => {
                    reject(new ExternalToolError(
                        `Failed to cut ${path.basename(outputPath)}: ${err.message}`,
                        { cause: err }
                    ));
                })
                .run();
        });
    }
}
