import * as fs from 'fs';
import * as path from 'path';
import { describeError } from '../errors';
import { RunLogger } from '../services/RunLogger';
import { type CutSpan, FfmpegMediaTool, type MediaTool } from './MediaTool';
import { formatTime } from './TimeFormat';

export type CutStatus = 'created' | 'skipped' | 'failed';

export interface CutResult {
    status: CutStatus;
    outputPath: string;
    message: string;
}

export function describeSpan(span: CutSpan): string {
    return `${formatTime(span.start)} - ${span.end === undefined ? 'end' : formatTime(span.end)}`;
}

/**
 * Issues lossless cuts. An existing destination is never overwritten, so
 * reruns only produce what is missing.
 */
export class TrimExecutor {
    constructor(
        private readonly mediaTool: MediaTool = new FfmpegMediaTool(),
        private readonly logger: RunLogger = new RunLogger()
    ) {}

    public async cut(inputPath: string, outputPath: string, span: CutSpan): Promise<CutResult> {
        const name = path.basename(outputPath);

        if (fs.existsSync(outputPath)) {
            this.logger.info(`  [SKIP] ${name} already exists`);
            return { status: 'skipped', outputPath, message: 'Output already exists' };
        }

        try {
            await this.mediaTool.copySegment(inputPath, outputPath, span);
        } catch (error) {
            const message = describeError(error);
            this.logger.error(`  [FAIL] ${name} (${describeSpan(span)}): ${message}`);
            this.removePartial(outputPath);
            return { status: 'failed', outputPath, message };
        }

        this.logger.info(`  [OK] ${name} (${describeSpan(span)})`);
        return { status: 'created', outputPath, message: `Cut ${describeSpan(span)}` };
    }

    /**
     * ffmpeg may leave a truncated file behind; remove it so a rerun retries.
     */
    private removePartial(outputPath: string): void {
        try {
            if (fs.existsSync(outputPath)) {
                fs.unlinkSync(outputPath);
            }
        } catch (error) {
            this.logger.warn(`[TrimExecutor] Failed to remove partial output ${outputPath}: ${describeError(error)}`);
        }
    }
}
