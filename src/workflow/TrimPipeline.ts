import * as fs from 'fs';
import * as path from 'path';
import type { Settings } from '../config/Settings';
import {
    describeError,
    NoSilenceFoundError,
    NotADirectoryError,
    NotAFileError,
    PathNotFoundError,
    UnsupportedExtensionError
} from '../errors';
import { FfmpegMediaTool, type MediaTool } from '../processing/MediaTool';
import {
    planManualCut,
    planSplit,
    planTruncate,
    segmentFileName,
    type SegmentPlan
} from '../processing/SegmentPlanner';
import { SilenceDetector } from '../processing/SilenceDetector';
import { formatTime } from '../processing/TimeFormat';
import { type CutResult, describeSpan, TrimExecutor } from '../processing/TrimExecutor';
import { fileTimestamp, RunLogger } from '../services/RunLogger';

/**
 * What to do with each file:
 * - trim:  keep everything before the last detected silence
 * - cut:   keep everything before a fixed timestamp (no detection)
 * - split: one output per stretch between silences
 */
export type TrimMode =
    | { mode: 'trim' }
    | { mode: 'cut'; cutAt: number }
    | { mode: 'split' };

export type RunOptions = TrimMode & {
    preview?: boolean;        // detect and plan only; no cuts, no output directory
    refreshCache?: boolean;
};

export type FileStatus = 'completed' | 'previewed' | 'skipped' | 'failed';

export interface FileResult {
    file: string;
    status: FileStatus;
    message: string;
    plan: SegmentPlan;
    segments: CutResult[];
}

export interface BatchSummary {
    total: number;
    completed: number;
    skipped: number;
    failed: number;
    files: FileResult[];
    transcriptPath?: string;
}

/**
 * Sequential detect -> plan -> cut over a directory or a single file.
 * A failure in one file is reported and the batch moves on.
 */
export class TrimPipeline {
    constructor(
        private readonly settings: Settings,
        private readonly mediaTool: MediaTool = new FfmpegMediaTool(),
        private readonly logger: RunLogger = new RunLogger()
    ) {}

    public async processPath(target: string, kind: 'directory' | 'file', options: RunOptions): Promise<BatchSummary> {
        return kind === 'directory'
            ? this.processDirectory(target, options)
            : this.processFile(target, options);
    }

    /**
     * Process every matching file in a directory, in name order. The whole
     * batch is transcribed to a log file beside the directory.
     */
    public async processDirectory(inputDir: string, options: RunOptions): Promise<BatchSummary> {
        const inputPath = path.resolve(inputDir);
        if (!fs.existsSync(inputPath)) {
            throw new PathNotFoundError(inputPath);
        }
        if (!fs.statSync(inputPath).isDirectory()) {
            throw new NotADirectoryError(inputPath);
        }

        const files = this.listMediaFiles(inputPath);
        const transcriptPath = path.join(
            path.dirname(inputPath),
            `${path.basename(inputPath)}_trim_${fileTimestamp()}.log`
        );

        return RunLogger.withTranscript(transcriptPath, async (logger) => {
            logger.info(`Run started ${new Date().toISOString()} (${this.describeMode(options)})`);

            if (files.length === 0) {
                logger.info(`No ${this.settings.extensions.join('/')} files found in '${inputPath}'`);
                return { ...this.summarize([]), transcriptPath };
            }

            logger.info(`Found ${files.length} file(s) in '${inputPath}'`);

            const outDir = path.join(inputPath, this.settings.outputDirName);
            if (!options.preview) {
                fs.mkdirSync(outDir, { recursive: true });
            }

            const results: FileResult[] = [];
            for (const file of files) {
                results.push(await this.runFile(file, outDir, options, logger));
            }

            const summary = { ...this.summarize(results), transcriptPath };
            this.logSummary(summary, logger);
            return summary;
        }, { echo: this.logger.echo });
    }

    /**
     * Process one file; outputs go to a sibling `trimmed` directory.
     */
    public async processFile(filePath: string, options: RunOptions): Promise<BatchSummary> {
        const resolved = path.resolve(filePath);
        if (!fs.existsSync(resolved)) {
            throw new PathNotFoundError(resolved);
        }
        if (!fs.statSync(resolved).isFile()) {
            throw new NotAFileError(resolved);
        }
        if (!this.isMediaFile(resolved)) {
            throw new UnsupportedExtensionError(resolved, this.settings.extensions);
        }

        const outDir = path.join(path.dirname(resolved), this.settings.outputDirName);
        if (!options.preview) {
            fs.mkdirSync(outDir, { recursive: true });
        }

        const summary = this.summarize([await this.runFile(resolved, outDir, options, this.logger)]);
        this.logSummary(summary, this.logger);
        return summary;
    }

    public listMediaFiles(dir: string): string[] {
        return fs.readdirSync(dir, { withFileTypes: true })
            .filter(entry => entry.isFile() && !entry.name.startsWith('.') && this.isMediaFile(entry.name))
            .map(entry => entry.name)
            .sort()
            .map(name => path.join(dir, name));
    }

    private isMediaFile(filePath: string): boolean {
        return this.settings.extensions.includes(path.extname(filePath).toLowerCase());
    }

    private async runFile(
        filePath: string,
        outDir: string,
        options: RunOptions,
        logger: RunLogger
    ): Promise<FileResult> {
        const name = path.basename(filePath);
        logger.info(`Processing: ${name}`);

        let plan: SegmentPlan;
        try {
            plan = await this.planFile(filePath, options, logger);
        } catch (error) {
            if (error instanceof NoSilenceFoundError) {
                logger.info('  No silence detected, skipped');
                return { file: filePath, status: 'skipped', message: error.message, plan: [], segments: [] };
            }
            const message = describeError(error);
            logger.error(`  ${message}`);
            return { file: filePath, status: 'failed', message, plan: [], segments: [] };
        }

        if (plan.length === 0) {
            logger.info('  Nothing to keep before the first cut point, skipped');
            return { file: filePath, status: 'skipped', message: 'Empty plan', plan, segments: [] };
        }

        const targets = plan.map((_, i) => path.join(
            outDir,
            options.mode === 'split' ? segmentFileName(name, i + 1, plan.length) : name
        ));

        if (options.preview) {
            plan.forEach((span, i) => logger.info(`  [PREVIEW] ${describeSpan(span)} -> ${targets[i]}`));
            return { file: filePath, status: 'previewed', message: `${plan.length} segment(s) planned`, plan, segments: [] };
        }

        const executor = new TrimExecutor(this.mediaTool, logger);
        const segments: CutResult[] = [];
        for (let i = 0; i < plan.length; i++) {
            // Failed segments do not stop their siblings
            segments.push(await executor.cut(filePath, targets[i], plan[i]));
        }

        const failedCount = segments.filter(s => s.status === 'failed').length;
        if (failedCount > 0) {
            return {
                file: filePath,
                status: 'failed',
                message: `${failedCount} of ${segments.length} segment(s) failed`,
                plan,
                segments
            };
        }
        return { file: filePath, status: 'completed', message: `${segments.length} segment(s) written`, plan, segments };
    }

    private async planFile(filePath: string, options: RunOptions, logger: RunLogger): Promise<SegmentPlan> {
        if (options.mode === 'cut') {
            logger.info(`  Manual cut at ${formatTime(options.cutAt)}`);
            return planManualCut(options.cutAt);
        }

        const detector = new SilenceDetector(
            {
                ...this.settings.silence,
                useCache: this.settings.cache,
                refreshCache: options.refreshCache
            },
            this.mediaTool,
            logger
        );
        const silences = await detector.detect(filePath);

        if (options.mode === 'split') {
            const plan = planSplit(silences);
            logger.info(`  Splitting into ${plan.length} segment(s)`);
            return plan;
        }

        const plan = planTruncate(silences);
        const last = plan[plan.length - 1];
        if (last) {
            logger.info(`  Trimming at ${formatTime(last.end)} (${last.end.toFixed(2)}s)`);
        }
        return plan;
    }

    private describeMode(options: RunOptions): string {
        const mode = options.mode === 'cut' ? `cut at ${formatTime(options.cutAt)}` : options.mode;
        return options.preview ? `${mode}, preview` : mode;
    }

    private summarize(files: FileResult[]): BatchSummary {
        return {
            total: files.length,
            completed: files.filter(f => f.status === 'completed' || f.status === 'previewed').length,
            skipped: files.filter(f => f.status === 'skipped').length,
            failed: files.filter(f => f.status === 'failed').length,
            files
        };
    }

    private logSummary(summary: BatchSummary, logger: RunLogger): void {
        logger.info(`Done. ${summary.completed} completed, ${summary.skipped} skipped, ${summary.failed} failed.`);
    }
}
