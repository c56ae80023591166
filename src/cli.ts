import yargs from 'yargs';
import { loadSettings, normalizeExtension, type Settings } from './config/Settings';
import { describeError, SilenceTrimError } from './errors';
import { FfmpegMediaTool, type MediaTool } from './processing/MediaTool';
import { parseTime } from './processing/TimeFormat';
import { OriginalsCleaner } from './services/OriginalsCleaner';
import { RunLogger } from './services/RunLogger';
import { TrimmedExporter } from './services/TrimmedExporter';
import { type RunOptions, TrimPipeline } from './workflow/TrimPipeline';

export interface CliDependencies {
    mediaTool?: MediaTool;
    logger?: RunLogger;
}

interface SettingsOverrides {
    config?: string;
    threshold?: number;
    'min-duration'?: number;
    ext?: string[];
    cache?: boolean;
}

/**
 * config/settings.json (or --config) with command-line overrides on top.
 */
export function resolveSettings(overrides: SettingsOverrides): Settings {
    const settings = loadSettings(overrides.config);

    if (overrides.threshold !== undefined) {
        if (!Number.isFinite(overrides.threshold) || overrides.threshold >= 0) {
            throw new SilenceTrimError('--threshold must be a negative number of dB, e.g. -40');
        }
        settings.silence.thresholdDb = overrides.threshold;
    }

    const minDuration = overrides['min-duration'];
    if (minDuration !== undefined) {
        if (!Number.isFinite(minDuration) || minDuration <= 0) {
            throw new SilenceTrimError('--min-duration must be a positive number of seconds');
        }
        settings.silence.minDurationSec = minDuration;
    }

    if (overrides.ext && overrides.ext.length > 0) {
        settings.extensions = overrides.ext.map(normalizeExtension);
    }
    if (overrides.cache !== undefined) {
        settings.cache = overrides.cache;
    }
    return settings;
}

/**
 * Parse arguments and run the selected command. Resolves to the exit code.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
    const logger = deps.logger ?? new RunLogger();
    const mediaTool = deps.mediaTool ?? new FfmpegMediaTool();
    let exitCode = 0;

    const parser = yargs(argv)
        .scriptName('silence-trim')
        .option('config', { type: 'string', describe: 'Path to settings.json (default: ./config/settings.json)' })
        .option('ext', { type: 'string', array: true, describe: 'File extensions to process, e.g. .mkv .mp4' })
        .command(
            '$0 [directory]',
            'Trim trailing silence from every video in a directory (or one file with -f)',
            (y) => y
                .positional('directory', { type: 'string', describe: 'Directory of videos' })
                .option('file', { alias: 'f', type: 'string', describe: 'Process a single file instead' })
                .option('cut', { type: 'string', describe: 'Cut every file at this time (seconds, MM:SS or HH:MM:SS)' })
                .option('split', { type: 'boolean', describe: 'Split at every silence instead of trimming' })
                .option('preview', { alias: 'dry-run', type: 'boolean', default: false, describe: 'Detect and plan only' })
                .option('threshold', { type: 'number', describe: 'Silence threshold in dB' })
                .option('min-duration', { type: 'number', describe: 'Minimum silence length in seconds' })
                .option('cache', { type: 'boolean', describe: 'Use silence cache sidecars (--no-cache to disable)' })
                .option('refresh-cache', { type: 'boolean', default: false, describe: 'Ignore and rewrite existing cache sidecars' }),
            async (args) => {
                if (args.directory && args.file) {
                    throw new SilenceTrimError('Give either a directory or --file, not both');
                }
                if (args.cut !== undefined && args.split) {
                    throw new SilenceTrimError('--cut and --split cannot be combined');
                }
                const target = args.file ?? args.directory;
                if (!target) {
                    throw new SilenceTrimError('Provide a directory, or a single file with -f <file>');
                }

                const settings = resolveSettings(args);
                const base = { preview: args.preview, refreshCache: args['refresh-cache'] };
                const options: RunOptions = args.cut !== undefined
                    ? { ...base, mode: 'cut', cutAt: parseTime(args.cut) }
                    : { ...base, mode: args.split ? 'split' : 'trim' };

                const pipeline = new TrimPipeline(settings, mediaTool, logger);
                const summary = await pipeline.processPath(target, args.file ? 'file' : 'directory', options);
                if (summary.failed > 0) {
                    exitCode = 1;
                }
            }
        )
        .command(
            'export <source> <dest>',
            'Copy every trimmed folder under <source> into <dest>, keeping the layout',
            (y) => y
                .positional('source', { type: 'string', demandOption: true })
                .positional('dest', { type: 'string', demandOption: true }),
            (args) => {
                const settings = resolveSettings(args);
                new TrimmedExporter(
                    { trimmedDirName: settings.outputDirName, extensions: settings.extensions },
                    logger
                ).export(args.source, args.dest);
            }
        )
        .command(
            'cleanup <directory>',
            'Delete originals that already have a trimmed version',
            (y) => y
                .positional('directory', { type: 'string', demandOption: true })
                .option('dry-run', { type: 'boolean', default: false, describe: 'Only list what would be deleted' }),
            (args) => {
                const settings = resolveSettings(args);
                new OriginalsCleaner(
                    { trimmedDirName: settings.outputDirName, extensions: settings.extensions, dryRun: args['dry-run'] },
                    logger
                ).cleanup(args.directory);
            }
        )
        .strict()
        .help()
        .exitProcess(false)
        .fail((message, error) => {
            throw error ?? new SilenceTrimError(message);
        });

    try {
        await parser.parseAsync();
    } catch (error) {
        logger.error(`Error: ${describeError(error)}`);
        return 1;
    }
    return exitCode;
}
