import * as fs from 'fs';
import * as path from 'path';
import { NotADirectoryError, PathNotFoundError } from '../errors';
import { RunLogger } from './RunLogger';
import { findTrimmedDirs, listFilesWithExtensions, toMegabytes } from './TrimmedFolders';

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export interface CleanupOptions {
    trimmedDirName: string;
    extensions: readonly string[];
    dryRun?: boolean;
}

export interface CleanupResult {
    count: number;
    bytes: number;
    files: string[];
    dryRun: boolean;
}

/**
 * Deletes originals that already have a trimmed counterpart: the same file
 * name, or the first segment of a split.
 */
export class OriginalsCleaner {
    constructor(
        private readonly options: CleanupOptions,
        private readonly logger: RunLogger = new RunLogger()
    ) {}

    public cleanup(rootDir: string): CleanupResult {
        const root = path.resolve(rootDir);
        if (!fs.existsSync(root)) {
            throw new PathNotFoundError(root);
        }
        if (!fs.statSync(root).isDirectory()) {
            throw new NotADirectoryError(root);
        }

        const dryRun = this.options.dryRun ?? false;
        const result: CleanupResult = { count: 0, bytes: 0, files: [], dryRun };

        for (const trimmedDir of findTrimmedDirs(root, this.options.trimmedDirName)) {
            const parent = path.dirname(trimmedDir);

            for (const name of listFilesWithExtensions(parent, this.options.extensions)) {
                if (!this.hasTrimmedCounterpart(trimmedDir, name)) {
                    continue;
                }

                const original = path.join(parent, name);
                const size = fs.statSync(original).size;

                if (dryRun) {
                    this.logger.info(`Would delete: ${original} (${toMegabytes(size)}MB)`);
                } else {
                    this.logger.info(`Deleting: ${original} (${toMegabytes(size)}MB)`);
                    fs.unlinkSync(original);
                }

                result.count++;
                result.bytes += size;
                result.files.push(original);
            }
        }

        this.logger.info(dryRun
            ? `Would delete ${result.count} file(s), freeing about ${toMegabytes(result.bytes)}MB`
            : `Deleted ${result.count} file(s), freed about ${toMegabytes(result.bytes)}MB`);
        return result;
    }

    /**
     * A trimmed or cut copy under the same name, or the first segment of a
     * split (`<base>_01<ext>`, `<base>_001<ext>`, ... depending on the count).
     */
    private hasTrimmedCounterpart(trimmedDir: string, name: string): boolean {
        if (fs.existsSync(path.join(trimmedDir, name))) {
            return true;
        }
        const ext = path.extname(name);
        const firstSegment = new RegExp(`^${escapeRegExp(path.basename(name, ext))}_0+1${escapeRegExp(ext)}$`);
        return fs.readdirSync(trimmedDir).some(entry => firstSegment.test(entry));
    }
}
