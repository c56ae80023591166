import * as fs from 'fs';
import * as path from 'path';
import { NotADirectoryError, PathNotFoundError } from '../errors';
import { RunLogger } from './RunLogger';
import { findTrimmedDirs, listFilesWithExtensions } from './TrimmedFolders';

export interface ExportOptions {
    trimmedDirName: string;
    extensions: readonly string[];
}

export interface ExportResult {
    total: number;
    copied: number;
    skipped: number;
    destination: string;
}

/**
 * Copies the contents of every trimmed folder under a source tree into a
 * destination tree, mirroring the folder layout. A destination file with the
 * same size is left alone.
 */
export class TrimmedExporter {
    constructor(
        private readonly options: ExportOptions,
        private readonly logger: RunLogger = new RunLogger()
    ) {}

    public export(sourceDir: string, destDir: string): ExportResult {
        const source = path.resolve(sourceDir);
        const destination = path.resolve(destDir);

        if (!fs.existsSync(source)) {
            throw new PathNotFoundError(source);
        }
        if (!fs.statSync(source).isDirectory()) {
            throw new NotADirectoryError(source);
        }

        fs.mkdirSync(destination, { recursive: true });
        this.logger.info(`Source: ${source}`);
        this.logger.info(`Destination: ${destination}`);

        const result: ExportResult = { total: 0, copied: 0, skipped: 0, destination };

        for (const trimmedDir of findTrimmedDirs(source, this.options.trimmedDirName)) {
            const relative = path.relative(source, path.dirname(trimmedDir));
            const files = listFilesWithExtensions(trimmedDir, this.options.extensions);
            if (files.length === 0) {
                continue;
            }

            const targetDir = path.join(destination, relative);
            fs.mkdirSync(targetDir, { recursive: true });
            this.logger.info(`${relative || '.'}/ (${files.length} files)`);

            for (const name of files) {
                const from = path.join(trimmedDir, name);
                const to = path.join(targetDir, name);
                result.total++;

                if (fs.existsSync(to) && fs.statSync(to).size === fs.statSync(from).size) {
                    this.logger.info(`  [SKIP] ${name} (already exists)`);
                    result.skipped++;
                    continue;
                }

                this.logger.info(`  [COPY] ${name}`);
                fs.copyFileSync(from, to);
                result.copied++;
            }
        }

        this.logger.info(`Export complete: ${result.total} file(s), ${result.copied} copied, ${result.skipped} skipped`);
        return result;
    }
}
