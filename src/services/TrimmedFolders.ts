import * as fs from 'fs';
import * as path from 'path';

/**
 * Every directory named `dirName` at or below `root`, in sorted walk order.
 */
export function findTrimmedDirs(root: string, dirName: string): string[] {
    const found: string[] = [];
    const walk = (dir: string): void => {
        const entries = fs.readdirSync(dir, { withFileTypes: true })
            .filter(entry => entry.isDirectory())
            .map(entry => entry.name)
            .sort();
        for (const name of entries) {
            const child = path.join(dir, name);
            if (name === dirName) {
                found.push(child);
            }
            walk(child);
        }
    };
    walk(root);
    return found;
}

export function listFilesWithExtensions(dir: string, extensions: readonly string[]): string[] {
    return fs.readdirSync(dir, { withFileTypes: true })
        .filter(entry => entry.isFile() && extensions.includes(path.extname(entry.name).toLowerCase()))
        .map(entry => entry.name)
        .sort();
}

export const toMegabytes = (bytes: number): number => Math.floor(bytes / 1024 / 1024);
