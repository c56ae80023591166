/**
 * Error taxonomy for silence-trim.
 * Path and format errors abort the unit of work they belong to (a file, or the
 * whole invocation for the top-level path); NoSilenceFoundError is a soft skip.
 */
export class SilenceTrimError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class PathNotFoundError extends SilenceTrimError {
    constructor(public readonly targetPath: string) {
        super(`Path does not exist: ${targetPath}`);
    }
}

export class NotADirectoryError extends SilenceTrimError {
    constructor(public readonly targetPath: string) {
        super(`Not a directory: ${targetPath}`);
    }
}

export class NotAFileError extends SilenceTrimError {
    constructor(public readonly targetPath: string) {
        super(`Not a file: ${targetPath}`);
    }
}

export class UnsupportedExtensionError extends SilenceTrimError {
    constructor(public readonly targetPath: string, public readonly allowed: readonly string[]) {
        super(`Unsupported file type: ${targetPath} (expected ${allowed.join(', ')})`);
    }
}

export class InvalidTimeFormatError extends SilenceTrimError {
    constructor(public readonly input: string) {
        super(`Invalid time format: "${input}" (use seconds, MM:SS or HH:MM:SS)`);
    }
}

export class NoSilenceFoundError extends SilenceTrimError {
    constructor() {
        super('No silence detected');
    }
}

/**
 * ffmpeg exited non-zero or could not be spawned.
 */
export class ExternalToolError extends SilenceTrimError {}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
