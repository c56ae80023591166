import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'info' | 'warn' | 'error';

export interface RunLoggerOptions {
    /** Append every reported line to this file until close(). */
    transcriptPath?: string;
    /** Print to the console (default: true). */
    echo?: boolean;
}

/**
 * Reporting sink for a run. Lines go to the console and, while a transcript
 * is open, to a plain-text log file.
 */
export class RunLogger {
    public readonly transcriptPath: string | null;
    public readonly echo: boolean;
    private fd: number | null = null;

    constructor(options: RunLoggerOptions = {}) {
        this.echo = options.echo ?? true;
        this.transcriptPath = options.transcriptPath ?? null;

        if (this.transcriptPath) {
            fs.mkdirSync(path.dirname(this.transcriptPath), { recursive: true });
            this.fd = fs.openSync(this.transcriptPath, 'a');
        }
    }

    /**
     * Run `task` with a logger whose transcript is closed when the task settles.
     */
    public static async withTranscript<T>(
        transcriptPath: string,
        task: (logger: RunLogger) => Promise<T>,
        options: Omit<RunLoggerOptions, 'transcriptPath'> = {}
    ): Promise<T> {
        const logger = new RunLogger({ ...options, transcriptPath });
        try {
            return await task(logger);
        } finally {
            logger.close();
        }
    }

    public info(message: string): void {
        this.write('info', message);
    }

    public warn(message: string): void {
        this.write('warn', message);
    }

    public error(message: string): void {
        this.write('error', message);
    }

    public get isOpen(): boolean {
        return this.fd !== null;
    }

    public close(): void {
        if (this.fd !== null) {
            fs.closeSync(this.fd);
            this.fd = null;
        }
    }

    private write(level: LogLevel, message: string): void {
        if (this.echo) {
            if (level === 'error') {
                console.error(message);
            } else if (level === 'warn') {
                console.warn(message);
            } else {
                console.log(message);
            }
        }

        if (this.fd !== null) {
            fs.writeSync(this.fd, `${message}\n`);
        }
    }
}

/**
 * Local timestamp as YYYYMMDD_HHMMSS for log file names.
 */
export function fileTimestamp(date: Date = new Date()): string {
    const p = (n: number) => String(n).padStart(2, '0');
    return `${date.getFullYear()}${p(date.getMonth() + 1)}${p(date.getDate())}_${p(date.getHours())}${p(date.getMinutes())}${p(date.getSeconds())}`;
}
