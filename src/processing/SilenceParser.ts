/**
 * A span of audio below the silence threshold.
 * `end` and `duration` are null when the silence runs to end-of-stream.
 */
export interface SilenceInterval {
    start: number;
    end: number | null;
    duration: number | null;
}

/**
 * Intervals in ascending start order; only the last one may be open.
 */
export type DetectionResult = readonly SilenceInterval[];

// ffmpeg prints these with %g, so exponents show up for tiny values
const NUMBER = '(-?\\d+(?:\\.\\d+)?(?:[eE][-+]?\\d+)?)';
const SILENCE_START = new RegExp(`silence_start:\\s*${NUMBER}`);
const SILENCE_END = new RegExp(`silence_end:\\s*${NUMBER}`);

/**
 * Line-driven state machine over ffmpeg `silencedetect` diagnostics.
 *
 * Format:
 *   [silencedetect @ 0x...] silence_start: 5.123
 *   [silencedetect @ 0x...] silence_end: 8.456 | silence_duration: 3.333
 */
export class SilenceParser {
    private pendingStart: number | null = null;
    private readonly intervals: SilenceInterval[] = [];

    public feed(line: string): void {
        const startMatch = SILENCE_START.exec(line);
        if (startMatch) {
            this.pendingStart = Math.max(0, parseFloat(startMatch[1]));
            return;
        }

        const endMatch = SILENCE_END.exec(line);
        if (endMatch && this.pendingStart !== null) {
            const start = this.pendingStart;
            const end = parseFloat(endMatch[1]);
            this.pendingStart = null;
            if (end > start) {
                this.intervals.push({ start, end, duration: end - start });
            }
        }
    }

    /**
     * Close the scan. A start without an end means silence through EOF.
     */
    public finish(): SilenceInterval[] {
        if (this.pendingStart !== null) {
            this.intervals.push({ start: this.pendingStart, end: null, duration: null });
            this.pendingStart = null;
        }
        return [...this.intervals];
    }

    public static parse(output: string): SilenceInterval[] {
        const parser = new SilenceParser();
        for (const line of output.split(/\r?\n/)) {
            parser.feed(line);
        }
        return parser.finish();
    }
}
