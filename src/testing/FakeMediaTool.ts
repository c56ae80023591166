import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ExternalToolError } from '../errors';
import type { CutSpan, MediaTool, SilenceAnalysisRequest } from '../processing/MediaTool';

export const silenceStart = (t: number) => `[silencedetect @ 0x55d0c8a3e2c0] silence_start: ${t}`;
export const silenceEnd = (t: number, d: number) => `[silencedetect @ 0x55d0c8a3e2c0] silence_end: ${t} | silence_duration: ${d}`;

/**
 * In-process stand-in for ffmpeg. Analysis replays scripted stderr lines per
 * file name; copies write a small marker file.
 */
export class FakeMediaTool implements MediaTool {
    public readonly analyzed: SilenceAnalysisRequest[] = [];
    public readonly copies: Array<{ inputPath: string; outputPath: string; span: CutSpan }> = [];
    private readonly stderrByFile = new Map<string, string[]>();
    private readonly failingAnalysis = new Set<string>();
    private readonly failingOutputs = new Set<string>();

    public script(fileName: string, lines: string[]): this {
        this.stderrByFile.set(fileName, lines);
        return this;
    }

    public failAnalysisOf(fileName: string): this {
        this.failingAnalysis.add(fileName);
        return this;
    }

    public failCopyTo(outputName: string): this {
        this.failingOutputs.add(outputName);
        return this;
    }

    public async analyzeSilence(request: SilenceAnalysisRequest, onLine: (line: string) => void): Promise<void> {
        this.analyzed.push(request);
        const name = path.basename(request.inputPath);
        if (this.failingAnalysis.has(name)) {
            throw new ExternalToolError(`Silence analysis failed for ${name}: ffmpeg exited with code 1`);
        }
        for (const line of this.stderrByFile.get(name) ?? []) {
            onLine(line);
        }
    }

    public async copySegment(inputPath: string, outputPath: string, span: CutSpan): Promise<void> {
        this.copies.push({ inputPath, outputPath, span });
        const name = path.basename(outputPath);
        if (this.failingOutputs.has(name)) {
            fs.writeFileSync(outputPath, 'partial');
            throw new ExternalToolError(`Failed to cut ${name}: ffmpeg exited with code 1`);
        }
        fs.writeFileSync(outputPath, `${path.basename(inputPath)} ${span.start}-${span.end ?? 'end'}`);
    }
}

export function makeTempDir(prefix = 'silence-trim-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}
