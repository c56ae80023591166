import * as path from 'path';
import { NoSilenceFoundError } from '../errors';
import type { DetectionResult } from './SilenceParser';

/**
 * One output span, [start, end) in source seconds.
 */
export interface SegmentSpan {
    start: number;
    end: number;
}

export type SegmentPlan = SegmentSpan[];

/**
 * Build contiguous spans from 0 through each cut point in turn.
 * Zero-length spans are dropped.
 */
function spansFromCutPoints(points: number[]): SegmentPlan {
    const spans: SegmentPlan = [];
    let previous = 0;
    for (const point of points) {
        if (point > previous) {
            spans.push({ start: previous, end: point });
            previous = point;
        }
    }
    return spans;
}

/**
 * Keep everything before the last silence.
 */
export function planTruncate(result: DetectionResult): SegmentPlan {
    const last = result[result.length - 1];
    if (!last) {
        throw new NoSilenceFoundError();
    }
    return spansFromCutPoints([last.start]);
}

/**
 * Split at the middle of every closed silence, and at the start of an open
 * trailing one. Anything after the last split point is discarded.
 */
export function planSplit(result: DetectionResult): SegmentPlan {
    if (result.length === 0) {
        throw new NoSilenceFoundError();
    }
    const points = result.map((silence) =>
        silence.end === null ? silence.start : (silence.start + silence.end) / 2
    );
    return spansFromCutPoints(points);
}

export function planManualCut(cutAt: number): SegmentPlan {
    return spansFromCutPoints([cutAt]);
}

/**
 * "show.mkv", 3, 12 -> "show_03.mkv"
 */
export function segmentFileName(fileName: string, index: number, count: number): string {
    const ext = path.extname(fileName);
    const base = path.basename(fileName, ext);
    const width = Math.max(2, String(count).length);
    return `${base}_${String(index).padStart(width, '0')}${ext}`;
}
