import { describe, expect, it } from 'vitest';
import { NoSilenceFoundError } from '../errors';
import { planManualCut, planSplit, planTruncate, segmentFileName } from './SegmentPlanner';

describe('planTruncate', () => {
    it('signals NoSilenceFound for an empty result', () => {
        expect(() => planTruncate([])).toThrow(NoSilenceFoundError);
    });

    it('cuts at the start of the only silence', () => {
        expect(planTruncate([{ start: 10, end: 12, duration: 2 }])).toEqual([{ start: 0, end: 10 }]);
    });

    it('cuts at the start of the last silence', () => {
        expect(planTruncate([
            { start: 5, end: 7, duration: 2 },
            { start: 300.25, end: null, duration: null }
        ])).toEqual([{ start: 0, end: 300.25 }]);
    });

    it('plans nothing when the file is silent from the start', () => {
        expect(planTruncate([{ start: 0, end: null, duration: null }])).toEqual([]);
    });
});

describe('planSplit', () => {
    it('signals NoSilenceFound for an empty result', () => {
        expect(() => planSplit([])).toThrow(NoSilenceFoundError);
    });

    it('splits at midpoints and at the start of an open trailing silence', () => {
        expect(planSplit([
            { start: 5, end: 7, duration: 2 },
            { start: 20, end: null, duration: null }
        ])).toEqual([
            { start: 0, end: 6 },
            { start: 6, end: 20 }
        ]);
    });

    it('discards content after the last split point', () => {
        const plan = planSplit([
            { start: 10, end: 14, duration: 4 },
            { start: 30, end: 34, duration: 4 }
        ]);
        expect(plan).toEqual([
            { start: 0, end: 12 },
            { start: 12, end: 32 }
        ]);
    });

    it('drops a zero-length leading span', () => {
        expect(planSplit([
            { start: 0, end: null, duration: null }
        ])).toEqual([]);
    });
});

describe('planManualCut', () => {
    it('keeps everything before the cut', () => {
        expect(planManualCut(95.5)).toEqual([{ start: 0, end: 95.5 }]);
    });
});

describe('segmentFileName', () => {
    it('pads to at least two digits', () => {
        expect(segmentFileName('show.mkv', 3, 5)).toBe('show_03.mkv');
    });

    it('widens the padding to the segment count', () => {
        expect(segmentFileName('show.mkv', 7, 120)).toBe('show_007.mkv');
        expect(segmentFileName('show.mkv', 120, 120)).toBe('show_120.mkv');
    });

    it('keeps dots in the base name', () => {
        expect(segmentFileName('ep.01.final.mkv', 1, 2)).toBe('ep.01.final_01.mkv');
    });
});
