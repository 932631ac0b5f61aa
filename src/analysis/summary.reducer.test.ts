import { describe, expect, it } from 'vitest';
import { EMPTY_SUMMARY, mean, median, summarize } from './summary.reducer';

describe('summarize', () => {
    it('returns the no-data summary for an empty list', () => {
        expect(summarize([])).toEqual({
            n: 0, mean: null, std: null, median: null, skewness: null, kurtosis: null, min: null, max: null
        });
        expect(summarize([])).toBe(EMPTY_SUMMARY);
    });

    it('gives zero spread for a single observation', () => {
        expect(summarize([5])).toEqual({
            n: 1, mean: 5, std: 0, median: 5, skewness: 0, kurtosis: 0, min: 5, max: 5
        });
    });

    it('computes population moments', () => {
        const stats = summarize([4, 1, 3, 2]);
        expect(stats.n).toBe(4);
        expect(stats.mean).toBe(2.5);
        expect(stats.median).toBe(2.5);
        expect(stats.std).toBeCloseTo(Math.sqrt(1.25), 12);
        expect(stats.skewness).toBe(0);
        expect(stats.kurtosis).toBeCloseTo(1.64, 12);
        expect(stats.min).toBe(1);
        expect(stats.max).toBe(4);
    });

    it('does not depend on input order', () => {
        expect(summarize([0.1, 0.7, 0.2, 0.9])).toEqual(summarize([0.9, 0.2, 0.7, 0.1]));
    });

    it('drops non-finite values', () => {
        expect(summarize([1, Number.NaN, 3, Number.POSITIVE_INFINITY]).n).toBe(2);
    });
});

describe('mean and median', () => {
    it('are null without data', () => {
        expect(mean([])).toBeNull();
        expect(median([])).toBeNull();
    });

    it('take the middle of odd and even lists', () => {
        expect(median([1, 3, 2])).toBe(2);
        expect(median([1, 4, 2, 3])).toBe(2.5);
        expect(mean([1, 2, 6])).toBe(3);
    });
});
