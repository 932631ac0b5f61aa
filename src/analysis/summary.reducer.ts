import type { SummaryStats } from '../types';

// ============================================================================
// SUMMARY STATISTICS
// ============================================================================

export const EMPTY_SUMMARY: SummaryStats = Object.freeze({
    n: 0,
    mean: null,
    std: null,
    median: null,
    skewness: null,
    kurtosis: null,
    min: null,
    max: null
});

export function mean(values: readonly number[]): number | null {
    if (values.length === 0) return null;
    return values.reduce((s, x) => s + x, 0) / values.length;
}

export function median(values: readonly number[]): number | null {
    if (values.length === 0) return null;
    const sorted = [...values].sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    return (sorted.length % 2 === 1) ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * k-th central moment
 */
function moment(values: readonly number[], center: number, k: number): number {
    return values.reduce((s, x) => s + Math.pow(x - center, k), 0) / values.length;
}

/**
 * Reduces observations to mean, population std, median, skewness, kurtosis,
 * min, max and n. Kurtosis is not excess kurtosis. When every value is the
 * same, skewness and kurtosis are 0.
 */
export function summarize(values: readonly number[]): SummaryStats {
    const finite = values.filter(v => Number.isFinite(v));
    if (finite.length === 0) return EMPTY_SUMMARY;

    // Sort first so float sums do not depend on input order
    const sorted = [...finite].sort((a, b) => a - b);
    const m = sorted.reduce((s, x) => s + x, 0) / sorted.length;
    const m2 = moment(sorted, m, 2);
    const m3 = moment(sorted, m, 3);
    const m4 = moment(sorted, m, 4);
    const mid = Math.floor(sorted.length / 2);

    return {
        n: sorted.length,
        mean: m,
        std: Math.sqrt(m2),
        median: (sorted.length % 2 === 1) ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2,
        skewness: m2 !== 0 ? m3 / Math.pow(m2, 1.5) : 0,
        kurtosis: m2 !== 0 ? m4 / (m2 * m2) : 0,
        min: sorted[0],
        max: sorted[sorted.length - 1]
    };
}
