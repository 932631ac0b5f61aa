/**
 * Shannon entropy over frequency distributions
 */

/**
 * Base-2 entropy of a list of category counts. Zero counts are ignored.
 * With normalize, the result is divided by log2 of the number of categories
 * when there are at least two of them.
 * Returns null when there is nothing to count.
 */
export function entropy(counts: Iterable<number>, normalize = false): number | null {
    const positive = Array.from(counts).filter(c => c > 0);
    const total = positive.reduce((s, c) => s + c, 0);
    if (positive.length === 0 || total === 0) return null;

    let h = 0;
    for (const c of positive) {
        const p = c / total;
        h -= p * Math.log2(p);
    }

    if (normalize && positive.length > 1) {
        return h / Math.log2(positive.length);
    }
    return h;
}

/**
 * Counts occurrences of each key, keeping first-seen order
 */
export function countBy<T>(items: Iterable<T>, key: (item: T) => string): Map<string, number> {
    const counts = new Map<string, number>();
    for (const item of items) {
        const k = key(item);
        counts.set(k, (counts.get(k) ?? 0) + 1);
    }
    return counts;
}

/**
 * Sums a weight per key, keeping first-seen order
 */
export function sumBy<T>(items: Iterable<T>, key: (item: T) => string, weight: (item: T) => number): Map<string, number> {
    const sums = new Map<string, number>();
    for (const item of items) {
        const k = key(item);
        sums.set(k, (sums.get(k) ?? 0) + weight(item));
    }
    return sums;
}
