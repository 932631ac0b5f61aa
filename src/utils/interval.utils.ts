/**
 * Integer-second time span arithmetic. A span [start, end) covers the seconds
 * start, start + 1, ..., end - 1; lengths are counts of covered seconds.
 */

export type Span = readonly [number, number];

/**
 * Sorts spans and merges the ones that touch or overlap. Empty spans vanish.
 */
export function mergeSpans(spans: readonly Span[]): Span[] {
    const sorted = spans
        .filter(([start, end]) => end > start)
        .slice()
        .sort((a, b) => a[0] - b[0] || a[1] - b[1]);

    const merged: Array<[number, number]> = [];
    for (const [start, end] of sorted) {
        const last = merged[merged.length - 1];
        if (last && start <= last[1]) {
            last[1] = Math.max(last[1], end);
        } else {
            merged.push([start, end]);
        }
    }
    return merged;
}

/**
 * Seconds covered, counting a second once per span that covers it
 */
export function totalLength(spans: readonly Span[]): number {
    return spans.reduce((sum, [start, end]) => sum + Math.max(0, end - start), 0);
}

/**
 * Distinct seconds covered by at least one span
 */
export function unionLength(spans: readonly Span[]): number {
    return totalLength(mergeSpans(spans));
}

/**
 * Distinct seconds covered by at least one span of each list
 */
export function intersectionLength(a: readonly Span[], b: readonly Span[]): number {
    const left = mergeSpans(a);
    const right = mergeSpans(b);

    let i = 0;
    let j = 0;
    let covered = 0;
    while (i < left.length && j < right.length) {
        const start = Math.max(left[i][0], right[j][0]);
        const end = Math.min(left[i][1], right[j][1]);
        if (end > start) covered += end - start;

        if (left[i][1] < right[j][1]) i++;
        else j++;
    }
    return covered;
}
