/**
 * Small numeric helpers shared by the aggregate reports.
 */

/**
 * h-index: the largest h such that h of the values are at least h.
 *
 * @example hIndex([10, 8, 5, 4, 3]) === 4
 */
export function hIndex(citations: readonly number[]): number {
    const sorted = citations
        .filter((c) => Number.isFinite(c))
        .sort((a, b) => b - a);

    let h = 0;
    for (let i = 0; i < sorted.length; i++) {
        const value = sorted[i];
        if (value === undefined || value < i + 1) break;
        h = i + 1;
    }
    return h;
}

/**
 * Arithmetic mean rounded to two decimals; null when there is nothing to average.
 */
export function roundedMean(values: readonly number[]): number | null {
    if (values.length === 0) return null;
    const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
    return Math.round(mean * 100) / 100;
}

/**
 * Running total of `value` within each group, in the order rows are given.
 * Rows must already be sorted by the series axis (e.g. year) within each group.
 */
export function cumulativeBy<T>(
    rows: readonly T[],
    groupOf: (row: T) => string,
    valueOf: (row: T) => number
): number[] {
    const totals = new Map<string, number>();
    return rows.map((row) => {
        const group = groupOf(row);
        const next = (totals.get(group) ?? 0) + valueOf(row);
        totals.set(group, next);
        return next;
    });
}

// ─── Cell readers ─────────────────────────────────────────

export function readString(value: unknown): string | null {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'bigint') return String(value);
    return null;
}

export function readNumber(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'bigint') return Number(value);
    return null;
}

/**
 * SQLite stores booleans as 0/1.
 */
export function readBoolean(value: unknown): boolean | null {
    if (typeof value === 'boolean') return value;
    if (typeof value === 'number' || typeof value === 'bigint') return Number(value) !== 0;
    return null;
}
