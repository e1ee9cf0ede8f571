// ============================================================================
// DESCRIPTIVE STATISTICS
// ============================================================================

export function mean(values: readonly number[]): number | null {
    if (values.length === 0) return null;
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Median; for even-sized inputs the mean of the two middle values
 */
export function median(values: readonly number[]): number | null {
    if (values.length === 0) return null;
    const sorted = [...values].sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Nearest-rank percentile: the value at index ceil(p/100 * n) - 1 of the
 * ascending-sorted input, clamped to the valid range
 */
export function percentile(values: readonly number[], p: number): number | null {
    if (values.length === 0) return null;
    const sorted = [...values].sort((a, b) => a - b);
    const rank = Math.ceil((p / 100) * sorted.length) - 1;
    const index = Math.min(Math.max(rank, 0), sorted.length - 1);
    return sorted[index];
}

// No argument spread here: hundreds of thousands of deltas exceed the call-stack limit
export function minimum(values: readonly number[]): number | null {
    return values.length === 0 ? null : values.reduce((min, value) => value < min ? value : min, values[0]);
}

export function maximum(values: readonly number[]): number | null {
    return values.length === 0 ? null : values.reduce((max, value) => value > max ? value : max, values[0]);
}
