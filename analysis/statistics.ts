/**
 * Mean and sample standard deviation (n - 1) of a metric sample.
 * Expects at least one value; computeSummary rejects smaller samples first.
 *
 * A constant sample has its value as the mean and a std of exactly 0.
 */
export function computeStatistics(values: readonly number[]): { mean: number; std: number } {
    const first = values[0];
    if (values.every(v => v === first)) {
        return { mean: first, std: 0 };
    }

    const mean = values.reduce((acc, v) => acc + v, 0) / values.length;
    const variance = values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / (values.length - 1);
    return { mean, std: Math.sqrt(variance) };
}
