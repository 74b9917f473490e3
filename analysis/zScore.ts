import { StatSummary, ZBand, ZScoreResult } from "../assessmentTypes.js";
import { ValidationError } from "../errors.js";
import { buildChart, rangeAnnotations } from "../chart/zScoreChart.js";

/**
 * Severity banding for Z-scores. Every finite z lands in exactly one band.
 *
 *   z < -2        impaired
 *   -2 <= z < -1  below average
 *   -1 <= z <= 1  average
 *   1 < z <= 2    above average
 *   z > 2         superior
 */
export const DEFAULT_Z_BANDS: readonly ZBand[] = [
    { label: "impaired", min: -Infinity, max: -2, maxExclusive: true, color: "#CC3333" },
    { label: "below average", min: -2, max: -1, maxExclusive: true, color: "#E8A33D" },
    { label: "average", min: -1, max: 1, color: "#7F8C8D" },
    { label: "above average", min: 1, max: 2, minExclusive: true, color: "#3D9BE8" },
    { label: "superior", min: 2, max: Infinity, minExclusive: true, color: "#2E86C1" },
];

function bandContains(band: ZBand, z: number): boolean {
    const aboveMin = band.minExclusive ? z > band.min : z >= band.min;
    const belowMax = band.maxExclusive ? z < band.max : z <= band.max;
    return aboveMin && belowMax;
}

export function classifyZScore(z: number, bands: readonly ZBand[] = DEFAULT_Z_BANDS): ZBand {
    const band = bands.find(candidate => bandContains(candidate, z));
    if (band === undefined) {
        throw new ValidationError("INVALID_INPUT", `no band covers z = ${z}`);
    }
    return band;
}

/**
 * z = (observed - mean) / std, checked before dividing so a degenerate
 * summary never yields NaN or Infinity.
 */
export function computeZScore(
    observedValue: unknown,
    summary: StatSummary,
    bands: readonly ZBand[] = DEFAULT_Z_BANDS
): ZScoreResult {
    if (typeof observedValue !== "number" || !Number.isFinite(observedValue)) {
        throw new ValidationError("INVALID_OBSERVED_VALUE", `observed value must be a number (got ${String(observedValue)})`);
    }
    if (!Number.isFinite(summary.std) || summary.std <= 0) {
        throw new ValidationError(
            "ZERO_STD",
            `standard deviation is zero for ${summary.metricColumn}: all ${summary.count} matching values are identical`
        );
    }

    const zScore = (observedValue - summary.mean) / summary.std;
    const band = classifyZScore(zScore, bands);
    const chart = buildChart(
        [{
            label: summary.metricColumn,
            observedValue,
            zScore,
            band: band.label,
            color: band.color,
            highlighted: true,
        }],
        { summary, annotations: rangeAnnotations(summary) }
    );

    return { metricColumn: summary.metricColumn, observedValue, zScore, band, summary, chart };
}
