import { ChartBar, ChartPayload, ReferenceLine, StatSummary } from "../assessmentTypes.js";

export const REFERENCE_Z_SCORES = [-2, -1, 0, 1, 2] as const;
export const DEFAULT_Y_RANGE: [number, number] = [-3, 3];

function referenceLabel(z: number): string {
    if (z === 0) return "mean";
    return `${z > 0 ? "+" : ""}${z} SD`;
}

function referenceColor(z: number): string {
    if (z === 0) return "black";
    return Math.abs(z) === 2 ? "#0099FF" : "#B0B0B0";
}

export function buildReferenceLines(summary?: Pick<StatSummary, "mean" | "std">): ReferenceLine[] {
    return REFERENCE_Z_SCORES.map(z => ({
        zScore: z,
        ...(summary ? { value: summary.mean + z * summary.std } : {}),
        label: referenceLabel(z),
        dash: z === 0 ? "solid" : "dash",
        color: referenceColor(z),
    }));
}

//default range, widened to whole numbers around the outermost bar
export function computeYRange(bars: readonly ChartBar[]): [number, number] {
    let [lo, hi] = DEFAULT_Y_RANGE;
    for (const bar of bars) {
        lo = Math.min(lo, Math.floor(bar.zScore));
        hi = Math.max(hi, Math.ceil(bar.zScore));
    }
    return [lo, hi];
}

/**
 * Chart-ready structure for the rendering surface: bars in z units against
 * reference lines at the mean and +-1, +-2 SD. Raw line values are only
 * attached when a single summary applies to every bar.
 */
export function buildChart(
    bars: ChartBar[],
    options: { summary?: Pick<StatSummary, "mean" | "std">; annotations?: string[] } = {}
): ChartPayload {
    return {
        bars,
        referenceLines: buildReferenceLines(options.summary),
        yRange: computeYRange(bars),
        annotations: options.annotations ?? [],
    };
}

export function rangeAnnotations(summary: Pick<StatSummary, "count" | "ageRange" | "iqRange">): string[] {
    return [
        `N = ${summary.count}`,
        `Age range: ${summary.ageRange.min} ~ ${summary.ageRange.max}`,
        `IQ range: ${summary.iqRange.min} ~ ${summary.iqRange.max}`,
    ];
}
