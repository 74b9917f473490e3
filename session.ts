import { ChartBar, ChartPayload, Dataset, FilterRange, StatSummary, ZScoreResult } from "./assessmentTypes.js";
import { computeSummary } from "./analysis/summary.js";
import { computeZScore } from "./analysis/zScore.js";
import { buildChart, rangeAnnotations } from "./chart/zScoreChart.js";
import { isValidationError } from "./errors.js";
import { defaultRanges } from "./filter.js";
import { createLogger } from "./logger.js";
import * as config from "./config.js";

const logger = createLogger(__filename);

export type SessionParams = {
    readonly ageRange: FilterRange;
    readonly iqRange: FilterRange;
    readonly metricColumn: string;
    readonly scores: Readonly<Record<string, number>>; // observed value per metric
}

export type ProfileEntry =
    | { metricColumn: string; ok: true; summary: StatSummary; result: ZScoreResult }
    | { metricColumn: string; ok: false; warning: string; summary?: StatSummary };

export type RecomputeOutcome = {
    params: SessionParams;
    summary?: StatSummary;      // selected metric
    result?: ZScoreResult;      // selected metric
    profile: ProfileEntry[];
    chart?: ChartPayload;
    warnings: string[];
}

export function initialParams(dataset: Dataset): SessionParams {
    const { ageRange, iqRange } = defaultRanges(dataset);
    const scores: Record<string, number> = {};
    for (const metric of dataset.metricColumns) {
        const score = config.default_scores[metric];
        if (score !== undefined) scores[metric] = score;
    }
    return { ageRange, iqRange, metricColumn: dataset.metricColumns[0] ?? "", scores };
}

function scoreMetric(dataset: Dataset, params: SessionParams, metricColumn: string): ProfileEntry {
    let summary: StatSummary | undefined;
    try {
        summary = computeSummary(dataset, params.ageRange, params.iqRange, metricColumn);
        const result = computeZScore(params.scores[metricColumn], summary);
        return { metricColumn, ok: true, summary, result };
    } catch (error) {
        if (!isValidationError(error)) throw error;
        return { metricColumn, ok: false, warning: `${metricColumn}: ${error.message}`, summary };
    }
}

/**
 * Summary and Z-score for every metric that has an observed value, in
 * dataset column order. The selected metric is always included.
 */
export function computeProfile(dataset: Dataset, params: SessionParams): ProfileEntry[] {
    return dataset.metricColumns
        .filter(metric => metric === params.metricColumn || params.scores[metric] !== undefined)
        .map(metric => scoreMetric(dataset, params, metric));
}

/**
 * One full pass (filter -> statistics -> z-score -> chart) for the current
 * parameters. Nothing is reused from earlier passes.
 */
export function recompute(dataset: Dataset, params: SessionParams): RecomputeOutcome {
    const profile = computeProfile(dataset, params);
    const warnings: string[] = [];
    const bars: ChartBar[] = [];
    const scored: StatSummary[] = [];
    let selected: ProfileEntry | undefined;

    if (!dataset.metricColumns.includes(params.metricColumn)) {
        warnings.push(`unknown metric column "${params.metricColumn}"`);
    }
    for (const entry of profile) {
        if (entry.metricColumn === params.metricColumn) selected = entry;
        if (!entry.ok) {
            warnings.push(entry.warning);
            continue;
        }
        scored.push(entry.summary);
        bars.push({ ...entry.result.chart.bars[0], highlighted: entry.metricColumn === params.metricColumn });
    }

    for (const warning of warnings) {
        logger.warn(warning);
    }

    const summary = selected?.summary;
    const result = selected?.ok ? selected.result : undefined;
    const chart = bars.length > 0
        ? buildChart(bars, {
            //raw line values only when the one bar is the selected metric's
            summary: scored.length === 1 && selected?.ok ? selected.summary : undefined,
            annotations: rangeAnnotations({
                count: summary?.count ?? 0,
                ageRange: params.ageRange,
                iqRange: params.iqRange,
            }),
        })
        : undefined;

    logger.debug(`Recomputed ${profile.length} metric(s), ${bars.length} bar(s), ${warnings.length} warning(s)`);
    return { params, summary, result, profile, chart, warnings };
}
