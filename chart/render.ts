import { ChartPayload, StatSummary, ZScoreResult } from "../assessmentTypes.js";

export const DEFAULT_CHART_WIDTH = 41;

export function zToColumn(z: number, yRange: [number, number], width: number): number {
    const [lo, hi] = yRange;
    if (width <= 1 || hi <= lo) return 0;
    const column = Math.round(((z - lo) / (hi - lo)) * (width - 1));
    return Math.min(Math.max(column, 0), width - 1);
}

/**
 * Text rendering of a chart payload, one row per bar:
 *
 *   > PL   1.00  ::##:  average
 *
 * `|` marks the mean, `:` the other reference lines, `#` the bar from zero
 * to the bar's z. The highlighted bar gets a leading `>`.
 */
export function renderChart(payload: ChartPayload, width: number = DEFAULT_CHART_WIDTH): string {
    const labelWidth = payload.bars.reduce((acc, bar) => Math.max(acc, bar.label.length), 0);
    const prefixWidth = labelWidth + 10;
    const [lo, hi] = payload.yRange;

    const left = String(lo);
    const right = String(hi);
    const gap = Math.max(width - left.length - right.length, 1);
    const lines: string[] = [`${" ".repeat(prefixWidth)}${left}${" ".repeat(gap)}${right}`];

    if (payload.bars.length === 0) {
        lines.push("  (no bars to draw)");
    }

    const zeroColumn = zToColumn(0, payload.yRange, width);
    for (const bar of payload.bars) {
        const track: string[] = new Array<string>(width).fill(" ");
        for (const line of payload.referenceLines) {
            track[zToColumn(line.zScore, payload.yRange, width)] = line.zScore === 0 ? "|" : ":";
        }
        const barColumn = zToColumn(bar.zScore, payload.yRange, width);
        for (let c = Math.min(zeroColumn, barColumn); c <= Math.max(zeroColumn, barColumn); c++) {
            track[c] = "#";
        }
        const marker = bar.highlighted ? ">" : " ";
        const z = bar.zScore.toFixed(2).padStart(6);
        lines.push(`${marker} ${bar.label.padEnd(labelWidth)} ${z} ${track.join("")} ${bar.band}`);
    }

    lines.push(...payload.annotations);
    return lines.join("\n");
}

export function formatSummary(summary: StatSummary, result?: ZScoreResult): string {
    const parts = [
        `N = ${summary.count}`,
        `mean = ${summary.mean.toFixed(2)}`,
        `SD = ${summary.std.toFixed(2)}`,
    ];
    if (result) {
        parts.push(`z = ${result.zScore.toFixed(2)} (${result.band.label})`);
    }
    return `${summary.metricColumn}: ${parts.join(" | ")}`;
}
