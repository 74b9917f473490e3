export type AssessmentRecord = {
    readonly id: string;
    readonly age: number;
    readonly iq: number;
    readonly metrics: Readonly<Record<string, number | undefined>>; // undefined = missing / non-numeric cell
}

export type Dataset = {
    readonly source: string;
    readonly records: readonly AssessmentRecord[];
    readonly metricColumns: readonly string[];
}

//inclusive on both ends
export type FilterRange = {
    readonly min: number;
    readonly max: number;
}

export type StatSummary = {
    metricColumn: string;
    count: number;          // records in range with a value for metricColumn
    mean: number;
    std: number;            // sample standard deviation (n - 1)
    ageRange: FilterRange;
    iqRange: FilterRange;
}

export type ZBand = {
    label: string;
    min: number;            // inclusive unless minExclusive
    max: number;            // inclusive unless maxExclusive
    minExclusive?: boolean;
    maxExclusive?: boolean;
    color: string;
}

export type ChartBar = {
    label: string;
    observedValue: number;
    zScore: number;
    band: string;
    color: string;
    highlighted: boolean;
}

export type ReferenceLine = {
    zScore: number;
    value?: number;         // raw metric value, only when the chart has a single metric
    label: string;
    dash: "solid" | "dash";
    color: string;
}

export type ChartPayload = {
    bars: ChartBar[];
    referenceLines: ReferenceLine[];
    yRange: [number, number];
    annotations: string[];
}

export type ZScoreResult = {
    metricColumn: string;
    observedValue: number;
    zScore: number;
    band: ZBand;
    summary: StatSummary;
    chart: ChartPayload;
}
