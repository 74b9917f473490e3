function envString(name: string, fallback: string): string {
    const value = process.env[name];
    return value === undefined || value.trim() === "" ? fallback : value.trim();
}

function envList(name: string): string[] {
    const value = process.env[name];
    if (value === undefined) return [];
    return value.split(",").map(item => item.trim()).filter(item => item.length > 0);
}

function envNumber(name: string, fallback: number): number {
    const parsed = Number(process.env[name]);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

const isTest = process.env.NODE_ENV === "test";

// +++ INPUT FILE +++

export const data_file = envString("DATA_FILE", "JEF.data.xlsx");
export const age_column = envString("AGE_COLUMN", "age");
export const iq_column = envString("IQ_COLUMN", "est_IQ");
export const id_column = envString("ID_COLUMN", "participant");
//bookkeeping columns, never scored
export const ignored_columns: string[] = ["experimenter", "study", "participant"];
//empty: every remaining column with numeric data is a metric
export const metric_columns: string[] = envList("METRIC_COLUMNS");

// +++ SESSION DEFAULTS +++

export const default_age_range = { min: 18, max: 120 };
export const default_iq_range = { min: 70, max: 180 };
export const default_scores: Record<string, number> = {
    PL: 50,
    PR: 100,
    ST: 50,
    CT: 25,
    AT: 0,
    EBPM: 25,
    ABPM: 75,
    TBPM: 50,
    AVG: 46.9,
};

export const watch_interval_ms = envNumber("WATCH_INTERVAL_MS", 1000);

// +++ LOGGING +++

export const log_level = envString("LOG_LEVEL", isTest ? "silent" : "debug");
export const log_pretty = envString("LOG_PRETTY", isTest ? "false" : "true") !== "false";
//unset: console only
export const log_file = process.env.LOG_FILE ?? "";
