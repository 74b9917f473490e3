import * as XLSX from 'xlsx';
import fs from 'fs';
import * as config from './config.js';
import { createLogger } from './logger.js';
import { LoadError } from './errors.js';
import { AssessmentRecord, Dataset } from './assessmentTypes.js';

const logger = createLogger(__filename);

export type LoaderOptions = {
    ageColumn: string;
    iqColumn: string;
    idColumn: string;
    ignoredColumns: readonly string[];
    metricColumns: readonly string[]; // empty = detect
}

export const DEFAULT_LOADER_OPTIONS: LoaderOptions = {
    ageColumn: config.age_column,
    iqColumn: config.iq_column,
    idColumn: config.id_column,
    ignoredColumns: config.ignored_columns,
    metricColumns: config.metric_columns,
};

/**
 * Numeric coercion for spreadsheet cells. Anything that is not a finite number
 * (or a string holding one) becomes undefined instead of raising.
 */
export function coerceNumeric(cell: unknown): number | undefined {
    if (typeof cell === "number") {
        return Number.isFinite(cell) ? cell : undefined;
    }
    if (typeof cell === "string") {
        const trimmed = cell.trim();
        if (trimmed === "") return undefined;
        const parsed = Number(trimmed);
        return Number.isFinite(parsed) ? parsed : undefined;
    }
    return undefined;
}

function cellToId(cell: unknown): string | undefined {
    if (typeof cell === "string") {
        const trimmed = cell.trim();
        return trimmed === "" ? undefined : trimmed;
    }
    if (typeof cell === "number" && Number.isFinite(cell)) return String(cell);
    return undefined;
}

/**
 * Turns a raw table (header row first, as SheetJS returns it with header: 1)
 * into a frozen Dataset. Rows without a numeric age or IQ are dropped.
 */
export function buildDataset(table: readonly (readonly unknown[])[], source: string, options: LoaderOptions = DEFAULT_LOADER_OPTIONS): Dataset {
    if (table.length === 0) {
        throw new LoadError("EMPTY", source, `${source} has no header row`);
    }

    // header name -> column index, first occurrence wins
    const columnIndex = new Map<string, number>();
    table[0].forEach((cell, index) => {
        const name = cell === null || cell === undefined ? "" : String(cell).trim();
        if (name !== "" && !columnIndex.has(name)) {
            columnIndex.set(name, index);
        }
    });

    const required = [options.ageColumn, options.iqColumn, ...options.metricColumns];
    const missing = required.filter(name => !columnIndex.has(name));
    if (missing.length > 0) {
        throw new LoadError("MISSING_COLUMNS", source, `${source} is missing required column(s): ${missing.join(", ")}`);
    }

    const ageIndex = columnIndex.get(options.ageColumn) ?? -1;
    const iqIndex = columnIndex.get(options.iqColumn) ?? -1;
    const idIndex = columnIndex.get(options.idColumn);
    const dataRows = table.slice(1);

    let metricColumns: string[];
    if (options.metricColumns.length > 0) {
        metricColumns = [...options.metricColumns];
    } else {
        const excluded = new Set([options.ageColumn, options.iqColumn, options.idColumn, ...options.ignoredColumns]);
        metricColumns = [...columnIndex.entries()]
            .filter(([name]) => !excluded.has(name))
            .sort((a, b) => a[1] - b[1])
            .filter(([, index]) => dataRows.some(row => coerceNumeric(row[index]) !== undefined))
            .map(([name]) => name);
    }
    if (metricColumns.length === 0) {
        throw new LoadError("NO_METRICS", source, `${source} has no numeric metric columns`);
    }

    const records: AssessmentRecord[] = [];
    let dropped = 0;
    dataRows.forEach((row, rowIndex) => {
        const age = coerceNumeric(row[ageIndex]);
        const iq = coerceNumeric(row[iqIndex]);
        if (age === undefined || iq === undefined) {
            dropped++;
            return;
        }
        const metrics: Record<string, number | undefined> = {};
        for (const metric of metricColumns) {
            const index = columnIndex.get(metric) ?? -1;
            metrics[metric] = coerceNumeric(row[index]);
        }
        const id = (idIndex === undefined ? undefined : cellToId(row[idIndex])) ?? `row-${rowIndex + 2}`;
        records.push(Object.freeze({ id, age, iq, metrics: Object.freeze(metrics) }));
    });

    if (dropped > 0) {
        logger.warn(`Dropped ${dropped} row(s) without a numeric ${options.ageColumn} or ${options.iqColumn}`);
    }
    logger.debug(`Built dataset from ${source}: ${records.length} records, metrics ${metricColumns.join(", ")}`);

    return Object.freeze({
        source,
        records: Object.freeze(records),
        metricColumns: Object.freeze(metricColumns),
    });
}

/**
 * Loads the first sheet of a spreadsheet (xlsx, xls or csv) into a Dataset.
 */
export function load(path: string, options: LoaderOptions = DEFAULT_LOADER_OPTIONS): Dataset {
    if (!fs.existsSync(path)) {
        throw new LoadError("FILE_NOT_FOUND", path, `Data file not found: ${path}`);
    }

    let workbook: XLSX.WorkBook;
    try {
        workbook = XLSX.readFile(path, { cellDates: false });
    } catch (error) {
        throw new LoadError("UNREADABLE", path, `Could not read ${path}: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    }

    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
    if (sheet === undefined) {
        throw new LoadError("EMPTY", path, `${path} contains no sheets`);
    }

    const table = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: null, blankrows: false });
    logger.info(`Loaded sheet "${sheetName}" from ${path} (${Math.max(table.length - 1, 0)} data rows)`);
    return buildDataset(table, path, options);
}
