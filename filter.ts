import { AssessmentRecord, Dataset, FilterRange } from "./assessmentTypes.js";
import { ValidationError } from "./errors.js";
import * as config from "./config.js";

export function createRange(min: number, max: number, name: string = "range"): FilterRange {
    if (!Number.isFinite(min) || !Number.isFinite(max)) {
        throw new ValidationError("INVALID_RANGE", `${name} bounds must be numbers`);
    }
    if (min > max) {
        throw new ValidationError("INVALID_RANGE", `${name} minimum ${min} is greater than maximum ${max}`);
    }
    return { min, max };
}

export function inRange(value: number, range: FilterRange): boolean {
    return value >= range.min && value <= range.max;
}

//new array every call, the dataset is never touched
export function filterByRanges(dataset: Dataset, ageRange: FilterRange, iqRange: FilterRange): AssessmentRecord[] {
    return dataset.records.filter(record => inRange(record.age, ageRange) && inRange(record.iq, iqRange));
}

/**
 * Whole-number bounds that cover every record, used as the limits for range input.
 */
export function datasetExtent(dataset: Dataset): { age: FilterRange; iq: FilterRange } {
    if (dataset.records.length === 0) {
        return { age: { min: 0, max: 0 }, iq: { min: 0, max: 0 } };
    }
    // no Math.min(...spread): sheets can exceed the argument limit
    const [head] = dataset.records;
    const bounds = dataset.records.reduce(
        (acc, record) => ({
            ageMin: Math.min(acc.ageMin, record.age),
            ageMax: Math.max(acc.ageMax, record.age),
            iqMin: Math.min(acc.iqMin, record.iq),
            iqMax: Math.max(acc.iqMax, record.iq),
        }),
        { ageMin: head.age, ageMax: head.age, iqMin: head.iq, iqMax: head.iq }
    );
    return {
        age: { min: Math.floor(bounds.ageMin), max: Math.ceil(bounds.ageMax) },
        iq: { min: Math.floor(bounds.iqMin), max: Math.ceil(bounds.iqMax) },
    };
}

function clampRange(preferred: FilterRange, extent: FilterRange): FilterRange {
    const min = Math.max(preferred.min, extent.min);
    const max = Math.min(preferred.max, extent.max);
    // no overlap: fall back to the whole extent
    return min <= max ? { min, max } : { ...extent };
}

export function defaultRanges(dataset: Dataset): { ageRange: FilterRange; iqRange: FilterRange } {
    const extent = datasetExtent(dataset);
    return {
        ageRange: clampRange(config.default_age_range, extent.age),
        iqRange: clampRange(config.default_iq_range, extent.iq),
    };
}
