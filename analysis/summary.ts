import { Dataset, FilterRange, StatSummary } from "../assessmentTypes.js";
import { ValidationError } from "../errors.js";
import { createRange, filterByRanges } from "../filter.js";
import { computeStatistics } from "./statistics.js";

/**
 * Count, mean and sample standard deviation of one metric over the records
 * whose age and IQ fall inside the (inclusive) ranges.
 *
 * Throws a ValidationError instead of returning NaN when fewer than two
 * records have a value for the metric.
 */
export function computeSummary(
    dataset: Dataset,
    ageRange: FilterRange,
    iqRange: FilterRange,
    metricColumn: string
  ): StatSummary {
    createRange(ageRange.min, ageRange.max, "age range");
    createRange(iqRange.min, iqRange.max, "IQ range");
    if (!dataset.metricColumns.includes(metricColumn)) {
      throw new ValidationError("UNKNOWN_METRIC", `unknown metric column "${metricColumn}"`);
    }

    const values: number[] = [];
    for (const record of filterByRanges(dataset, ageRange, iqRange)) {
      const value = record.metrics[metricColumn];
      if (value !== undefined) values.push(value);
    }

    if (values.length < 2) {
      throw new ValidationError(
        "INSUFFICIENT_DATA",
        `fewer than 2 matching records for ${metricColumn} in the selected range (found ${values.length})`
      );
    }

    const { mean, std } = computeStatistics(values);
    return {
      metricColumn,
      count: values.length,
      mean,
      std,
      ageRange: { min: ageRange.min, max: ageRange.max },
      iqRange: { min: iqRange.min, max: iqRange.max },
    };
  }
