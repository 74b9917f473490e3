import { Dataset } from '../assessmentTypes.js';
import { LoadError, ValidationError } from '../errors.js';
import { buildDataset, LoaderOptions } from '../loader.js';

export const TEST_LOADER_OPTIONS: LoaderOptions = {
  ageColumn: 'age',
  iqColumn: 'est_IQ',
  idColumn: 'participant',
  ignoredColumns: ['experimenter', 'study', 'participant'],
  metricColumns: [],
};

// p6 (age "x") and p7 (no IQ) are dropped at load
export const FIXTURE_TABLE: unknown[][] = [
  ['participant', 'age', 'est_IQ', 'PL', 'PR', 'study'],
  ['p1', 20, 100, 10, 5, 'pilot'],
  ['p2', 25, 110, 20, 5, 'pilot'],
  ['p3', 30, 90, 30, 5, 'pilot'],
  ['p4', 40, 120, 40, 'n/a', 'pilot'],
  ['p5', 70, 130, 50, 5, 'pilot'],
  ['p6', 'x', 100, 60, 5, 'pilot'],
  ['p7', 35, null, 70, 5, 'pilot'],
];

export function fixtureDataset(table: unknown[][] = FIXTURE_TABLE): Dataset {
  return buildDataset(table, 'fixture', TEST_LOADER_OPTIONS);
}

export function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError || error instanceof LoadError) return error.code;
    throw error;
  }
  return undefined;
}
