/**
 * Index Engine
 *
 * Computes HMPI, MCI and per-metal PI for every row of a sample table against one
 * limits snapshot. Rows are independent of each other; output row i always
 * corresponds to input row i. A metal contributes to a row only when its
 * concentration is numeric (or decimal text) and its standard is positive. With no
 * contributing metal the row's HMPI and MCI are undefined (`null`), never zero.
 */

import { categorizeHmpi, categorizeMci } from './classify.js';
import { isUsableStandard } from './limits.js';
import type {
  IndexValue,
  Limits,
  MetalId,
  ResultRow,
  SampleRow,
  WeightScheme,
} from './shared/types.js';

export type CellReading =
  | { kind: 'numeric'; value: number }
  | { kind: 'coerced'; value: number }
  | { kind: 'missing' }
  | { kind: 'invalid' };

export interface ComputeIndicesOptions {
  weightScheme?: WeightScheme;
}

export interface ComputeDiagnostics {
  weightScheme: WeightScheme;
  /** Metals with a positive standard, in limits order */
  metals: MetalId[];
  /** Metals whose standard is missing, zero or negative */
  excludedMetals: MetalId[];
  /** Tracked metals that no row carries as a column */
  absentMetals: MetalId[];
  /** Metal columns holding decimal text that had to be coerced */
  coercedColumns: MetalId[];
  /** Metal columns holding entries that could not be read as numbers */
  nonNumericColumns: MetalId[];
  undefinedCounts: {
    HMPI: number;
    MCI: number;
    PI: Record<MetalId, number>;
  };
}

export interface ComputeIndicesResult {
  rows: ResultRow[];
  diagnostics: ComputeDiagnostics;
}

const MISSING: CellReading = { kind: 'missing' };
const INVALID: CellReading = { kind: 'invalid' };

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const MISSING_TOKENS = new Set(['na', 'n/a', '#n/a', 'nan', 'null', 'none', '-']);

/**
 * Reads one cell and says how it was obtained
 */
export function readCell(row: SampleRow, column: string): CellReading {
  const value = Object.hasOwn(row, column) ? row[column] : undefined;
  if (value === null || value === undefined) return MISSING;

  if (typeof value === 'number') {
    if (Number.isNaN(value)) return MISSING;
    return Number.isFinite(value) ? { kind: 'numeric', value } : INVALID;
  }

  if (typeof value === 'string') {
    const text = value.trim();
    if (text === '' || MISSING_TOKENS.has(text.toLowerCase())) return MISSING;
    if (!DECIMAL_PATTERN.test(text)) return INVALID;
    const parsed = Number(text);
    return Number.isFinite(parsed) ? { kind: 'coerced', value: parsed } : INVALID;
  }

  return INVALID;
}

/**
 * Numeric value of a cell, or `null` when it is missing or not coercible
 */
export function getNumeric(row: SampleRow, column: string): number | null {
  const reading = readCell(row, column);
  return reading.kind === 'numeric' || reading.kind === 'coerced' ? reading.value : null;
}

const usableMetals = (limits: Limits): Array<[MetalId, number]> => {
  const metals: Array<[MetalId, number]> = [];
  for (const [metal, standard] of Object.entries(limits)) {
    if (isUsableStandard(standard)) metals.push([metal, standard]);
  }
  return metals;
};

/**
 * An index that overflows the double range is reported as undefined, never as Infinity
 */
const finiteOrNull = (value: number): IndexValue => (Number.isFinite(value) ? value : null);

/**
 * HMPI per row: Σ(Qi·Wi) / Σ(Wi) with Qi = (Ci/Si)·100 and Wi = 1/Si or 1
 */
export function calculateHmpi(
  rows: readonly SampleRow[],
  limits: Limits,
  weightScheme: WeightScheme = '1/Si',
): IndexValue[] {
  const metals = usableMetals(limits);
  return rows.map((row) => {
    let weightedSum = 0;
    let weightSum = 0;
    for (const [metal, si] of metals) {
      const ci = getNumeric(row, metal);
      if (ci === null) continue;
      const qi = (ci / si) * 100;
      const wi = weightScheme === '1/Si' ? 1 / si : 1;
      weightedSum += qi * wi;
      weightSum += wi;
    }
    return weightSum > 0 ? finiteOrNull(weightedSum / weightSum) : null;
  });
}

/**
 * MCI per row: Σ(Ci/Si) over contributing metals
 */
export function calculateMci(rows: readonly SampleRow[], limits: Limits): IndexValue[] {
  const metals = usableMetals(limits);
  return rows.map((row) => {
    let sum = 0;
    let contributing = false;
    for (const [metal, si] of metals) {
      const ci = getNumeric(row, metal);
      if (ci === null) continue;
      sum += ci / si;
      contributing = true;
    }
    return contributing ? finiteOrNull(sum) : null;
  });
}

/**
 * One `PI_<metal>` column per tracked metal, including metals that cannot contribute
 */
export function calculatePiTable(
  rows: readonly SampleRow[],
  limits: Limits,
): Record<string, IndexValue[]> {
  const table: Record<string, IndexValue[]> = {};
  for (const [metal, si] of Object.entries(limits)) {
    table[piColumn(metal)] = rows.map((row) => {
      const ci = getNumeric(row, metal);
      return ci === null || !isUsableStandard(si) ? null : finiteOrNull(ci / si);
    });
  }
  return table;
}

export const piColumn = (metal: MetalId): string => `PI_${metal}`;

const countNulls = (values: IndexValue[]): number => values.filter((value) => value === null).length;

const inspectColumns = (rows: readonly SampleRow[], metals: MetalId[]) => {
  const coercedColumns: MetalId[] = [];
  const nonNumericColumns: MetalId[] = [];
  const absentMetals: MetalId[] = [];

  for (const metal of metals) {
    let present = false;
    let coerced = false;
    let invalid = false;
    for (const row of rows) {
      if (Object.hasOwn(row, metal)) present = true;
      const reading = readCell(row, metal);
      if (reading.kind === 'coerced') coerced = true;
      if (reading.kind === 'invalid') invalid = true;
    }
    if (!present) absentMetals.push(metal);
    if (coerced) coercedColumns.push(metal);
    if (invalid) nonNumericColumns.push(metal);
  }

  return { coercedColumns, nonNumericColumns, absentMetals };
};

/**
 * Computes every index for the table and appends the result and category columns
 *
 * Input rows are not mutated. Undefined results are `null` and categorised `Unknown`.
 */
export function computeIndices(
  rows: readonly SampleRow[],
  limits: Limits,
  options: ComputeIndicesOptions = {},
): ComputeIndicesResult {
  const weightScheme = options.weightScheme ?? '1/Si';
  const tracked = Object.keys(limits);

  const hmpi = calculateHmpi(rows, limits, weightScheme);
  const mci = calculateMci(rows, limits);
  const piTable = calculatePiTable(rows, limits);

  const resultRows: ResultRow[] = rows.map((row, index) => {
    const piValues: Record<string, IndexValue> = {};
    for (const metal of tracked) {
      const column = piColumn(metal);
      piValues[column] = piTable[column][index];
    }
    return {
      ...row,
      HMPI: hmpi[index],
      HMPI_Category: categorizeHmpi(hmpi[index]),
      MCI: mci[index],
      MCI_Category: categorizeMci(mci[index]),
      ...piValues,
    };
  });

  const piUndefined: Record<MetalId, number> = {};
  for (const metal of tracked) {
    piUndefined[metal] = countNulls(piTable[piColumn(metal)]);
  }

  return {
    rows: resultRows,
    diagnostics: {
      weightScheme,
      metals: usableMetals(limits).map(([metal]) => metal),
      excludedMetals: tracked.filter((metal) => !isUsableStandard(limits[metal])),
      ...inspectColumns(rows, tracked),
      undefinedCounts: {
        HMPI: countNulls(hmpi),
        MCI: countNulls(mci),
        PI: piUndefined,
      },
    },
  };
}
