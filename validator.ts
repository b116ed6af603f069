import { median } from 'mathjs';
import { getNumeric, readCell } from './computeIndices.js';
import { logger } from './logger.js';
import type { MetalId, SampleRow } from './shared/types.js';

export interface SampleValidationReport {
  valid: boolean;
  rows: number;
  /** Tracked metals no row carries as a column */
  missingColumns: MetalId[];
  /** Metal columns with entries that are neither numbers nor decimal text */
  nonNumericColumns: MetalId[];
  /** Metal columns with decimal text that will be coerced */
  coercedColumns: MetalId[];
  /** Missing latitude cells plus missing longitude cells, when both columns exist */
  missingCoords: number;
  /** Median absolute concentration per metal; `null` when the column has no numeric value */
  medianMagnitude: Record<MetalId, number | null>;
}

const hasColumn = (rows: readonly SampleRow[], column: string): boolean =>
  rows.some((row) => Object.hasOwn(row, column));

/**
 * Checks a sample table before computation
 *
 * The table is valid when every tracked metal appears as a column. Median magnitudes
 * help spot unit mix-ups (µg/L uploaded where mg/L is expected).
 *
 * @param rows - Sample table, already column-mapped
 * @param metals - Tracked metal identifiers (the limits keys)
 */
export const validateSampleTable = (
  rows: readonly SampleRow[],
  metals: readonly MetalId[],
): SampleValidationReport => {
  const missingColumns: MetalId[] = [];
  const nonNumericColumns: MetalId[] = [];
  const coercedColumns: MetalId[] = [];
  const medianMagnitude: Record<MetalId, number | null> = {};

  for (const metal of metals) {
    if (!hasColumn(rows, metal)) {
      missingColumns.push(metal);
      continue;
    }

    const readings = rows.map((row) => readCell(row, metal));
    if (readings.some((reading) => reading.kind === 'invalid')) nonNumericColumns.push(metal);
    if (readings.some((reading) => reading.kind === 'coerced')) coercedColumns.push(metal);

    const magnitudes = rows
      .map((row) => getNumeric(row, metal))
      .filter((value): value is number => value !== null)
      .map((value) => Math.abs(value));
    medianMagnitude[metal] = magnitudes.length > 0 ? Number(median(magnitudes)) : null;
  }

  let missingCoords = 0;
  if (hasColumn(rows, 'latitude') && hasColumn(rows, 'longitude')) {
    for (const row of rows) {
      if (getNumeric(row, 'latitude') === null) missingCoords += 1;
      if (getNumeric(row, 'longitude') === null) missingCoords += 1;
    }
  }

  const report: SampleValidationReport = {
    valid: missingColumns.length === 0,
    rows: rows.length,
    missingColumns,
    nonNumericColumns,
    coercedColumns,
    missingCoords,
    medianMagnitude,
  };

  if (!report.valid) {
    logger.warn({ missingColumns }, 'Sample table is missing metal columns');
  }
  if (nonNumericColumns.length > 0) {
    logger.warn({ nonNumericColumns }, 'Non-numeric entries will be treated as missing');
  }
  logger.info({ rows: report.rows, valid: report.valid, missingCoords }, 'Sample table validated');

  return report;
};
