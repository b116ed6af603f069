import { ValidationError } from './errors.js';
import {
  WEIGHT_SCHEMES,
  type CellValue,
  type ColumnMapping,
  type SampleRow,
  type WeightScheme,
} from './shared/types.js';

/**
 * Payload accepted by the validate and compute endpoints
 */
export interface SampleTableRequest {
  rows: SampleRow[];
  columnMap?: ColumnMapping;
  weightScheme?: WeightScheme;
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isCellValue = (value: unknown): value is CellValue =>
  value === null ||
  value === undefined ||
  typeof value === 'string' ||
  typeof value === 'number' ||
  typeof value === 'boolean';

const parseRows = (value: unknown): SampleRow[] => {
  if (!Array.isArray(value)) {
    throw new ValidationError('rows must be an array of objects');
  }

  return value.map((item, index) => {
    if (!isPlainObject(item)) {
      throw new ValidationError(`Row ${index} must be an object`);
    }
    const cells: Array<[string, CellValue]> = [];
    for (const [column, cell] of Object.entries(item)) {
      if (!isCellValue(cell)) {
        throw new ValidationError(`Row ${index} column ${column} must be a scalar value`);
      }
      cells.push([column, cell]);
    }
    return Object.fromEntries(cells);
  });
};

const parseColumnMap = (value: unknown): ColumnMapping | undefined => {
  if (value === undefined || value === null) return undefined;
  if (!isPlainObject(value)) {
    throw new ValidationError('columnMap must map target columns to source columns');
  }
  const entries: Array<[string, string]> = [];
  for (const [target, source] of Object.entries(value)) {
    if (typeof source !== 'string') {
      throw new ValidationError(`columnMap entry for ${target} must be a column name`);
    }
    entries.push([target, source]);
  }
  return Object.fromEntries(entries);
};

export const parseWeightScheme = (value: unknown): WeightScheme | undefined => {
  if (value === undefined || value === null) return undefined;
  const scheme = WEIGHT_SCHEMES.find((candidate) => candidate === value);
  if (!scheme) {
    throw new ValidationError(`weightScheme must be one of ${WEIGHT_SCHEMES.join(', ')}`);
  }
  return scheme;
};

/**
 * Validates a request body as a sample table request
 *
 * @throws ValidationError if the body is not an object with a `rows` array of flat objects
 */
export function parseSampleTableRequest(body: unknown): SampleTableRequest {
  if (!isPlainObject(body)) {
    throw new ValidationError('Request body must be an object with a rows array');
  }
  return {
    rows: parseRows(body.rows),
    columnMap: parseColumnMap(body.columnMap),
    weightScheme: parseWeightScheme(body.weightScheme),
  };
}
