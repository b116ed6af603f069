/**
 * Core type definitions for the water-quality index engine
 */

/**
 * Metal identifier as used in the limits document and sample columns (e.g. `Pb`, `Cd`)
 */
export type MetalId = string;

/**
 * Permissible standards in mg/L, keyed by metal. `null` marks a metal with no usable standard.
 * Snapshots are frozen and never mutated during a computation run.
 */
export type Limits = Readonly<Record<MetalId, number | null>>;

/**
 * Weighting scheme for HMPI aggregation
 */
export type WeightScheme = '1/Si' | 'equal';

export const WEIGHT_SCHEMES: readonly WeightScheme[] = ['1/Si', 'equal'];

/**
 * Raw cell value as it arrives from an uploaded table
 */
export type CellValue = string | number | boolean | null | undefined;

/**
 * One sample row: column name to raw value
 */
export type SampleRow = Readonly<Record<string, CellValue>>;

/**
 * Computed index value. `null` is the undefined marker: not enough valid inputs.
 */
export type IndexValue = number | null;

export type HmpiCategory = 'Unknown' | 'Safe' | 'Low Pollution' | 'High Pollution' | 'Very High Pollution';

export type MciCategory = 'Unknown' | 'Safe' | 'Alert' | 'Moderately Affected' | 'Seriously Affected';

/**
 * Half-open classification band: `min <= value < max`
 */
export interface IndexBand<L extends string> {
  label: L;
  min: number;
  max: number;
  color: string;
}

/**
 * Sample row augmented with computed index columns
 */
export type ResultRow = Readonly<Record<string, CellValue>> & {
  HMPI: IndexValue;
  HMPI_Category: HmpiCategory;
  MCI: IndexValue;
  MCI_Category: MciCategory;
};

/**
 * Maps a metal identifier (or `latitude` / `longitude`) to the source column that holds it
 */
export type ColumnMapping = Readonly<Record<string, string>>;
