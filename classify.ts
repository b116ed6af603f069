import { hmpiBands, mciBands, UNKNOWN_COLOR } from './shared/indexBands.js';
import type { HmpiCategory, IndexBand, IndexValue, MciCategory } from './shared/types.js';

const findBand = <L extends string>(bands: IndexBand<L>[], value: IndexValue): IndexBand<L> | null => {
  if (value === null || Number.isNaN(value)) return null;
  const x: number = value;
  return bands.find((band) => x >= band.min && (x < band.max || band.max === Infinity)) ?? null;
};

/**
 * Maps an HMPI value to its category; undefined values are `Unknown`
 */
export function categorizeHmpi(value: IndexValue): HmpiCategory {
  return findBand(hmpiBands, value)?.label ?? 'Unknown';
}

/**
 * Maps an MCI value to its category; undefined values are `Unknown`
 */
export function categorizeMci(value: IndexValue): MciCategory {
  return findBand(mciBands, value)?.label ?? 'Unknown';
}

/**
 * Display colour for a value, as used by map and report collaborators
 */
export function colorFor(kind: 'HMPI' | 'MCI', value: IndexValue): string {
  const band = kind === 'HMPI' ? findBand(hmpiBands, value) : findBand(mciBands, value);
  return band?.color ?? UNKNOWN_COLOR;
}
