/**
 * Classification bands for HMPI and MCI
 *
 * Thresholds are fixed domain constants. Every band is half-open: `min <= value < max`.
 */

import type { HmpiCategory, IndexBand, MciCategory } from './types.js';

export const UNKNOWN_COLOR = 'gray';

export const hmpiBands: IndexBand<Exclude<HmpiCategory, 'Unknown'>>[] = [
  { label: 'Safe', min: -Infinity, max: 50, color: 'green' },
  { label: 'Low Pollution', min: 50, max: 100, color: 'orange' },
  { label: 'High Pollution', min: 100, max: 200, color: 'red' },
  { label: 'Very High Pollution', min: 200, max: Infinity, color: 'darkred' },
];

export const mciBands: IndexBand<Exclude<MciCategory, 'Unknown'>>[] = [
  { label: 'Safe', min: -Infinity, max: 1, color: 'green' },
  { label: 'Alert', min: 1, max: 2, color: 'orange' },
  { label: 'Moderately Affected', min: 2, max: 6, color: 'red' },
  { label: 'Seriously Affected', min: 6, max: Infinity, color: 'darkred' },
];

/**
 * Category labels in ascending severity, `Unknown` last
 */
export const hmpiCategories: HmpiCategory[] = [...hmpiBands.map((band) => band.label), 'Unknown'];

export const mciCategories: MciCategory[] = [...mciBands.map((band) => band.label), 'Unknown'];
