import { hmpiCategories, mciCategories } from './shared/indexBands.js';
import type { HmpiCategory, MciCategory, ResultRow } from './shared/types.js';

export interface ResultSummary {
  total: number;
  /** HMPI at or above the threshold */
  polluted: number;
  /** HMPI defined and below the threshold */
  safe: number;
  /** HMPI undefined */
  unknown: number;
  /** polluted / total, 0 for an empty table */
  pollutedShare: number;
  pollutedThreshold: number;
  /** Counts in band order, `Unknown` last */
  hmpiCategories: CategoryCount<HmpiCategory>[];
  mciCategories: CategoryCount<MciCategory>[];
}

export interface CategoryCount<C extends string> {
  category: C;
  count: number;
}

const countBy = <C extends string>(labels: C[], values: C[]): CategoryCount<C>[] =>
  labels.map((category) => ({ category, count: values.filter((value) => value === category).length }));

/**
 * Headline counts for a computed table, as shown on dashboards and reports
 */
export function summarizeResults(rows: readonly ResultRow[], pollutedThreshold = 100): ResultSummary {
  let polluted = 0;
  let unknown = 0;
  for (const row of rows) {
    if (row.HMPI === null) unknown += 1;
    else if (row.HMPI >= pollutedThreshold) polluted += 1;
  }

  return {
    total: rows.length,
    polluted,
    safe: rows.length - polluted - unknown,
    unknown,
    pollutedShare: rows.length === 0 ? 0 : polluted / rows.length,
    pollutedThreshold,
    hmpiCategories: countBy(hmpiCategories, rows.map((row) => row.HMPI_Category)),
    mciCategories: countBy(mciCategories, rows.map((row) => row.MCI_Category)),
  };
}
