#!/usr/bin/env tsx
/**
 * Batch index computation
 *
 * Reads a JSON array of sample rows, validates it against the limits document,
 * computes HMPI / MCI / PI and writes the augmented table as JSON or CSV.
 *
 * Usage: tsx scripts/compute-indices.ts <input.json> [--out=results.csv] [--format=csv]
 *          [--weights=equal] [--limits=limits.json]
 */

import { readFile, writeFile } from 'fs/promises';
import { computeIndices } from '../computeIndices.js';
import { config } from '../config.js';
import { ValidationError } from '../errors.js';
import { toCsv } from '../lib/export.js';
import { loadLimits } from '../limits.js';
import { logger, routeLogsToStderr } from '../logger.js';
import { parseSampleTableRequest, parseWeightScheme } from '../requests.js';
import type { WeightScheme } from '../shared/types.js';
import { summarizeResults, type ResultSummary } from '../summary.js';
import { validateSampleTable } from '../validator.js';

export interface ComputeRunOptions {
  input: string;
  out?: string;
  format: 'json' | 'csv';
  weightScheme: WeightScheme;
  limitsPath: string;
}

/**
 * Parses `--key=value` flags; the first bare argument is the input file
 */
export function parseArgs(args: string[]): ComputeRunOptions {
  let input: string | undefined;
  let out: string | undefined;
  let format: 'json' | 'csv' = 'json';
  let weightScheme = config.weightScheme;
  let limitsPath = config.limitsPath;

  for (const arg of args) {
    if (arg.startsWith('--out=')) {
      out = arg.slice('--out='.length);
    } else if (arg.startsWith('--format=')) {
      const value = arg.slice('--format='.length);
      if (value !== 'json' && value !== 'csv') {
        throw new ValidationError(`Unknown format ${value}`);
      }
      format = value;
    } else if (arg.startsWith('--weights=')) {
      weightScheme = parseWeightScheme(arg.slice('--weights='.length)) ?? weightScheme;
    } else if (arg.startsWith('--limits=')) {
      limitsPath = arg.slice('--limits='.length);
    } else if (!arg.startsWith('--') && input === undefined) {
      input = arg;
    } else {
      throw new ValidationError(`Unexpected argument ${arg}`);
    }
  }

  if (!input) {
    throw new ValidationError('Usage: tsx scripts/compute-indices.ts <input.json> [--out=file] [--format=json|csv]');
  }

  return { input, out, format, weightScheme, limitsPath };
}

/**
 * Runs one computation and writes the result; returns the summary
 */
export async function runComputation(options: ComputeRunOptions): Promise<ResultSummary> {
  // stdout carries the results table
  if (!options.out) routeLogsToStderr();

  const limits = await loadLimits(options.limitsPath);

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(options.input, 'utf8'));
  } catch (error) {
    throw new ValidationError(
      `Unable to read sample rows from ${options.input}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const { rows } = parseSampleTableRequest({ rows: raw });
  const validation = validateSampleTable(rows, Object.keys(limits));
  if (!validation.valid) {
    logger.warn({ missingColumns: validation.missingColumns }, 'Computing with missing metal columns');
  }

  const result = computeIndices(rows, limits, { weightScheme: options.weightScheme });
  const summary = summarizeResults(result.rows, config.pollutedThreshold);

  const output = options.format === 'csv' ? toCsv(result.rows) : `${JSON.stringify(result.rows, null, 2)}\n`;
  if (options.out) {
    await writeFile(options.out, output, 'utf8');
    logger.info({ out: options.out, format: options.format }, 'Results written');
  } else {
    process.stdout.write(output);
  }

  logger.info(
    {
      total: summary.total,
      polluted: summary.polluted,
      safe: summary.safe,
      unknown: summary.unknown,
      excludedMetals: result.diagnostics.excludedMetals,
      nonNumericColumns: result.diagnostics.nonNumericColumns,
    },
    'Computation summary',
  );
  return summary;
}

// Run if executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  Promise.resolve()
    .then(() => runComputation(parseArgs(process.argv.slice(2))))
    .then(() => process.exit(0))
    .catch((error) => {
      logger.error({ error }, 'Index computation failed');
      process.exit(1);
    });
}
