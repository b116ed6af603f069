/**
 * Limit Store
 *
 * Loads the permissible-standard document (metal -> mg/L), validates its shape and
 * hands out frozen snapshots. Edits go through `saveLimits` / `LimitStore.update`,
 * which persist the document and swap in a new snapshot; a snapshot already handed
 * to a computation is never touched.
 */

import { randomUUID } from 'crypto';
import { readFile, rename, rm, writeFile } from 'fs/promises';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';
import type { Limits, MetalId } from './shared/types.js';

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * A standard takes part in aggregation only when it is a positive number
 */
export const isUsableStandard = (standard: number | null | undefined): standard is number =>
  typeof standard === 'number' && standard > 0;

/**
 * Validates a parsed limits document and returns a frozen snapshot (key order preserved)
 *
 * Non-positive and `null` standards are accepted here; the engine excludes those metals.
 *
 * @throws ConfigError if the document is not a mapping of metal identifier to number or null
 */
export function parseLimits(raw: unknown, source = 'limits'): Limits {
  if (!isPlainObject(raw)) {
    throw new ConfigError(`Limits in ${source} must be a mapping of metal to standard`, source);
  }

  const entries: Array<[MetalId, number | null]> = [];
  for (const [metal, standard] of Object.entries(raw)) {
    if (metal.trim() === '') {
      throw new ConfigError(`Limits in ${source} contain an empty metal identifier`, source);
    }
    if (standard === null) {
      entries.push([metal, null]);
      continue;
    }
    if (typeof standard !== 'number' || !Number.isFinite(standard)) {
      throw new ConfigError(`Standard for ${metal} in ${source} must be a number or null`, source);
    }
    entries.push([metal, standard]);
  }

  const unusable = entries.filter(([, standard]) => !isUsableStandard(standard)).map(([metal]) => metal);
  if (unusable.length > 0) {
    logger.warn({ source, metals: unusable }, 'Metals without a positive standard will be excluded');
  }

  return Object.freeze(Object.fromEntries(entries));
}

/**
 * Reads and validates the limits document at `path`
 *
 * @throws ConfigError if the file cannot be read, is not JSON, or is malformed
 */
export async function loadLimits(path: string): Promise<Limits> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(`Unable to read limits from ${path}`, path, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Limits file ${path} is not valid JSON`, path, { cause: error });
  }

  const limits = parseLimits(raw, path);
  logger.info({ path, metals: Object.keys(limits).length }, 'Limits loaded');
  return limits;
}

/**
 * Validates `raw` and writes it to `path` as the new limits document
 *
 * The file is replaced through a rename so readers never observe a partial write.
 * Each call writes its own temp file.
 *
 * @returns The new frozen snapshot
 * @throws ConfigError if `raw` is malformed; a plain Error (with `cause`) if the write fails
 */
export async function saveLimits(path: string, raw: unknown): Promise<Limits> {
  const limits = parseLimits(raw, path);
  const tempPath = `${path}.${randomUUID()}.tmp`;
  try {
    await writeFile(tempPath, `${JSON.stringify(limits, null, 2)}\n`, 'utf8');
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new Error(`Unable to write limits to ${path}`, { cause: error });
  }
  logger.info({ path, metals: Object.keys(limits) }, 'Limits saved');
  return limits;
}

/**
 * Holds the current limits snapshot for a long-running process
 */
export class LimitStore {
  private current: Limits;
  // Edits run one at a time, in call order
  private pending: Promise<unknown> = Promise.resolve();

  constructor(readonly path: string, initial: Limits) {
    this.current = initial;
  }

  static async open(path: string): Promise<LimitStore> {
    return new LimitStore(path, await loadLimits(path));
  }

  /**
   * Current snapshot. Callers capture it once per computation.
   */
  snapshot(): Limits {
    return this.current;
  }

  /**
   * Persists `raw` and swaps it in once every earlier edit has settled, so the
   * snapshot always matches the file on disk
   */
  update(raw: unknown): Promise<Limits> {
    const run = this.pending.then(async () => {
      const next = await saveLimits(this.path, raw);
      this.current = next;
      return next;
    });
    // A rejected edit still reaches its caller through `run`; later edits go ahead
    this.pending = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
