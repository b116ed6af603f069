import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runComputation } from '../scripts/compute-indices.js';

const collect = (calls: unknown[][]): string => calls.map(([chunk]) => String(chunk)).join('');

describe('runComputation without an output file', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hmpi-stdout-'));
    await writeFile(join(dir, 'limits.json'), JSON.stringify({ Pb: 0.01, Cd: 0.003 }));
    await writeFile(
      join(dir, 'samples.json'),
      JSON.stringify([
        { SampleID: 'S1', Pb: 0.02, Cd: 0.006 },
        { SampleID: 'S2', Pb: 0.005 },
      ]),
    );
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('prints only the results table to stdout and logs to stderr', async () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    await runComputation({
      input: join(dir, 'samples.json'),
      format: 'json',
      weightScheme: '1/Si',
      limitsPath: join(dir, 'limits.json'),
    });

    const printed = collect(stdout.mock.calls);
    const logged = collect(stderr.mock.calls);
    vi.restoreAllMocks();

    expect(JSON.parse(printed)).toEqual([
      {
        SampleID: 'S1',
        Pb: 0.02,
        Cd: 0.006,
        HMPI: 200,
        HMPI_Category: 'Very High Pollution',
        MCI: 4,
        MCI_Category: 'Moderately Affected',
        PI_Pb: 2,
        PI_Cd: 2,
      },
      {
        SampleID: 'S2',
        Pb: 0.005,
        HMPI: 50,
        HMPI_Category: 'Low Pollution',
        MCI: 0.5,
        MCI_Category: 'Safe',
        PI_Pb: 0.5,
        PI_Cd: null,
      },
    ]);

    const messages = logged
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line).msg);
    expect(messages).toContain('Limits loaded');
    expect(messages).toContain('Computation summary');
  });
});
