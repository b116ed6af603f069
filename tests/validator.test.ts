import { describe, it, expect, vi } from 'vitest';
import { validateSampleTable } from '../validator.js';

// Mock logger
vi.mock('../logger.js', () => ({
  logger: {
    warn: vi.fn(),
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

describe('Validator - validateSampleTable', () => {
  const metals = ['Pb', 'Cd'];

  it('passes a table carrying every metal column', () => {
    const report = validateSampleTable(
      [
        { Pb: 0.01, Cd: 0.002 },
        { Pb: 0.03, Cd: 0.004 },
      ],
      metals,
    );

    expect(report.valid).toBe(true);
    expect(report.rows).toBe(2);
    expect(report.missingColumns).toEqual([]);
  });

  it('fails when a metal column is absent from every row', () => {
    const report = validateSampleTable([{ Pb: 0.01 }, { Pb: 0.02 }], metals);

    expect(report.valid).toBe(false);
    expect(report.missingColumns).toEqual(['Cd']);
    expect(report.medianMagnitude.Pb).toBeCloseTo(0.015, 12);
  });

  it('reports coerced and non-numeric columns separately', () => {
    const report = validateSampleTable(
      [
        { Pb: '0.01', Cd: 'ND' },
        { Pb: 0.02, Cd: 0.004 },
      ],
      metals,
    );

    expect(report.coercedColumns).toEqual(['Pb']);
    expect(report.nonNumericColumns).toEqual(['Cd']);
    expect(report.valid).toBe(true);
  });

  it('computes the median absolute magnitude per metal', () => {
    const report = validateSampleTable(
      [{ Pb: -4, Cd: null }, { Pb: 1 }, { Pb: '2' }],
      metals,
    );

    expect(report.medianMagnitude).toEqual({ Pb: 2, Cd: null });
  });

  describe('Coordinates', () => {
    it('counts missing latitude and longitude cells', () => {
      const report = validateSampleTable(
        [
          { Pb: 0.01, Cd: 0.001, latitude: 12.9, longitude: 77.6 },
          { Pb: 0.01, Cd: 0.001, latitude: null, longitude: 77.5 },
          { Pb: 0.01, Cd: 0.001, latitude: '', longitude: null },
        ],
        metals,
      );

      expect(report.missingCoords).toBe(3);
    });

    it('reports zero when the table has no coordinate columns', () => {
      const report = validateSampleTable([{ Pb: 0.01, Cd: 0.001, latitude: null }], metals);
      expect(report.missingCoords).toBe(0);
    });
  });

  describe('Edge Cases', () => {
    it('handles an empty table', () => {
      const report = validateSampleTable([], metals);

      expect(report.rows).toBe(0);
      expect(report.valid).toBe(false);
      expect(report.missingColumns).toEqual(['Pb', 'Cd']);
      expect(report.medianMagnitude).toEqual({});
    });
  });
});
