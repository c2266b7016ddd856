import { describe, it, expect } from 'vitest';
import { buildStressTable, defaultStressTable } from '../modules/StressTableModule';
import type { AllowableStressTableData } from '../modules/StressTableModule';

function table(overrides: Partial<AllowableStressTableData>): AllowableStressTableData {
  return {
    material: 'test-steel',
    standard: 'test-code',
    temperatureAxis: [100, 200],
    durationAxis: [1000, 2000],
    rows: [
      [100, 90],
      [80, 70],
    ],
    ...overrides,
  };
}

describe('defaultStressTable – reference data', () => {
  it('holds the 78 tabulated 12Kh1MF cells', () => {
    const summary = defaultStressTable.describe();
    expect(summary.material).toBe('12Kh1MF');
    expect(summary.standard).toBe('RD 10-249-98');
    expect(summary.presentPoints).toBe(78);
    expect(summary.temperatureAxis).toHaveLength(23);
    expect(summary.durationAxis).toEqual([10000, 100000, 200000, 300000, 400000]);
    expect(summary.temperatureRange).toEqual([20, 620]);
    expect(summary.durationRange).toEqual([10000, 400000]);
  });

  it('cellAt returns tabulated values and null for gaps', () => {
    expect(defaultStressTable.cellAt(20, 100000)).toBe(173);
    expect(defaultStressTable.cellAt(480, 10000)).toBe(133);
    expect(defaultStressTable.cellAt(600, 400000)).toBe(27);
    expect(defaultStressTable.cellAt(20, 10000)).toBeNull();
    expect(defaultStressTable.cellAt(620, 100000)).toBeNull();
    expect(defaultStressTable.cellAt(545, 100000)).toBeNull();
  });
});

describe('defaultStressTable.query', () => {
  it('is exact at every tabulated cell', () => {
    for (const p of defaultStressTable.points()) {
      expect(defaultStressTable.query(p.temperature, p.hours)).toBe(p.stress);
    }
  });

  it('20 °C at 400 000 h lies outside the tabulated region → null', () => {
    expect(defaultStressTable.query(20, 400000)).toBeNull();
  });

  it('refuses to extrapolate beyond the temperature or duration range', () => {
    expect(defaultStressTable.query(700, 100000)).toBeNull();
    expect(defaultStressTable.query(545, 5000)).toBeNull();
    expect(defaultStressTable.query(500, 450000)).toBeNull();
    expect(defaultStressTable.query(10, 100000)).toBeNull();
  });

  it('non-finite queries → null', () => {
    expect(defaultStressTable.query(Number.NaN, 100000)).toBeNull();
    expect(defaultStressTable.query(500, Number.POSITIVE_INFINITY)).toBeNull();
  });

  it('interpolates linearly along a tabulated temperature column', () => {
    // 500 °C: 113 MPa at 1e5 h, 96 MPa at 2e5 h
    expect(defaultStressTable.query(500, 150000)).toBeCloseTo(104.5, 9);
  });

  it('interpolates linearly along a tabulated duration row', () => {
    // 1e5 h: 113 MPa at 500 °C, 101 MPa at 510 °C
    expect(defaultStressTable.query(505, 100000)).toBeCloseTo(107, 9);
  });

  it('545 °C at 269 142 h → 56.23432 MPa', () => {
    // The 540–550 °C × 2e5–3e5 h cell is planar: 62 − 0.6 (T − 540) − 4e-5 (t − 2e5)
    expect(defaultStressTable.query(545, 269142)).toBeCloseTo(56.23432, 9);
  });

  it('splits the 460–480 °C × 2e5–3e5 h cell along the 480 °C/2e5 h to 460 °C/3e5 h diagonal', () => {
    // Corners: 136 (460, 2e5), 120 (480, 2e5), 107 (480, 3e5), 130 (460, 3e5).
    // The other diagonal would give 115.27308 here.
    expect(defaultStressTable.query(474.2, 273282)).toBeCloseTo(117.14334, 6);
  });

  it('repeated queries return identical values', () => {
    const a = defaultStressTable.query(533.3, 123456);
    const b = defaultStressTable.query(533.3, 123456);
    expect(a).not.toBeNull();
    expect(a).toBe(b);
  });

  it('interpolated values stay within the neighbouring tabulated values', () => {
    const v = defaultStressTable.query(515, 250000);
    expect(v).not.toBeNull();
    expect(v ?? 0).toBeGreaterThanOrEqual(72);
    expect(v ?? 0).toBeLessThanOrEqual(86);
  });
});

describe('buildStressTable', () => {
  it('interpolates a fully populated planar table at its centre', () => {
    const t = buildStressTable(table({}));
    // Values are planar: 100 − 0.1 (T − 100) − 0.02 (t − 1000)
    expect(t.query(150, 1500)).toBeCloseTo(85, 9);
    expect(t.query(100, 1000)).toBe(100);
  });

  it('no present cells → every query is null', () => {
    const t = buildStressTable(table({ rows: [[null, null], [null, null]] }));
    expect(t.describe().presentPoints).toBe(0);
    expect(t.describe().temperatureRange).toBeNull();
    expect(t.query(100, 1000)).toBeNull();
  });

  it('too few points to span an area → null', () => {
    const t = buildStressTable(table({ rows: [[100, null], [null, 70]] }));
    expect(t.query(100, 1000)).toBeNull();
    expect(t.query(150, 1500)).toBeNull();
  });

  it('rejects a descending axis', () => {
    expect(() => buildStressTable(table({ temperatureAxis: [200, 100] }))).toThrow(/strictly ascending/);
  });

  it('rejects rows that do not match the temperature axis', () => {
    expect(() => buildStressTable(table({ rows: [[100], [80]] }))).toThrow(/one cell per temperature/);
  });

  it('rejects a row count that does not match the duration axis', () => {
    expect(() => buildStressTable(table({ rows: [[100, 90]] }))).toThrow(/one entry per duration/);
  });
});
