import { describe, it, expect } from 'vitest';
import { normalizeInput } from '../normalizer/Normalizer';
import { DEFAULT_JOINT_INPUT } from '../schema/JointInputV1';

describe('normalizeInput', () => {
  it('accepts the default joint input unchanged', () => {
    const out = normalizeInput(DEFAULT_JOINT_INPUT);
    expect(out.ok).toBe(true);
    if (out.ok) expect(out.input).toEqual(DEFAULT_JOINT_INPUT);
  });

  it('defaults a missing corrosion allowance to 0', () => {
    const { corrosionAllowance: _omit, ...raw } = DEFAULT_JOINT_INPUT;
    const out = normalizeInput(raw);
    expect(out.ok).toBe(true);
    if (out.ok) expect(out.input.corrosionAllowance).toBe(0);
  });

  it('returns a frozen record', () => {
    const out = normalizeInput(DEFAULT_JOINT_INPUT);
    if (out.ok) expect(Object.isFrozen(out.input)).toBe(true);
  });

  it('negative dimension → input_validation naming the field', () => {
    const out = normalizeInput({ ...DEFAULT_JOINT_INPUT, wallThicknessMain: -1 });
    expect(out.ok).toBe(false);
    if (!out.ok) {
      expect(out.failure.kind).toBe('input_validation');
      expect(out.failure.issues).toEqual([
        { field: 'wallThicknessMain', message: 'Main pipe wall thickness s must not be negative' },
      ]);
    }
  });

  it('negative pressure is rejected', () => {
    const out = normalizeInput({ ...DEFAULT_JOINT_INPUT, pressure: -0.1 });
    expect(out.ok).toBe(false);
    if (!out.ok) expect(out.failure.issues[0].field).toBe('pressure');
  });

  it('fractional hours are rejected', () => {
    const out = normalizeInput({ ...DEFAULT_JOINT_INPUT, plannedHours: 100.5 });
    expect(out.ok).toBe(false);
    if (!out.ok) {
      expect(out.failure.issues).toEqual([
        { field: 'plannedHours', message: 'Planned operating hours must be a whole number of hours' },
      ]);
    }
  });

  it('non-finite values are rejected', () => {
    const out = normalizeInput({ ...DEFAULT_JOINT_INPUT, temperature: Number.POSITIVE_INFINITY });
    expect(out.ok).toBe(false);
    if (!out.ok) expect(out.failure.issues[0].field).toBe('temperature');
  });

  it('a string where a number is expected is rejected', () => {
    const out = normalizeInput({ ...DEFAULT_JOINT_INPUT, outerDiameterBranch: '93' });
    expect(out.ok).toBe(false);
    if (!out.ok) {
      expect(out.failure.issues).toEqual([
        { field: 'outerDiameterBranch', message: 'Branch outer diameter d_a must be a number' },
      ]);
    }
  });

  it('collects every offending field', () => {
    const out = normalizeInput({ ...DEFAULT_JOINT_INPUT, pressure: -1, elapsedHours: -5 });
    expect(out.ok).toBe(false);
    if (!out.ok) {
      expect(out.failure.issues.map(i => i.field)).toEqual(['pressure', 'elapsedHours']);
      expect(out.failure.message).toBe(
        'Invalid input: Pressure p must not be negative; Elapsed operating hours must not be negative.',
      );
    }
  });

  it('non-object input → a single issue on the whole record', () => {
    const out = normalizeInput(null);
    expect(out.ok).toBe(false);
    if (!out.ok) expect(out.failure.issues[0].field).toBe('(input)');
  });
});
