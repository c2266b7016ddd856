import { describe, it, expect } from 'vitest';
import { runEngine } from '../Engine';
import { buildStressTable } from '../modules/StressTableModule';
import { DEFAULT_ENGINE_CONFIG, DEFAULT_JOINT_INPUT } from '../schema/JointInputV1';
import { ENGINE_VERSION, DESIGN_CODE } from '../../contracts/versions';

describe('runEngine – reference joint', () => {
  const out = runEngine(DEFAULT_JOINT_INPUT);

  it('resolves [σ] at 545 °C / 269 142 h and runs all eight steps', () => {
    expect(out.ok).toBe(true);
    if (!out.ok) return;
    expect(out.result.totalHours).toBe(269142);
    expect(out.result.allowableStress).toBeCloseTo(56.23432, 9);
    expect(out.result.stubHeight).toBeCloseTo(Math.sqrt(1.25 * 71.5 * 21.5), 12);
    expect(out.result.reducedStress).toBeCloseTo(62.1126, 3);
    expect(out.result.verdict).toBe('fail');
  });

  it('attaches the presentation output', () => {
    if (!out.ok) throw new Error('expected ok');
    expect(out.engineOutput.meta).toEqual({
      engineVersion: ENGINE_VERSION,
      contractVersion: '1',
      designCode: DESIGN_CODE,
      material: '12Kh1MF',
    });
    expect(out.engineOutput.trace).toHaveLength(8);
    expect(out.engineOutput.verdict.status).toBe('fail');
  });

  it('is idempotent: two runs give identical records', () => {
    expect(runEngine(DEFAULT_JOINT_INPUT)).toEqual(runEngine(DEFAULT_JOINT_INPUT));
  });
});

describe('runEngine – failures', () => {
  it('invalid input stops before the table lookup', () => {
    const out = runEngine({ ...DEFAULT_JOINT_INPUT, outerDiameterMain: -325 });
    expect(out.ok).toBe(false);
    if (!out.ok) expect(out.failure.kind).toBe('input_validation');
  });

  it('20 °C with 400 000 h total → undeterminable stress, nothing else computed', () => {
    const out = runEngine({ ...DEFAULT_JOINT_INPUT, temperature: 20, elapsedHours: 350000, plannedHours: 50000 });
    expect(out.ok).toBe(false);
    if (!out.ok) {
      expect(out.failure).toEqual({
        kind: 'undeterminable_stress',
        message:
          'Allowable stress cannot be determined for T = 20 °C and 400000 h. ' +
          'Table covers 20–620 °C and 10000–400000 h, but not every combination.',
        temperature: 20,
        totalHours: 400000,
      });
    }
  });

  it('empty reference table → undeterminable stress', () => {
    const empty = buildStressTable({
      material: 'none',
      standard: 'none',
      temperatureAxis: [500],
      durationAxis: [100000],
      rows: [[null]],
    });
    const out = runEngine(DEFAULT_JOINT_INPUT, empty);
    expect(out.ok).toBe(false);
    if (!out.ok) {
      expect(out.failure.kind).toBe('undeterminable_stress');
      expect(out.failure.message).toContain('The reference table has no usable data.');
    }
  });

  it('thickness not above the corrosion allowance → domain precondition at step 2', () => {
    const out = runEngine({ ...DEFAULT_JOINT_INPUT, corrosionAllowance: 25 });
    expect(out.ok).toBe(false);
    if (!out.ok && out.failure.kind === 'domain_precondition') {
      expect(out.failure.step).toBe(2);
    } else {
      throw new Error('expected a domain precondition failure');
    }
  });
});

describe('runEngine – config and table injection', () => {
  it('uses the table passed in', () => {
    const flat = buildStressTable({
      material: 'flat',
      standard: 'test',
      temperatureAxis: [500, 600],
      durationAxis: [100000, 300000],
      rows: [
        [100, 100],
        [100, 100],
      ],
    });
    const out = runEngine(DEFAULT_JOINT_INPUT, flat);
    expect(out.ok).toBe(true);
    if (out.ok) {
      expect(out.result.allowableStress).toBeCloseTo(100, 12);
      expect(out.engineOutput.meta.material).toBe('flat');
    }
  });

  it('safety threshold from config drives the summary status', () => {
    const out = runEngine(
      { ...DEFAULT_JOINT_INPUT, pressure: 10 },
      undefined,
      { ...DEFAULT_ENGINE_CONFIG, safetyFactorThreshold: 1.5 },
    );
    expect(out.ok).toBe(true);
    if (out.ok) {
      const row = out.engineOutput.summary.find(r => r.id === 'safety_factor');
      expect(row?.status).toBe('insufficient');
      expect(out.result.verdict).toBe('pass');
    }
  });
});
