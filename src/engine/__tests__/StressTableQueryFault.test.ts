import { describe, it, expect, vi } from 'vitest';

vi.mock('../utils/triangulation', async importOriginal => {
  const actual = await importOriginal<typeof import('../utils/triangulation')>();
  return {
    ...actual,
    interpolateLinear: vi.fn(() => {
      throw new Error('interpolation fault');
    }),
  };
});

import { defaultStressTable } from '../modules/StressTableModule';
import { runEngine } from '../Engine';
import { DEFAULT_JOINT_INPUT } from '../schema/JointInputV1';

describe('StressTable.query – internal faults', () => {
  it('a plain Error raised during interpolation becomes null', () => {
    expect(defaultStressTable.query(545, 269142)).toBeNull();
  });

  it('the engine reports the fault as undeterminable stress', () => {
    const out = runEngine(DEFAULT_JOINT_INPUT);
    expect(out.ok).toBe(false);
    if (out.ok) return;
    expect(out.failure.kind).toBe('undeterminable_stress');
  });
});
