import type { ENGINE_VERSION, CONTRACT_VERSION, DESIGN_CODE } from './versions';

export interface JointMetaV1 {
  engineVersion: typeof ENGINE_VERSION;
  contractVersion: typeof CONTRACT_VERSION;
  designCode: typeof DESIGN_CODE;
  /** Steel grade of the reference table, e.g. "12Kh1MF". */
  material: string;
}

export type SummaryStatus = '-' | 'within limits' | 'exceeded' | 'adequate' | 'insufficient';

export interface SummaryRowV1 {
  id: 'allowable_stress' | 'reduced_stress' | 'reinforcement_factor' | 'safety_factor';
  label: string;
  /** Raw value for charts and comparisons. */
  value: number;
  /** Formatted value, fixed decimals. */
  formatted: string;
  status: SummaryStatus;
}

/** One derivation step with its substituted formula, for display. */
export interface TraceStepV1 {
  step: number;
  title: string;
  /** Symbol of the quantity, e.g. "h_s". */
  symbol: string;
  value: number;
  unit: string;
  /** Headline, e.g. "h_s = 43.84 mm". */
  headline: string;
  /** Formula lines with the input values substituted. */
  lines: string[];
}

export interface VerdictV1 {
  status: 'pass' | 'fail';
  headline: string;
  /** Comparison line, e.g. "σ = 62.11 MPa > [σ] = 56.23 MPa". */
  comparison: string;
}

export interface JointOutputV1 {
  meta: JointMetaV1;
  summary: SummaryRowV1[];
  trace: TraceStepV1[];
  verdict: VerdictV1;
  notes: string[];
}
