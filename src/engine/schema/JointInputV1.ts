/**
 * JointInputV1 – input record and result types for the branch-joint
 * strength check.
 *
 * Linear dimensions are in mm, pressure and stress in MPa, temperature in °C,
 * service life in hours.
 */

import { z } from 'zod';
import type { FAILURE_IDS } from '../../contracts/failure.ids';
import type { JointOutputV1 } from '../../contracts/JointOutputV1';

// ─── Input ────────────────────────────────────────────────────────────────────

export interface JointInputV1 {
  /** D_a – outer diameter of the main pipe (header). */
  outerDiameterMain: number;
  /** s – wall thickness of the main pipe. */
  wallThicknessMain: number;
  /** d_a – outer diameter of the branch (stub). */
  outerDiameterBranch: number;
  /** s_s – wall thickness of the branch. */
  wallThicknessBranch: number;
  /** p – internal pressure. */
  pressure: number;
  /** T – design temperature. */
  temperature: number;
  /** Operating hours accumulated at the time of inspection. */
  elapsedHours: number;
  /** Further operating hours planned. */
  plannedHours: number;
  /** c – corrosion allowance. */
  corrosionAllowance: number;
}

/** Input as the shell may supply it; corrosion allowance defaults to 0. */
export type JointInputRaw = Omit<JointInputV1, 'corrosionAllowance'> & {
  corrosionAllowance?: number;
};

function length(label: string) {
  return z
    .number({ required_error: `${label} is required`, invalid_type_error: `${label} must be a number` })
    .finite(`${label} must be finite`)
    .nonnegative(`${label} must not be negative`);
}

function hours(label: string) {
  return length(label).int(`${label} must be a whole number of hours`);
}

export const JointInputSchema = z.object({
  outerDiameterMain: length('Main pipe outer diameter D_a'),
  wallThicknessMain: length('Main pipe wall thickness s'),
  outerDiameterBranch: length('Branch outer diameter d_a'),
  wallThicknessBranch: length('Branch wall thickness s_s'),
  pressure: length('Pressure p'),
  temperature: length('Temperature T'),
  elapsedHours: hours('Elapsed operating hours'),
  plannedHours: hours('Planned operating hours'),
  corrosionAllowance: length('Corrosion allowance c').default(0),
});

/** Initial values offered by the input form. */
export const DEFAULT_JOINT_INPUT: JointInputV1 = {
  outerDiameterMain: 325,
  wallThicknessMain: 38,
  outerDiameterBranch: 93,
  wallThicknessBranch: 21.5,
  pressure: 14,
  temperature: 545,
  elapsedHours: 219142,
  plannedHours: 50000,
  corrosionAllowance: 0,
};

// ─── Configuration ────────────────────────────────────────────────────────────

export interface EngineConfig {
  /**
   * Strength-reduction factor used for the minimum branch thickness (step 3).
   * First approximation; not refined against φ_oc.
   */
  phiTemp: number;
  /** Safety factor at or above which the summary reports "adequate". */
  safetyFactorThreshold: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  phiTemp: 1.0,
  safetyFactorThreshold: 1.0,
};

// ─── Calculation result ───────────────────────────────────────────────────────

export type StrengthVerdict = 'pass' | 'fail';

export interface CalculationResult {
  /** Elapsed + planned hours; the duration key for the stress lookup. */
  totalHours: number;
  /** [σ] – allowable stress interpolated from the reference table (MPa). */
  allowableStress: number;
  /** h_s – constructive branch height (mm). */
  stubHeight: number;
  /** φ used in step 3. */
  phiTemp: number;
  /** s_os – minimum required branch wall thickness (mm). */
  minBranchThickness: number;
  /** f_s – compensating reinforcement area (mm²); negative when the branch wall is too thin. */
  reinforcementArea: number;
  /** D_m – mean diameter of the main pipe (mm). */
  meanDiameterMain: number;
  /** z – opening parameter d_a / √(D_m (s − c)). */
  openingParameter: number;
  /** φ_od – strength factor of the unreinforced opening. */
  unreinforcedStrengthFactor: number;
  /** φ_oc – strength factor of the reinforced opening. */
  reinforcedStrengthFactor: number;
  /** σ – reduced stress at the opening (MPa). */
  reducedStress: number;
  /** [σ] / σ, or 0 when σ is 0. */
  safetyFactor: number;
  verdict: StrengthVerdict;
  /** Diagnostic notes (never verdicts). */
  notes: string[];
}

// ─── Failures ─────────────────────────────────────────────────────────────────

export interface InputIssue {
  field: string;
  message: string;
}

export interface InputValidationFailure {
  kind: typeof FAILURE_IDS.INPUT_VALIDATION;
  message: string;
  issues: InputIssue[];
}

export interface UndeterminableStressFailure {
  kind: typeof FAILURE_IDS.UNDETERMINABLE_STRESS;
  message: string;
  temperature: number;
  totalHours: number;
}

export interface DomainPreconditionFailure {
  kind: typeof FAILURE_IDS.DOMAIN_PRECONDITION;
  message: string;
  /** Derivation step (1–8) whose formula left its valid domain. */
  step: number;
}

export type EngineFailure =
  | InputValidationFailure
  | UndeterminableStressFailure
  | DomainPreconditionFailure;

// ─── Engine result ────────────────────────────────────────────────────────────

export type JointEngineResult =
  | { ok: true; input: JointInputV1; result: CalculationResult; engineOutput: JointOutputV1 }
  | { ok: false; failure: EngineFailure };
