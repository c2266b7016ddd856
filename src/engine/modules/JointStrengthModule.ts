/**
 * JointStrengthModule
 *
 * Strength check of a welded branch (stub) in a header under internal
 * pressure, RD 10-249-98. Eight strictly sequential steps; each step consumes
 * the previous one's output:
 *
 *   1. [σ]   – allowable stress at (T, elapsed + planned hours)  (supplied)
 *   2. h_s   = √(1.25 (d_a − s_s)(s_s − c))
 *   3. s_os  = p d_a / (2 [σ] φ + p),  φ = 1.0 (first approximation)
 *   4. f_s   = 2 h_s ((s_s − c) − s_os)         (may be negative, never clamped)
 *   5. φ_od  = 2 / (z + 1.75),  z = d_a / √(D_m (s − c)),  D_m = D_a − s
 *   6. φ_oc  = φ_od (1 + f_s / (2 (s − c) √(D_m (s − c))))
 *   7. σ     = p (D_a − (s − c)) / (2 φ_oc (s − c))
 *   8. [σ]/σ and verdict σ ≤ [σ]
 *
 * Hard rule: undefined arithmetic is never patched with a physical default.
 * It is reported as a domain-precondition failure naming the step. The only
 * fallbacks are the degenerate cases in steps 5, 6 and 8.
 */

import type {
  CalculationResult,
  DomainPreconditionFailure,
  EngineConfig,
  JointInputV1,
} from '../schema/JointInputV1';
import { DEFAULT_ENGINE_CONFIG } from '../schema/JointInputV1';

/** Constructive height coefficient in step 2. */
const STUB_HEIGHT_COEFFICIENT = 1.25;
/** Additive constant in the unreinforced strength factor (step 5). */
const OPENING_FACTOR_OFFSET = 1.75;

export type JointStrengthOutcome =
  | { ok: true; result: CalculationResult }
  | { ok: false; failure: DomainPreconditionFailure };

function domainFailure(step: number, message: string): JointStrengthOutcome {
  return {
    ok: false,
    failure: { kind: 'domain_precondition', step, message: `Step ${step}: ${message}` },
  };
}

/** h_s – constructive branch dimension (step 2). */
export function stubHeight(d_a: number, s_s: number, c: number): number {
  return Math.sqrt(STUB_HEIGHT_COEFFICIENT * (d_a - s_s) * (s_s - c));
}

/** φ_od – unreinforced-opening strength factor from z (step 5). */
export function unreinforcedStrengthFactor(z: number): number {
  return z + OPENING_FACTOR_OFFSET !== 0 ? 2 / (z + OPENING_FACTOR_OFFSET) : 0;
}

/**
 * Run steps 2–8 against an allowable stress already resolved in step 1.
 *
 * @param input            Validated joint input.
 * @param allowableStress  [σ] from the stress table (MPa); must be positive.
 * @param config           φ for step 3.
 */
export function runJointStrengthModuleV1(
  input: JointInputV1,
  allowableStress: number,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
): JointStrengthOutcome {
  const {
    outerDiameterMain: D_a,
    wallThicknessMain: s,
    outerDiameterBranch: d_a,
    wallThicknessBranch: s_s,
    pressure: p,
    corrosionAllowance: c,
  } = input;
  const notes: string[] = [];

  // ── Step 1 ────────────────────────────────────────────────────────────────
  const totalHours = input.elapsedHours + input.plannedHours;
  if (!Number.isFinite(allowableStress) || allowableStress <= 0) {
    return domainFailure(1, `allowable stress must be a positive number (got ${allowableStress}).`);
  }

  // ── Step 2: h_s ───────────────────────────────────────────────────────────
  if (!(s_s > c)) {
    return domainFailure(2, `branch wall thickness s_s = ${s_s} mm must exceed corrosion allowance c = ${c} mm.`);
  }
  if (!(d_a > s_s)) {
    return domainFailure(2, `branch outer diameter d_a = ${d_a} mm must exceed its wall thickness s_s = ${s_s} mm.`);
  }
  const h_s = stubHeight(d_a, s_s, c);

  // ── Step 3: s_os ──────────────────────────────────────────────────────────
  const phiTemp = config.phiTemp;
  const thicknessDenominator = 2 * allowableStress * phiTemp + p;
  if (thicknessDenominator === 0) {
    return domainFailure(3, 'denominator 2 [σ] φ + p is zero.');
  }
  const s_os = (p * d_a) / thicknessDenominator;
  if (!Number.isFinite(s_os)) {
    return domainFailure(3, 'minimum branch thickness is not finite.');
  }

  // ── Step 4: f_s ───────────────────────────────────────────────────────────
  const f_s = 2 * h_s * ((s_s - c) - s_os);
  if (f_s < 0) {
    notes.push(
      `Branch wall (s_s − c = ${(s_s - c).toFixed(2)} mm) is thinner than the required ` +
      `s_os = ${s_os.toFixed(2)} mm; reinforcement area is negative.`,
    );
  }

  // ── Step 5: φ_od ──────────────────────────────────────────────────────────
  if (!(s > c)) {
    return domainFailure(5, `main pipe wall thickness s = ${s} mm must exceed corrosion allowance c = ${c} mm.`);
  }
  const D_m = D_a - s;
  if (!(D_m > 0)) {
    return domainFailure(5, `mean diameter D_m = D_a − s = ${D_m} mm must be positive.`);
  }
  const netWall = s - c;
  const z = d_a / Math.sqrt(D_m * netWall);
  const phi_od = unreinforcedStrengthFactor(z);

  // ── Step 6: φ_oc ──────────────────────────────────────────────────────────
  const reinforcementDenominator = 2 * netWall * Math.sqrt(D_m * netWall);
  const phi_oc = reinforcementDenominator !== 0
    ? phi_od * (1 + f_s / reinforcementDenominator)
    : phi_od;

  // ── Step 7: σ ─────────────────────────────────────────────────────────────
  if (!(phi_oc > 0)) {
    return domainFailure(
      7,
      `reinforced strength factor φ_oc = ${phi_oc.toFixed(3)} must be positive; the branch cannot carry the opening.`,
    );
  }
  const sigma = (p * (D_a - netWall)) / (2 * phi_oc * netWall);
  if (!Number.isFinite(sigma)) {
    return domainFailure(7, 'reduced stress is not finite.');
  }

  // ── Step 8: verdict ───────────────────────────────────────────────────────
  const safetyFactor = sigma !== 0 ? allowableStress / sigma : 0;
  const verdict = sigma <= allowableStress ? 'pass' : 'fail';
  if (sigma === 0) {
    notes.push('Reduced stress is zero (no pressure); safety factor reported as 0.');
  }

  const result: CalculationResult = {
    totalHours,
    allowableStress,
    stubHeight: h_s,
    phiTemp,
    minBranchThickness: s_os,
    reinforcementArea: f_s,
    meanDiameterMain: D_m,
    openingParameter: z,
    unreinforcedStrengthFactor: phi_od,
    reinforcedStrengthFactor: phi_oc,
    reducedStress: sigma,
    safetyFactor,
    verdict,
    notes,
  };
  return { ok: true, result: Object.freeze(result) };
}
