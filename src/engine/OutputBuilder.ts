import type { CalculationResult, EngineConfig, JointInputV1 } from './schema/JointInputV1';
import type { JointOutputV1, SummaryRowV1, TraceStepV1, VerdictV1 } from '../contracts/JointOutputV1';
import { ENGINE_VERSION, CONTRACT_VERSION, DESIGN_CODE } from '../contracts/versions';

function buildSummary(result: CalculationResult, config: EngineConfig): SummaryRowV1[] {
  const withinLimits = result.reducedStress <= result.allowableStress;
  return [
    {
      id: 'allowable_stress',
      label: 'Allowable stress [σ], MPa',
      value: result.allowableStress,
      formatted: result.allowableStress.toFixed(2),
      status: '-',
    },
    {
      id: 'reduced_stress',
      label: 'Reduced stress σ, MPa',
      value: result.reducedStress,
      formatted: result.reducedStress.toFixed(2),
      status: withinLimits ? 'within limits' : 'exceeded',
    },
    {
      id: 'reinforcement_factor',
      label: 'Strength factor φ_oc',
      value: result.reinforcedStrengthFactor,
      formatted: result.reinforcedStrengthFactor.toFixed(3),
      status: '-',
    },
    {
      id: 'safety_factor',
      label: 'Safety factor',
      value: result.safetyFactor,
      formatted: result.safetyFactor.toFixed(2),
      status: result.safetyFactor >= config.safetyFactorThreshold ? 'adequate' : 'insufficient',
    },
  ];
}

function buildTrace(input: JointInputV1, r: CalculationResult): TraceStepV1[] {
  const {
    outerDiameterMain: D_a,
    wallThicknessMain: s,
    outerDiameterBranch: d_a,
    wallThicknessBranch: s_s,
    pressure: p,
    temperature: T,
    corrosionAllowance: c,
  } = input;

  return [
    {
      step: 1,
      title: 'Allowable stress',
      symbol: '[σ]',
      value: r.allowableStress,
      unit: 'MPa',
      headline: `[σ] = ${r.allowableStress.toFixed(2)} MPa`,
      lines: [`At T = ${T} °C and total operating time ${r.totalHours.toFixed(0)} h`],
    },
    {
      step: 2,
      title: 'Constructive branch height',
      symbol: 'h_s',
      value: r.stubHeight,
      unit: 'mm',
      headline: `h_s = ${r.stubHeight.toFixed(2)} mm`,
      lines: [
        `h_s = √[1.25 * (${d_a} - ${s_s}) * (${s_s} - ${c})] = √[1.25 * ${(d_a - s_s).toFixed(1)} * ${(s_s - c).toFixed(1)}]`,
      ],
    },
    {
      step: 3,
      title: 'Minimum branch wall thickness',
      symbol: 's_os',
      value: r.minBranchThickness,
      unit: 'mm',
      headline: `s_os = ${r.minBranchThickness.toFixed(2)} mm`,
      lines: [
        `s_os = (${p} * ${d_a}) / (2 * ${r.allowableStress.toFixed(1)} * ${r.phiTemp} + ${p})`,
        `φ = ${r.phiTemp} taken as a first approximation`,
      ],
    },
    {
      step: 4,
      title: 'Compensating reinforcement area',
      symbol: 'f_s',
      value: r.reinforcementArea,
      unit: 'mm²',
      headline: `f_s = ${r.reinforcementArea.toFixed(2)} mm²`,
      lines: [`f_s = 2 * ${r.stubHeight.toFixed(2)} * ((${s_s} - ${c}) - ${r.minBranchThickness.toFixed(2)})`],
    },
    {
      step: 5,
      title: 'Strength factor, unreinforced opening',
      symbol: 'φ_od',
      value: r.unreinforcedStrengthFactor,
      unit: '',
      headline: `φ_od = ${r.unreinforcedStrengthFactor.toFixed(3)}`,
      lines: [
        `z = ${d_a} / √(${r.meanDiameterMain.toFixed(1)} * (${s} - ${c})) = ${r.openingParameter.toFixed(3)}`,
        `D_m = ${D_a} - ${s} = ${r.meanDiameterMain.toFixed(1)} mm`,
      ],
    },
    {
      step: 6,
      title: 'Strength factor, reinforced opening',
      symbol: 'φ_oc',
      value: r.reinforcedStrengthFactor,
      unit: '',
      headline: `φ_oc = ${r.reinforcedStrengthFactor.toFixed(3)}`,
      lines: [
        `φ_oc = ${r.unreinforcedStrengthFactor.toFixed(3)} * [1 + ${r.reinforcementArea.toFixed(1)} / ` +
        `(2 * (${s} - ${c}) * √(${r.meanDiameterMain.toFixed(1)} * (${s} - ${c})))]`,
      ],
    },
    {
      step: 7,
      title: 'Reduced stress',
      symbol: 'σ',
      value: r.reducedStress,
      unit: 'MPa',
      headline: `σ = ${r.reducedStress.toFixed(2)} MPa`,
      lines: [`σ = ${p} * [${D_a} - (${s} - ${c})] / (2 * ${r.reinforcedStrengthFactor.toFixed(3)} * (${s} - ${c}))`],
    },
    {
      step: 8,
      title: 'Safety factor',
      symbol: 'n',
      value: r.safetyFactor,
      unit: '',
      headline: `Safety factor = ${r.safetyFactor.toFixed(2)}`,
      lines: r.reducedStress !== 0
        ? [`n = [σ] / σ = ${r.allowableStress.toFixed(2)} / ${r.reducedStress.toFixed(2)}`]
        : ['σ = 0, safety factor taken as 0'],
    },
  ];
}

function buildVerdict(r: CalculationResult): VerdictV1 {
  const sigma = r.reducedStress.toFixed(2);
  const allowable = r.allowableStress.toFixed(2);
  if (r.verdict === 'pass') {
    return {
      status: 'pass',
      headline: 'Strength condition is satisfied',
      comparison: `σ = ${sigma} MPa ≤ [σ] = ${allowable} MPa`,
    };
  }
  return {
    status: 'fail',
    headline: 'Strength condition is NOT satisfied',
    comparison: `σ = ${sigma} MPa > [σ] = ${allowable} MPa`,
  };
}

export function buildJointOutputV1(
  input: JointInputV1,
  result: CalculationResult,
  config: EngineConfig,
  material: string,
): JointOutputV1 {
  return {
    meta: {
      engineVersion: ENGINE_VERSION,
      contractVersion: CONTRACT_VERSION,
      designCode: DESIGN_CODE,
      material,
    },
    summary: buildSummary(result, config),
    trace: buildTrace(input, result),
    verdict: buildVerdict(result),
    notes: [...result.notes],
  };
}
