import type { EngineConfig, JointEngineResult } from './schema/JointInputV1';
import { DEFAULT_ENGINE_CONFIG } from './schema/JointInputV1';
import { normalizeInput } from './normalizer/Normalizer';
import { defaultStressTable } from './modules/StressTableModule';
import type { StressTable } from './modules/StressTableModule';
import { runJointStrengthModuleV1 } from './modules/JointStrengthModule';
import { buildJointOutputV1 } from './OutputBuilder';

/**
 * Run the full branch-joint check: validate → [σ] lookup → steps 2–8 → output.
 *
 * Pure and synchronous. Every failure comes back as `ok: false` with a tagged
 * failure; nothing is thrown for bad input or an unresolvable [σ].
 */
export function runEngine(
  rawInput: unknown,
  table: StressTable = defaultStressTable,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
): JointEngineResult {
  const normalized = normalizeInput(rawInput);
  if (!normalized.ok) return normalized;
  const { input } = normalized;

  // Step 1: [σ] at (T, elapsed + planned). The pipeline stops here when it cannot be resolved.
  const totalHours = input.elapsedHours + input.plannedHours;
  const allowableStress = table.query(input.temperature, totalHours);
  if (allowableStress === null) {
    const { temperatureRange, durationRange } = table.describe();
    const coverage = temperatureRange && durationRange
      ? ` Table covers ${temperatureRange[0]}–${temperatureRange[1]} °C and ` +
        `${durationRange[0]}–${durationRange[1]} h, but not every combination.`
      : ' The reference table has no usable data.';
    return {
      ok: false,
      failure: {
        kind: 'undeterminable_stress',
        message:
          `Allowable stress cannot be determined for T = ${input.temperature} °C ` +
          `and ${totalHours} h.${coverage}`,
        temperature: input.temperature,
        totalHours,
      },
    };
  }

  const outcome = runJointStrengthModuleV1(input, allowableStress, config);
  if (!outcome.ok) return outcome;

  const engineOutput = buildJointOutputV1(input, outcome.result, config, table.describe().material);
  return { ok: true, input, result: outcome.result, engineOutput };
}
