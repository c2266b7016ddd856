import type { InputValidationFailure, JointInputV1 } from '../schema/JointInputV1';
import { JointInputSchema } from '../schema/JointInputV1';

export type NormalizerOutput =
  | { ok: true; input: JointInputV1 }
  | { ok: false; failure: InputValidationFailure };

/**
 * Validate a raw input record at the boundary, before any step runs.
 * Every field must be a finite, non-negative number; hours must be whole.
 * A missing corrosion allowance becomes 0.
 */
export function normalizeInput(raw: unknown): NormalizerOutput {
  const parsed = JointInputSchema.safeParse(raw);
  if (parsed.success) {
    return { ok: true, input: Object.freeze({ ...parsed.data }) };
  }

  const issues = parsed.error.issues.map(issue => ({
    field: issue.path.length > 0 ? issue.path.join('.') : '(input)',
    message: issue.message,
  }));
  return {
    ok: false,
    failure: {
      kind: 'input_validation',
      message: `Invalid input: ${issues.map(i => i.message).join('; ')}.`,
      issues,
    },
  };
}
