export const FAILURE_IDS = {
  INPUT_VALIDATION: 'input_validation',
  UNDETERMINABLE_STRESS: 'undeterminable_stress',
  DOMAIN_PRECONDITION: 'domain_precondition',
} as const;

export type FailureId = typeof FAILURE_IDS[keyof typeof FAILURE_IDS];
