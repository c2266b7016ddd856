export const ENGINE_VERSION = '1.0.0' as const;
export const CONTRACT_VERSION = '1' as const;
/** Strength code the formulas and reference table are taken from. */
export const DESIGN_CODE = 'RD 10-249-98' as const;
