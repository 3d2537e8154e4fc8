/**
 * Validation rules
 */

export type { ValidatorOptions } from "./validator";
export { MAX_REASONABLE_SAMPLES, overallStatus, SegyValidator, withChecks } from "./validator";
