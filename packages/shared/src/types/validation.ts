/**
 * Validation check vocabulary
 */

export const CHECK_SEVERITIES = {
  PASS: 'PASS',
  WARN: 'WARN',
  FAIL: 'FAIL',
} as const;

export type CheckSeverity = (typeof CHECK_SEVERITIES)[keyof typeof CHECK_SEVERITIES];

export const VALIDATION_MODES = {
  FULL: 'full',
  QUICK: 'quick',
  REPORT: 'report',
} as const;

export type ValidationMode = (typeof VALIDATION_MODES)[keyof typeof VALIDATION_MODES];

export interface CheckSummary {
  passed: number;
  warnings: number;
  failed: number;
  total: number;
}
