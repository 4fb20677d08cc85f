import type { ValidationResult } from './validation-result.js';

/** Raw bytes of one simulation run, validated when it was uploaded. */
export interface StoredRun {
  readonly testCaseId: string;
  readonly runId: string;
  readonly vehicleBytes: Buffer;
  readonly actorBytes: Buffer | null;
  readonly validation: ValidationResult;
}

export interface TestCaseSummary {
  readonly id: string;
  readonly hasActors: boolean;
}

export interface RunSummary {
  readonly id: string;
  readonly hasActors: boolean;
  readonly validation: ValidationResult;
}

export interface BatchUploadSummary {
  readonly overallValid: boolean;
  readonly validRuns: number;
  readonly invalidRuns: number;
  readonly testCaseCount: number;
  readonly runCount: number;
  readonly testCases: string[];
  readonly validationDetails: Record<string, Record<string, ValidationResult>>;
}

/** Numeric part of a run id (`r12` → 12), used to order runs. */
export function runOrdinal(runId: string): number {
  const digits = runId.replace(/\D/g, '');
  return digits ? Number.parseInt(digits, 10) : 0;
}

export function compareRunIds(a: string, b: string): number {
  return runOrdinal(a) - runOrdinal(b) || a.localeCompare(b);
}
