import type { StoredRun, TestCaseSummary } from '../../entities/stored-run.js';

/**
 * Process-lifetime store of uploaded runs. Implementations serialize access:
 * readers never observe a half-applied `replaceAll`.
 */
export interface RunStorePort {
  replaceAll(runs: readonly StoredRun[]): Promise<void>;
  clear(): Promise<void>;
  listTestCases(): Promise<TestCaseSummary[]>;
  /** `null` when the test case is unknown. Runs come back in run-number order. */
  listRuns(testCaseId: string): Promise<StoredRun[] | null>;
  findRun(testCaseId: string, runId: string): Promise<StoredRun | null>;
}
