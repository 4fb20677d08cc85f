import { compareRunIds } from '@simval/domain';
import type { RunStorePort, StoredRun, TestCaseSummary } from '@simval/domain';

type RunsByTestCase = Map<string, Map<string, StoredRun>>;

/**
 * In-memory run store. Every operation goes through a promise queue, so a
 * `replaceAll` is never interleaved with a read or with another write.
 */
export class InMemoryRunStore implements RunStorePort {
  private runs: RunsByTestCase = new Map();
  private queue: Promise<unknown> = Promise.resolve();

  private exclusive<T>(operation: () => T): Promise<T> {
    const result = this.queue.then(operation);
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  replaceAll(runs: readonly StoredRun[]): Promise<void> {
    return this.exclusive(() => {
      const next: RunsByTestCase = new Map();
      for (const run of runs) {
        const byRun = next.get(run.testCaseId) ?? new Map<string, StoredRun>();
        byRun.set(run.runId, run);
        next.set(run.testCaseId, byRun);
      }
      this.runs = next;
    });
  }

  clear(): Promise<void> {
    return this.exclusive(() => {
      this.runs = new Map();
    });
  }

  listTestCases(): Promise<TestCaseSummary[]> {
    return this.exclusive(() =>
      [...this.runs.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([id, byRun]) => ({
          id,
          hasActors: [...byRun.values()].some((run) => run.actorBytes !== null),
        })),
    );
  }

  listRuns(testCaseId: string): Promise<StoredRun[] | null> {
    return this.exclusive(() => {
      const byRun = this.runs.get(testCaseId);
      if (!byRun) return null;
      return [...byRun.values()].sort((a, b) => compareRunIds(a.runId, b.runId));
    });
  }

  findRun(testCaseId: string, runId: string): Promise<StoredRun | null> {
    return this.exclusive(() => this.runs.get(testCaseId)?.get(runId) ?? null);
  }
}
