import { describe, it, expect, beforeEach } from '@jest/globals';
import type { StoredRun } from '@simval/domain';

import { InMemoryRunStore } from '../index.js';

function makeRun(overrides: Partial<StoredRun> = {}): StoredRun {
  return {
    testCaseId: 'TC-A',
    runId: 'r0',
    vehicleBytes: Buffer.from('Time\n0\n'),
    actorBytes: null,
    validation: { valid: true, errors: [], warnings: [] },
    ...overrides,
  };
}

describe('InMemoryRunStore', () => {
  let store: InMemoryRunStore;

  beforeEach(() => {
    store = new InMemoryRunStore();
  });

  it('starts empty', async () => {
    expect(await store.listTestCases()).toEqual([]);
    expect(await store.listRuns('TC-A')).toBeNull();
    expect(await store.findRun('TC-A', 'r0')).toBeNull();
  });

  it('lists test cases sorted by id with actor availability', async () => {
    await store.replaceAll([
      makeRun({ testCaseId: 'TC-B', runId: 'r0' }),
      makeRun({ testCaseId: 'TC-A', runId: 'r0' }),
      makeRun({ testCaseId: 'TC-A', runId: 'r1', actorBytes: Buffer.from('Actor_Id\n1\n') }),
    ]);
    expect(await store.listTestCases()).toEqual([
      { id: 'TC-A', hasActors: true },
      { id: 'TC-B', hasActors: false },
    ]);
  });

  it('lists runs in run-number order', async () => {
    await store.replaceAll([
      makeRun({ runId: 'r10' }),
      makeRun({ runId: 'r2' }),
      makeRun({ runId: 'r1' }),
    ]);
    const runs = await store.listRuns('TC-A');
    expect(runs?.map((run) => run.runId)).toEqual(['r1', 'r2', 'r10']);
  });

  it('finds a single run', async () => {
    const run = makeRun({ runId: 'r3' });
    await store.replaceAll([run]);
    expect(await store.findRun('TC-A', 'r3')).toBe(run);
    expect(await store.findRun('TC-A', 'r4')).toBeNull();
  });

  it('replaces previous content on every replaceAll', async () => {
    await store.replaceAll([makeRun({ testCaseId: 'OLD' })]);
    await store.replaceAll([makeRun({ testCaseId: 'NEW' })]);
    expect((await store.listTestCases()).map((tc) => tc.id)).toEqual(['NEW']);
  });

  it('clears everything', async () => {
    await store.replaceAll([makeRun()]);
    await store.clear();
    expect(await store.listTestCases()).toEqual([]);
  });

  it('applies concurrent operations in call order', async () => {
    const first = store.replaceAll([makeRun({ testCaseId: 'FIRST' })]);
    const read = store.listTestCases();
    const second = store.replaceAll([makeRun({ testCaseId: 'SECOND' })]);
    const cleared = store.clear();
    const last = store.listTestCases();

    await Promise.all([first, second, cleared]);
    expect((await read).map((tc) => tc.id)).toEqual(['FIRST']);
    expect(await last).toEqual([]);
  });
});
