import { posix } from 'node:path';
import { JsZipArchiveReader } from '@simval/adapters';
import { compareRunIds, toValidationResult } from '@simval/domain';
import type {
  ArchiveReaderPort,
  BatchIndexingPort,
  BatchUploadSummary,
  RunStorePort,
  StoredRun,
  TabularTable,
  ValidationResult,
} from '@simval/domain';
import { enumerateActors, loadActorTable } from '../actors/actor-normalizer.js';
import { loadVehicleTable } from '../vehicle/vehicle-normalizer.js';
import { validateActors, validateVehicle } from '../validation/format-validator.js';

/** Run directories are named `<testCaseId>_r<n>`. */
const RUN_DIRECTORY = /^(.+)_(r\d+)$/;

const VEHICLE_FILE_NAMES = new Set(['VUT_status.xlsx', 'VUT_status.csv']);
const ACTOR_FILE_NAMES = new Set(['Environment_actors_true.xlsx', 'Environment_actors_true.csv']);

export interface IndexedArchive {
  runs: StoredRun[];
  summary: BatchUploadSummary;
}

/** Skips directories added by macOS archivers and AppleDouble `._` files. */
function isRealFile(path: string, allowed: ReadonlySet<string>): boolean {
  const name = posix.basename(path);
  return allowed.has(name) && !path.includes('__MACOSX') && !name.startsWith('._');
}

function parentDirectory(path: string): string {
  return posix.basename(posix.dirname(path));
}

/** Actor table with at least one actor, or null: header-only and unreadable files count as absent. */
async function readActorTable(bytes: Buffer, label: string): Promise<TabularTable | null> {
  try {
    const table = await loadActorTable(bytes);
    return enumerateActors(table).length > 0 ? table : null;
  } catch (err) {
    console.warn(
      `[batch] ${label}: actor file ignored (${err instanceof Error ? err.message : String(err)})`,
    );
    return null;
  }
}

async function validateRun(vehicleBytes: Buffer, actors: TabularTable | null): Promise<ValidationResult> {
  const errors: string[] = [];
  const warnings: string[] = [];
  try {
    const vehicle = await loadVehicleTable(vehicleBytes);
    const vehicleFindings = validateVehicle(vehicle);
    errors.push(...vehicleFindings.errors);
    warnings.push(...vehicleFindings.warnings);
    if (actors) {
      const actorFindings = validateActors(actors);
      errors.push(...actorFindings.errors);
      warnings.push(...actorFindings.warnings);
    }
  } catch (err) {
    errors.push(`Failed to parse file: ${err instanceof Error ? err.message : String(err)}`);
  }
  return toValidationResult({ errors, warnings });
}

function summarize(runsByTestCase: Map<string, Map<string, StoredRun>>): BatchUploadSummary {
  const validationDetails: Record<string, Record<string, ValidationResult>> = {};
  let validRuns = 0;
  let invalidRuns = 0;

  for (const [testCaseId, byRun] of runsByTestCase) {
    const details: Record<string, ValidationResult> = {};
    for (const run of [...byRun.values()].sort((a, b) => compareRunIds(a.runId, b.runId))) {
      details[run.runId] = run.validation;
      if (run.validation.valid) validRuns += 1;
      else invalidRuns += 1;
    }
    validationDetails[testCaseId] = details;
  }

  const runCount = validRuns + invalidRuns;
  return {
    overallValid: invalidRuns === 0 && runCount > 0,
    validRuns,
    invalidRuns,
    testCaseCount: runsByTestCase.size,
    runCount,
    testCases: [...runsByTestCase.keys()],
    validationDetails,
  };
}

/**
 * Reads every run out of an uploaded archive and validates it.
 *
 * Expected layout:
 *   M2-CL4-S-TST-05-02_r0/VUT_status.xlsx
 *   M2-CL4-S-TST-05-02_r0/Environment_actors_true.xlsx   (optional)
 */
export async function indexArchive(
  archive: Buffer,
  reader: ArchiveReaderPort = new JsZipArchiveReader(),
): Promise<IndexedArchive> {
  const entries = await reader.open(archive);

  const actorFiles = new Map<string, Buffer>();
  for (const entry of entries) {
    if (isRealFile(entry.path, ACTOR_FILE_NAMES)) {
      actorFiles.set(parentDirectory(entry.path), await entry.read());
    }
  }

  const runsByTestCase = new Map<string, Map<string, StoredRun>>();
  for (const entry of entries) {
    if (!isRealFile(entry.path, VEHICLE_FILE_NAMES)) continue;
    const directory = parentDirectory(entry.path);
    const match = RUN_DIRECTORY.exec(directory);
    if (!match) continue;
    const [, testCaseId = directory, runId = ''] = match;

    const vehicleBytes = await entry.read();
    const rawActorBytes = actorFiles.get(directory) ?? null;
    const actors = rawActorBytes ? await readActorTable(rawActorBytes, directory) : null;

    const run: StoredRun = {
      testCaseId,
      runId,
      vehicleBytes,
      actorBytes: actors ? rawActorBytes : null,
      validation: await validateRun(vehicleBytes, actors),
    };

    const byRun = runsByTestCase.get(testCaseId) ?? new Map<string, StoredRun>();
    byRun.set(runId, run);
    runsByTestCase.set(testCaseId, byRun);
  }

  const runs = [...runsByTestCase.values()].flatMap((byRun) => [...byRun.values()]);
  return { runs, summary: summarize(runsByTestCase) };
}

export class BatchIndexService implements BatchIndexingPort {
  constructor(
    private readonly store: RunStorePort,
    private readonly reader: ArchiveReaderPort = new JsZipArchiveReader(),
  ) {}

  /** Replaces the store's content with the runs of `archive`; a failed upload leaves it empty. */
  async upload(archive: Buffer): Promise<BatchUploadSummary> {
    await this.store.clear();
    const { runs, summary } = await indexArchive(archive, this.reader);
    await this.store.replaceAll(runs);
    console.log(
      `[batch] indexed ${summary.runCount} run(s) across ${summary.testCaseCount} test case(s), ${summary.invalidRuns} invalid`,
    );
    return summary;
  }
}
