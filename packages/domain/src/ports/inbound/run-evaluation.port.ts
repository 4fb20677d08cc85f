import type { EvaluationResult } from '../../entities/evaluation-result.js';
import type { BatchUploadSummary } from '../../entities/stored-run.js';

export interface EvaluateRunRequest {
  vehicleBytes: Buffer;
  actorBytes: Buffer | null;
  testCaseId: string;
  runId: string;
}

export interface RunEvaluationPort {
  /** Fails with ParseError / SchemaError when the vehicle file is unusable. */
  evaluate(request: EvaluateRunRequest): Promise<EvaluationResult>;
}

export interface BatchIndexingPort {
  /** Fails with ParseError when the archive cannot be opened. */
  upload(archive: Buffer): Promise<BatchUploadSummary>;
}
