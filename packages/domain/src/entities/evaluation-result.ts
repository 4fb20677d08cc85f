import type { ValidationResult } from './validation-result.js';
import type { VehicleChannels } from './vehicle-record.js';
import type { EvaluatedActor } from './actor-record.js';

export interface EvaluationResult {
  readonly testCaseId: string;
  readonly runId: string;
  readonly validation: ValidationResult;
  readonly vehicle: VehicleChannels;
  readonly actors: EvaluatedActor[];
}
