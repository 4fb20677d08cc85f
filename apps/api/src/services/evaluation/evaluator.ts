import {
  ActorColumn,
  VEHICLE_CHANNEL_SOURCES,
  VehicleColumn,
  findColumn,
  isMissing,
  toValidationResult,
} from '@simval/domain';
import type {
  ActorTypeCatalog,
  EvaluateRunRequest,
  EvaluatedActor,
  EvaluationResult,
  RunEvaluationPort,
  TabularTable,
  VehicleChannelName,
  VehicleChannels,
} from '@simval/domain';
import { getActorTypeCatalog } from '../../config/actor-types.js';
import { enumerateActors, loadActorTable } from '../actors/actor-normalizer.js';
import { loadVehicleTable } from '../vehicle/vehicle-normalizer.js';
import { validateActors, validateVehicle } from '../validation/format-validator.js';
import { extractChannel, extractRows, sanitizeNumber } from './sanitize.js';

const CHANNEL_DIGITS = 6;
const POSITION_DIGITS = 6;
const HEADING_DIGITS = 4;
const TIME_DIGITS = 4;

export function buildVehicleChannels(vehicle: TabularTable): VehicleChannels {
  const channel = (name: VehicleChannelName): number[] =>
    extractChannel(vehicle, VEHICLE_CHANNEL_SOURCES[name], CHANNEL_DIGITS);

  return {
    t: channel('t'),
    lat: channel('lat'),
    lng: channel('lng'),
    heading: channel('heading'),
    velMs: channel('velMs'),
    velKmh: channel('velKmh'),
    acclLat: channel('acclLat'),
    acclLng: channel('acclLng'),
    brakingLevel: channel('brakingLevel'),
    throttleLevel: channel('throttleLevel'),
    steeringPct: channel('steeringPct'),
    indLeft: channel('indLeft'),
    indRight: channel('indRight'),
    indHazard: channel('indHazard'),
    indReverse: channel('indReverse'),
    indBraking: channel('indBraking'),
  };
}

/**
 * Maps each vehicle step number to the relative time of its first row.
 * Later rows with the same step number do not override it.
 */
function stepTimeIndex(vehicle: TabularTable): Map<number | string, number> {
  const index = new Map<number | string, number>();
  const steps = findColumn(vehicle, VehicleColumn.StepNumber);
  const times = findColumn(vehicle, VehicleColumn.RelativeTime);
  if (!steps) return index;

  steps.values.forEach((step, row) => {
    if (isMissing(step) || index.has(step)) return;
    index.set(step, sanitizeNumber(times?.values[row], TIME_DIGITS));
  });
  return index;
}

export function buildActorTrajectories(
  actors: TabularTable,
  vehicle: TabularTable,
  catalog: ActorTypeCatalog,
): EvaluatedActor[] {
  const stepTimes = stepTimeIndex(vehicle);
  const steps = findColumn(actors, ActorColumn.StepNumber);

  return enumerateActors(actors).map(({ actorId, actorType, rows }) => ({
    actorId,
    actorType,
    actorTypeName: catalog.nameOf(actorType),
    trajectory: {
      lat: extractRows(actors, ActorColumn.Lat, rows, POSITION_DIGITS),
      lng: extractRows(actors, ActorColumn.Lng, rows, POSITION_DIGITS),
      heading: extractRows(actors, ActorColumn.Heading, rows, HEADING_DIGITS),
      t: rows.map((row) => {
        const step = steps?.values[row];
        return isMissing(step) ? 0 : stepTimes.get(step) ?? 0;
      }),
    },
  }));
}

/**
 * Validates one run and shapes it for the map view.
 *
 * A vehicle file that cannot be decoded or normalized fails the whole
 * evaluation (ParseError / SchemaError). An unusable actor file only drops
 * the actors: the run is evaluated vehicle-only and a warning says why.
 */
export async function evaluate(
  vehicleBytes: Buffer,
  actorBytes: Buffer | null,
  testCaseId: string,
  runId: string,
  catalog: ActorTypeCatalog = getActorTypeCatalog(),
): Promise<EvaluationResult> {
  const vehicle = await loadVehicleTable(vehicleBytes);
  const vehicleFindings = validateVehicle(vehicle);
  const errors = [...vehicleFindings.errors];
  const warnings = [...vehicleFindings.warnings];

  let actors: EvaluatedActor[] = [];
  if (actorBytes !== null) {
    try {
      const actorTable = await loadActorTable(actorBytes);
      const actorFindings = validateActors(actorTable);
      actors = buildActorTrajectories(actorTable, vehicle, catalog);
      errors.push(...actorFindings.errors);
      warnings.push(...actorFindings.warnings);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`[evaluator] ${testCaseId}/${runId}: actor data dropped (${reason})`);
      warnings.push(`Actor data could not be processed: ${reason}`);
    }
  }

  return {
    testCaseId,
    runId,
    validation: toValidationResult({ errors, warnings }),
    vehicle: buildVehicleChannels(vehicle),
    actors,
  };
}

export class RunEvaluationService implements RunEvaluationPort {
  constructor(private readonly catalog: ActorTypeCatalog = getActorTypeCatalog()) {}

  evaluate(request: EvaluateRunRequest): Promise<EvaluationResult> {
    return evaluate(
      request.vehicleBytes,
      request.actorBytes,
      request.testCaseId,
      request.runId,
      this.catalog,
    );
  }
}
