/** Column names of an Environment_actors_true file. */
export const ActorColumn = {
  Time: 'Time',
  StepNumber: 'Step_number',
  ActorId: 'Actor_Id',
  ActorType: 'Actor_type',
  Lat: 'Actor_pos_true_lat',
  Lng: 'Actor_pos_true_lng',
  Heading: 'Actor_heading_true',
  VelAbs: 'Actor_vel_abs',
  VelLat: 'Actor_vel_lat',
  VelLng: 'Actor_vel_lng',
} as const;

export type ActorColumnName = (typeof ActorColumn)[keyof typeof ActorColumn];

export const ACTOR_REQUIRED_COLUMNS: readonly ActorColumnName[] = [
  ActorColumn.Time,
  ActorColumn.StepNumber,
  ActorColumn.ActorId,
  ActorColumn.ActorType,
  ActorColumn.Lat,
  ActorColumn.Lng,
  ActorColumn.Heading,
];

/** One actor found in an actor table, with the row indices that belong to it. */
export interface ActorDescriptor {
  readonly actorId: string;
  readonly actorType: number;
  readonly rows: readonly number[];
}

export interface ActorTrajectory {
  readonly lat: number[];
  readonly lng: number[];
  readonly heading: number[];
  readonly t: number[];
}

export interface EvaluatedActor {
  readonly actorId: string;
  readonly actorType: number;
  readonly actorTypeName: string;
  readonly trajectory: ActorTrajectory;
}
