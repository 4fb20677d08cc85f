/** Column names of a VUT_status file, including the columns the normalizer derives. */
export const VehicleColumn = {
  Time: 'Time',
  StepNumber: 'Step_number',
  Lat: 'VUT_pos_lat',
  Lng: 'VUT_pos_lng',
  Heading: 'VUT_heading',
  VelAbs: 'VUT_vel_abs',
  AcclLat: 'VUT_accl_lat',
  AcclLng: 'VUT_accl_lng',
  BrakingLevel: 'VUT_braking_level',
  ThrottleLevel: 'VUT_throttle_level',
  SteeringPct: 'VUT_steering_angle_percentage',
  IndLeft: 'VUT_ind_st_dir_left',
  IndRight: 'VUT_ind_st_dir_right',
  IndHazard: 'VUT_ind_st_hazard',
  IndReverse: 'VUT_ind_st_reverse',
  IndBraking: 'VUT_ind_st_braking',
  // derived
  RelativeTime: 't',
  VelMs: 'VUT_vel_ms',
  VelKmh: 'VUT_vel_kmh',
} as const;

export type VehicleColumnName = (typeof VehicleColumn)[keyof typeof VehicleColumn];

export const VEHICLE_REQUIRED_COLUMNS: readonly VehicleColumnName[] = [
  VehicleColumn.Time,
  VehicleColumn.StepNumber,
  VehicleColumn.Lat,
  VehicleColumn.Lng,
  VehicleColumn.Heading,
  VehicleColumn.VelAbs,
];

export interface VehicleChannels {
  readonly t: number[];
  readonly lat: number[];
  readonly lng: number[];
  readonly heading: number[];
  readonly velMs: number[];
  readonly velKmh: number[];
  readonly acclLat: number[];
  readonly acclLng: number[];
  readonly brakingLevel: number[];
  readonly throttleLevel: number[];
  readonly steeringPct: number[];
  readonly indLeft: number[];
  readonly indRight: number[];
  readonly indHazard: number[];
  readonly indReverse: number[];
  readonly indBraking: number[];
}

export type VehicleChannelName = keyof VehicleChannels;

/** Source column of every rendered channel. */
export const VEHICLE_CHANNEL_SOURCES: Readonly<Record<VehicleChannelName, VehicleColumnName>> = {
  t: VehicleColumn.RelativeTime,
  lat: VehicleColumn.Lat,
  lng: VehicleColumn.Lng,
  heading: VehicleColumn.Heading,
  velMs: VehicleColumn.VelMs,
  velKmh: VehicleColumn.VelKmh,
  acclLat: VehicleColumn.AcclLat,
  acclLng: VehicleColumn.AcclLng,
  brakingLevel: VehicleColumn.BrakingLevel,
  throttleLevel: VehicleColumn.ThrottleLevel,
  steeringPct: VehicleColumn.SteeringPct,
  indLeft: VehicleColumn.IndLeft,
  indRight: VehicleColumn.IndRight,
  indHazard: VehicleColumn.IndHazard,
  indReverse: VehicleColumn.IndReverse,
  indBraking: VehicleColumn.IndBraking,
};
