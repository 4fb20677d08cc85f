import JSZip from 'jszip';
import { createColumn, createTable } from '@simval/domain';
import type { CellValue, TabularTable } from '@simval/domain';

/** Builds a table from column arrays; all arrays must share one length. */
export function tableOf(columns: Record<string, CellValue[]>): TabularTable {
  return createTable(Object.entries(columns).map(([name, values]) => createColumn(name, values)));
}

export function csvBytes(lines: readonly string[]): Buffer {
  return Buffer.from(`${lines.join('\n')}\n`, 'utf-8');
}

export const VEHICLE_HEADER =
  'Time,Step_number,VUT_pos_lat,VUT_pos_lng,VUT_heading,VUT_vel_abs,VUT_accl_lat';

export const ACTOR_HEADER =
  'Time,Step_number,Actor_Id,Actor_type,Actor_pos_true_lat,Actor_pos_true_lng,Actor_heading_true,Actor_vel_abs,Actor_vel_lat,Actor_vel_lng';

/** Three steps, 0.5 s apart; heading missing at step 2, infinite lateral acceleration at step 3. */
export const VEHICLE_CSV = csvBytes([
  VEHICLE_HEADER,
  '100,1,1.2345678,103.1,90,10,0.1',
  '100.5,2,1.2345679,103.2,,,',
  '101,3,1.234568,103.3,91.5,12.5,inf',
]);

/** Two actors; car-7's second row refers to a step the vehicle file does not have. */
export const ACTOR_CSV = csvBytes([
  ACTOR_HEADER,
  '100,1,ped-1,0,1.3,103.5,45.12344,0,3,4',
  '100,1,car-7,4,1.31,103.51,,8,0,0',
  '100.5,2,ped-1,0,1.30001,103.50001,46,,,',
  '101,9,car-7,4,1.32,103.52,180,8,0,0',
]);

/** A vehicle table that passes every format check, in row form. */
export function validVehicleColumns(): Record<string, CellValue[]> {
  return {
    Time: [0, 0.1, 0.2, 0.3],
    Step_number: [1, 2, 3, 4],
    VUT_pos_lat: [1.29, 1.2901, 1.2902, 1.2903],
    VUT_pos_lng: [103.85, 103.8501, 103.8502, 103.8503],
    VUT_heading: [0, 90, 180, 360],
    VUT_vel_abs: [0, 1.5, 3, 4.5],
  };
}

export function validActorColumns(): Record<string, CellValue[]> {
  return {
    Time: [0, 0, 0.1, 0.1],
    Step_number: [1, 1, 2, 2],
    Actor_Id: ['A', 'B', 'A', 'B'],
    Actor_type: [4, 2, 4, 2],
    Actor_pos_true_lat: [1.3, 1.31, 1.3001, 1.3101],
    Actor_pos_true_lng: [103.8, 103.81, 103.8001, 103.8101],
    Actor_heading_true: [10, 20, 10.5, 20.5],
  };
}

export async function zipOf(files: Record<string, Buffer | string>): Promise<Buffer> {
  const zip = new JSZip();
  for (const [path, content] of Object.entries(files)) zip.file(path, content);
  return zip.generateAsync({ type: 'nodebuffer' });
}

export const LAT_OUT_OF_RANGE_CSV = csvBytes([VEHICLE_HEADER, '0,1,95,103.1,90,10,0']);
export const NO_TIME_CSV = csvBytes(['Step_number,VUT_pos_lat', '1,1.3']);
export const HEADER_ONLY_ACTOR_CSV = csvBytes([ACTOR_HEADER]);

/**
 * Two test cases with two runs each, plus entries the indexer must skip:
 * macOS metadata, a directory without a run suffix and an unrelated file.
 */
export function sampleArchive(): Promise<Buffer> {
  return zipOf({
    'TC-A_r0/VUT_status.csv': VEHICLE_CSV,
    'TC-A_r0/Environment_actors_true.csv': ACTOR_CSV,
    'TC-A_r1/VUT_status.csv': LAT_OUT_OF_RANGE_CSV,
    'TC-B_r10/VUT_status.csv': VEHICLE_CSV,
    'TC-B_r10/Environment_actors_true.csv': HEADER_ONLY_ACTOR_CSV,
    'TC-B_r2/VUT_status.csv': NO_TIME_CSV,
    '__MACOSX/TC-A_r0/VUT_status.csv': LAT_OUT_OF_RANGE_CSV,
    'TC-A_r0/._VUT_status.csv': 'resource fork',
    'loose/VUT_status.csv': VEHICLE_CSV,
    'TC-C_r0/notes.txt': 'not a run',
  });
}
