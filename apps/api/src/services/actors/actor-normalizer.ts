import { TabularFileDecoder } from '@simval/adapters';
import {
  ActorColumn,
  asNumber,
  createColumn,
  findColumn,
  isMissing,
  withColumn,
} from '@simval/domain';
import type { ActorDescriptor, CellValue, TabularDecoderPort, TabularTable } from '@simval/domain';

/**
 * Fills in `Actor_vel_abs` from its lateral/longitudinal components where
 * the file reports it as zero or leaves it empty. Non-zero values are kept.
 */
export function normalizeActorTable(table: TabularTable): TabularTable {
  const velAbs = findColumn(table, ActorColumn.VelAbs);
  const velLat = findColumn(table, ActorColumn.VelLat);
  if (!velAbs || !velLat) return table;

  const velLng = findColumn(table, ActorColumn.VelLng);
  const rebuilt = velAbs.values.map((value, row): CellValue => {
    if (!isMissing(value) && value !== 0) return value;
    const lat = asNumber(velLat.values[row]) ?? 0;
    const lng = asNumber(velLng?.values[row]) ?? 0;
    return Math.sqrt(lat ** 2 + lng ** 2);
  });

  return withColumn(table, createColumn(ActorColumn.VelAbs, rebuilt));
}

/** Decodes an Environment_actors_true file and reconstructs missing speeds. */
export async function loadActorTable(
  bytes: Buffer,
  decoder: TabularDecoderPort = new TabularFileDecoder(),
): Promise<TabularTable> {
  return normalizeActorTable(await decoder.decode(bytes));
}

/**
 * Groups rows by `Actor_Id` in first-appearance order. Rows without an id
 * belong to no actor. The type is the first numeric `Actor_type` of the
 * actor's rows, truncated; 0 when there is none.
 */
export function enumerateActors(table: TabularTable): ActorDescriptor[] {
  const ids = findColumn(table, ActorColumn.ActorId);
  if (!ids || table.rowCount === 0) return [];
  const types = findColumn(table, ActorColumn.ActorType);

  const rowsById = new Map<string, number[]>();
  ids.values.forEach((value, row) => {
    if (isMissing(value)) return;
    const actorId = String(value);
    const rows = rowsById.get(actorId);
    if (rows) rows.push(row);
    else rowsById.set(actorId, [row]);
  });

  return [...rowsById.entries()].map(([actorId, rows]) => {
    let actorType = 0;
    if (types) {
      for (const row of rows) {
        const code = asNumber(types.values[row]);
        if (code !== null && Number.isFinite(code)) {
          actorType = Math.trunc(code);
          break;
        }
      }
    }
    return { actorId, actorType, rows };
  });
}
