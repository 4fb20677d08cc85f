import { TabularFileDecoder } from '@simval/adapters';
import {
  SchemaError,
  VehicleColumn,
  asNumber,
  createColumn,
  findColumn,
  withColumn,
} from '@simval/domain';
import type { TabularDecoderPort, TabularTable } from '@simval/domain';

const MS_TO_KMH = 3.6;

/**
 * Adds the derived vehicle columns:
 *   - `t`            Time relative to the first row
 *   - `VUT_vel_ms`   absolute velocity, missing → 0
 *   - `VUT_vel_kmh`  `VUT_vel_ms` × 3.6
 */
export function normalizeVehicleTable(table: TabularTable): TabularTable {
  const time = findColumn(table, VehicleColumn.Time);
  if (!time) {
    throw new SchemaError(`Cannot compute relative time: column ${VehicleColumn.Time} is missing`);
  }

  const t0 = asNumber(time.values[0]);
  let normalized = withColumn(
    table,
    createColumn(
      VehicleColumn.RelativeTime,
      time.values.map((value) => {
        const ts = asNumber(value);
        return ts === null || t0 === null ? null : ts - t0;
      }),
    ),
  );

  const velAbs = findColumn(table, VehicleColumn.VelAbs);
  if (velAbs) {
    const velMs = velAbs.values.map((value) => asNumber(value) ?? 0);
    normalized = withColumn(normalized, createColumn(VehicleColumn.VelMs, velMs));
    normalized = withColumn(
      normalized,
      createColumn(
        VehicleColumn.VelKmh,
        velMs.map((v) => v * MS_TO_KMH),
      ),
    );
  }

  return normalized;
}

/** Decodes a VUT_status file and adds the derived columns. */
export async function loadVehicleTable(
  bytes: Buffer,
  decoder: TabularDecoderPort = new TabularFileDecoder(),
): Promise<TabularTable> {
  return normalizeVehicleTable(await decoder.decode(bytes));
}
