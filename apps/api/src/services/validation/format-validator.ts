import {
  ACTOR_REQUIRED_COLUMNS,
  ActorColumn,
  VEHICLE_REQUIRED_COLUMNS,
  VehicleColumn,
  findColumn,
  hasColumn,
  isMissing,
} from '@simval/domain';
import type { TableColumn, TabularTable, ValidationFindings } from '@simval/domain';

interface FormatRule {
  /** Error message, or null when the table passes. */
  check: (table: TabularTable) => string | null;
}

function hasText(column: TableColumn): boolean {
  return column.kind === 'string' || column.kind === 'mixed';
}

function rangeRule(column: string, min: number, max: number, violation: string): FormatRule {
  return {
    check: (table) => {
      const values = findColumn(table, column);
      if (!values) return null;
      if (hasText(values)) return `${column} contains non-numeric values`;
      const outside = values.values.some(
        (value) => typeof value === 'number' && (value < min || value > max),
      );
      return outside ? `${column} ${violation}` : null;
    },
  };
}

const latitudeRule = (column: string): FormatRule =>
  rangeRule(column, -90, 90, 'contains values outside the valid range (-90 to 90)');

const longitudeRule = (column: string): FormatRule =>
  rangeRule(column, -180, 360, 'contains values outside the valid range (-180 to 360)');

const headingRule = (column: string): FormatRule =>
  rangeRule(column, 0, 360, 'contains values outside the valid range (0 to 360)');

const VEHICLE_RULES: FormatRule[] = [
  latitudeRule(VehicleColumn.Lat),
  longitudeRule(VehicleColumn.Lng),
  headingRule(VehicleColumn.Heading),
  rangeRule(VehicleColumn.VelAbs, 0, Infinity, 'contains negative values'),
  {
    check: (table) => {
      const time = findColumn(table, VehicleColumn.Time);
      if (!time) return null;
      let previous: number | null = null;
      for (const value of time.values) {
        if (typeof value !== 'number') continue;
        if (previous !== null && value < previous) {
          return `${VehicleColumn.Time} column is not monotonically non-decreasing`;
        }
        previous = value;
      }
      return null;
    },
  },
];

const VEHICLE_MISSING_VALUE_WARNINGS: readonly string[] = [
  VehicleColumn.Lat,
  VehicleColumn.Lng,
  VehicleColumn.Heading,
];

const ACTOR_RULES: FormatRule[] = [
  latitudeRule(ActorColumn.Lat),
  longitudeRule(ActorColumn.Lng),
  headingRule(ActorColumn.Heading),
  {
    check: (table) => {
      const types = findColumn(table, ActorColumn.ActorType);
      if (!types) return null;
      if (hasText(types)) return `${ActorColumn.ActorType} contains non-numeric values`;
      const fractional = types.values.some(
        (value) => typeof value === 'number' && !Number.isInteger(value),
      );
      return fractional ? `${ActorColumn.ActorType} contains non-integer values` : null;
    },
  },
];

function missingColumns(table: TabularTable, required: readonly string[]): string[] {
  return required.filter((name) => !hasColumn(table, name));
}

function runRules(table: TabularTable, rules: readonly FormatRule[]): string[] {
  const errors: string[] = [];
  for (const rule of rules) {
    const error = rule.check(table);
    if (error !== null) errors.push(error);
  }
  return errors;
}

/** Format checks for a normalized VUT_status table. Validation findings are data, never thrown. */
export function validateVehicle(table: TabularTable): ValidationFindings {
  const missing = missingColumns(table, VEHICLE_REQUIRED_COLUMNS);
  if (missing.length > 0) {
    return { errors: [`Missing required columns: ${missing.join(', ')}`], warnings: [] };
  }

  const errors = runRules(table, VEHICLE_RULES);
  const warnings: string[] = [];
  for (const name of VEHICLE_MISSING_VALUE_WARNINGS) {
    const column = findColumn(table, name);
    if (!column) continue;
    const count = column.values.filter((value) => isMissing(value)).length;
    if (count > 0) warnings.push(`${name} has ${count} missing value(s)`);
  }

  return { errors, warnings };
}

/** Format checks for a normalized Environment_actors_true table. */
export function validateActors(table: TabularTable): ValidationFindings {
  const missing = missingColumns(table, ACTOR_REQUIRED_COLUMNS);
  if (missing.length > 0) {
    return { errors: [`Missing required columns: ${missing.join(', ')}`], warnings: [] };
  }
  return { errors: runRules(table, ACTOR_RULES), warnings: [] };
}
