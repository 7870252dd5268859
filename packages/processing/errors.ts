import type { ValidationFailure } from "./schema";

export type CleaningStage =
  | "read"
  | "coerce"
  | "duplicates"
  | "missing-values"
  | "geolocation"
  | "duration"
  | "distance"
  | "validation"
  | "write";

/**
 * A raw cell that is present but cannot be read as the column's type.
 * Empty cells are not errors; they become null.
 */
export class TypeCoercionError extends Error {
  readonly code = "TYPE_COERCION_ERROR";

  constructor(
    readonly column: string,
    /** 0-based data row index (header excluded) */
    readonly rowIndex: number,
    readonly value: string
  ) {
    super(`Cannot coerce ${column} at row ${rowIndex}: ${JSON.stringify(value)}`);
    this.name = "TypeCoercionError";
  }
}

/**
 * No usable station coordinates, so the service-area bounding box is undefined.
 */
export class MissingStationGeometryError extends Error {
  readonly code = "NO_REFERENCE_GEOMETRY";

  constructor(readonly city: string) {
    super(`${city}: no station coordinates available to build the geofence`);
    this.name = "MissingStationGeometryError";
  }
}

/**
 * Thrown only when strict validation is enabled; otherwise failures are logged.
 */
export class SchemaValidationError extends Error {
  readonly code = "SCHEMA_VALIDATION_ERROR";

  constructor(
    readonly city: string,
    readonly failures: ValidationFailure[]
  ) {
    super(`${city}: cleaned trips failed validation with ${failures.length} issue(s)`);
    this.name = "SchemaValidationError";
  }
}

/**
 * Wraps whatever aborted one city's run with the stage it happened in.
 */
export class CityPipelineError extends Error {
  readonly code = "CITY_PIPELINE_ERROR";

  constructor(
    readonly city: string,
    readonly stage: CleaningStage,
    cause: unknown
  ) {
    super(`${city}: ${stage} stage failed: ${describeError(cause)}`, { cause });
    this.name = "CityPipelineError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
