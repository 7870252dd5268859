import { coerceTripRows } from "./coerce";
import { CityPipelineError, SchemaValidationError, type CleaningStage } from "./errors";
import { printDataQualityReport, profileTrips, type DataQualityReport } from "./profile";
import { summarizeValidationFailures, validateCleanedTrips, type ValidationOutcome } from "./schema";
import {
  DEFAULT_MAX_DURATION_MINUTES,
  DEFAULT_MIN_DURATION_MINUTES,
  filterDuplicates,
  filterMissingValues,
  filterTripsByDistance,
  filterTripsByDuration,
  filterTripsByGeolocationBounds,
} from "./trip-filters";
import type { RawRow, StationRecord, TripRecord } from "./trip-types";
import { formatElapsed } from "./utils";

export type CleaningOptions = {
  minDurationMinutes?: number;
  maxDurationMinutes?: number;
  // Make schema validation failures abort the city instead of only logging them
  strictValidation?: boolean;
};

export type StageMetric = {
  stage: CleaningStage;
  before: number;
  after: number;
  removed: number;
};

export type CityCleaningResult = {
  city: string;
  trips: TripRecord[];
  quality: DataQualityReport;
  metrics: StageMetric[];
  validation: ValidationOutcome;
};

type FilterStage = {
  stage: CleaningStage;
  label: string;
  run: (trips: readonly TripRecord[]) => TripRecord[];
};

// Runs fn, rethrowing anything it throws tagged with the city and stage
function runStage<T>(city: string, stage: CleaningStage, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof CityPipelineError) throw err;
    throw new CityPipelineError(city, stage, err);
  }
}

/**
 * Cleans one city's raw trips: coerce, filter in canonical order, validate.
 *
 * Coercion and filter errors abort the city with a CityPipelineError. Validation
 * failures are logged and the trips are still returned, unless
 * `strictValidation` is set.
 */
export function cleanCityTrips(data: {
  city: string;
  rawTrips: readonly RawRow[];
  stations: readonly StationRecord[];
  options?: CleaningOptions;
}): CityCleaningResult {
  const { city, rawTrips, stations, options = {} } = data;
  const {
    minDurationMinutes = DEFAULT_MIN_DURATION_MINUTES,
    maxDurationMinutes = DEFAULT_MAX_DURATION_MINUTES,
    strictValidation = false,
  } = options;

  console.log(`Cleaning data for ${city}...`);
  const startTime = Date.now();

  console.log(`Assigning correct data types for ${city}`);
  let trips = runStage(city, "coerce", () => coerceTripRows(rawTrips));

  const quality = profileTrips(trips);
  printDataQualityReport(city, quality);

  const stages: FilterStage[] = [
    {
      stage: "duplicates",
      label: "duplicates",
      run: (input) => filterDuplicates({ city, trips: input }),
    },
    {
      stage: "missing-values",
      label: "missing values",
      run: (input) => filterMissingValues({ city, trips: input }),
    },
    {
      stage: "geolocation",
      label: "geolocation bounds",
      run: (input) => filterTripsByGeolocationBounds({ city, trips: input, stations }),
    },
    {
      stage: "duration",
      label: "duration",
      run: (input) =>
        filterTripsByDuration({
          city,
          trips: input,
          minMinutes: minDurationMinutes,
          maxMinutes: maxDurationMinutes,
        }),
    },
    {
      stage: "distance",
      label: "distance",
      run: (input) => filterTripsByDistance({ city, trips: input }),
    },
  ];

  const metrics: StageMetric[] = [];
  for (const { stage, label, run } of stages) {
    console.log(`Filtering trips by ${label} for ${city}`);
    const before = trips.length;
    trips = runStage(city, stage, () => run(trips));
    metrics.push({ stage, before, after: trips.length, removed: before - trips.length });
  }

  const validation = validateCleanedTrips(trips);
  if (validation.success) {
    console.log(`Cleaned data validated successfully for ${city}.`);
  } else {
    const summary = summarizeValidationFailures({
      failures: validation.failures,
      totalRows: trips.length,
    });
    console.warn(`Data validation failed for ${city}. Issues:\n  - ${summary.join("\n  - ")}`);
    if (strictValidation) {
      throw new CityPipelineError(city, "validation", new SchemaValidationError(city, validation.failures));
    }
  }

  const totalRemoved = quality.totalRows - trips.length;
  console.log(
    `${city}: ${trips.length} of ${quality.totalRows} trips kept, ${totalRemoved} removed in ${formatElapsed(startTime)}`
  );

  return { city, trips, quality, metrics, validation };
}
