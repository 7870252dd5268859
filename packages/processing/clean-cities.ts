import type { PipelineConfig } from "./config";
import { findTripCsvFiles, readStations, readTripRows, stationCsvPath, writeCleanedTrips } from "./csv-io";
import { CityPipelineError, type CleaningStage } from "./errors";
import { cleanCityTrips, type StageMetric } from "./pipeline";
import { formatElapsed } from "./utils";

export type CityRunSuccess = {
  city: string;
  outputPath: string;
  inputTrips: number;
  cleanedTrips: number;
  validationPassed: boolean;
  metrics: StageMetric[];
};

export type CityRunFailure = {
  city: string;
  // null when the error did not come from a known stage
  stage: CleaningStage | null;
  message: string;
  error: unknown;
};

export type CleaningRunSummary = {
  succeeded: CityRunSuccess[];
  failed: CityRunFailure[];
};

async function runAsync<T>(city: string, stage: CleaningStage, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new CityPipelineError(city, stage, err);
  }
}

export async function processCity(city: string, config: PipelineConfig): Promise<CityRunSuccess> {
  const { rawDataDir, cleanedDataDir, month } = config;

  const { rawTrips, stations } = await runAsync(city, "read", async () => {
    const tripFiles = findTripCsvFiles({ rawDataDir, city, month });
    console.log(`${city}: reading ${tripFiles.length} trip file(s)`);
    return {
      rawTrips: await readTripRows(tripFiles),
      stations: await readStations(stationCsvPath({ rawDataDir, city })),
    };
  });

  const result = cleanCityTrips({
    city,
    rawTrips,
    stations,
    options: {
      minDurationMinutes: config.minDurationMinutes,
      maxDurationMinutes: config.maxDurationMinutes,
      strictValidation: config.strictValidation,
    },
  });

  const outputPath = await runAsync(city, "write", () =>
    writeCleanedTrips({ cleanedDataDir, city, trips: result.trips })
  );

  return {
    city,
    outputPath,
    inputTrips: result.quality.totalRows,
    cleanedTrips: result.trips.length,
    validationPassed: result.validation.success,
    metrics: result.metrics,
  };
}

function toFailure(city: string, err: unknown): CityRunFailure {
  if (err instanceof CityPipelineError) {
    return { city, stage: err.stage, message: err.message, error: err };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { city, stage: null, message: `${city}: ${message}`, error: err };
}

type ProcessCityFn = (city: string, config: PipelineConfig) => Promise<CityRunSuccess>;

/**
 * Cleans every configured city, `config.concurrency` at a time. A failing city
 * is reported in `failed` and does not stop the others.
 */
export async function processAllCities(
  config: PipelineConfig,
  processOne: ProcessCityFn = processCity
): Promise<CleaningRunSummary> {
  const { cities, concurrency } = config;
  const succeeded: CityRunSuccess[] = [];
  const failed: CityRunFailure[] = [];
  const startTime = Date.now();
  let index = 0;

  console.log(`Cleaning ${cities.length} cities for ${config.month} (concurrency: ${concurrency})`);

  async function worker(): Promise<void> {
    while (index < cities.length) {
      const city = cities[index++];
      if (city === undefined) return;
      try {
        succeeded.push(await processOne(city, config));
      } catch (err) {
        const failure = toFailure(city, err);
        console.error(`Failed to clean ${city} at ${failure.stage ?? "unknown"} stage: ${failure.message}`);
        failed.push(failure);
      }
    }
  }

  const workerCount = Math.max(1, Math.min(concurrency, cities.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  // Keep results in configured city order regardless of completion order
  const order = (city: string) => cities.indexOf(city);
  succeeded.sort((a, b) => order(a.city) - order(b.city));
  failed.sort((a, b) => order(a.city) - order(b.city));

  console.log(
    `\nDone in ${formatElapsed(startTime)}: ${succeeded.length} cities cleaned, ${failed.length} failed`
  );
  return { succeeded, failed };
}
