// Cleans raw bike-share trip CSVs for every configured city.
//
// Usage: tsx index.ts [YYYYMM]
// Example: tsx index.ts 202409
//
// Prerequisites:
// - raw_data/<City>/trip_data/<YYYYMM>/*.csv
// - raw_data/<City>/station_data/stations.csv
//
// Output:
// - cleaned_data/<City>/<City>_cleaned_trips.csv
//
// Environment (all optional): BIKESHARE_RAW_DATA_DIR, BIKESHARE_CLEANED_DATA_DIR,
// BIKESHARE_MONTH, BIKESHARE_CITIES, BIKESHARE_MIN_TRIP_MINUTES,
// BIKESHARE_MAX_TRIP_MINUTES, BIKESHARE_STRICT_VALIDATION, BIKESHARE_CONCURRENCY
import { processAllCities } from "./clean-cities";
import { loadConfig } from "./config";

async function main() {
  // Parse CLI argument
  const monthArg = process.argv[2];
  if (monthArg !== undefined && !/^\d{6}$/.test(monthArg)) {
    console.error("Usage: tsx index.ts [YYYYMM]");
    console.error("Example: tsx index.ts 202409");
    process.exit(1);
  }

  const config = loadConfig(
    monthArg === undefined ? process.env : { ...process.env, BIKESHARE_MONTH: monthArg }
  );
  console.log(`Raw data directory: ${config.rawDataDir}`);
  console.log(`Cleaned data directory: ${config.cleanedDataDir}`);

  const { failed } = await processAllCities(config);
  if (failed.length > 0) {
    console.error(`\nFailed cities: ${failed.map((f) => `${f.city} (${f.stage ?? "unknown"})`).join(", ")}`);
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
