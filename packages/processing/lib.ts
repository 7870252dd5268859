export { coerceStationRows, coerceTripRow, coerceTripRows } from "./coerce";
export { processAllCities, processCity } from "./clean-cities";
export type { CityRunFailure, CityRunSuccess, CleaningRunSummary } from "./clean-cities";
export { DEFAULT_CITIES, DEFAULT_MONTH, loadConfig } from "./config";
export type { PipelineConfig } from "./config";
export {
  cleanedTripsPath,
  findTripCsvFiles,
  formatTimestamp,
  readCsvRows,
  readStations,
  readTripRows,
  serializeTrips,
  streamCsvRows,
  writeCleanedTrips,
} from "./csv-io";
export {
  CityPipelineError,
  MissingStationGeometryError,
  SchemaValidationError,
  TypeCoercionError,
} from "./errors";
export type { CleaningStage } from "./errors";
export { EARTH_RADIUS_KM, haversineDistance, haversineDistances } from "./geo";
export { cleanCityTrips } from "./pipeline";
export type { CityCleaningResult, CleaningOptions, StageMetric } from "./pipeline";
export { formatDataQualityWarnings, profileTrips } from "./profile";
export type { DataQualityReport } from "./profile";
export { CleanedTripSchema, validateCleanedTrips } from "./schema";
export type { ValidationFailure, ValidationOutcome } from "./schema";
export {
  computeStationBounds,
  filterDuplicates,
  filterMissingValues,
  filterTripsByDistance,
  filterTripsByDuration,
  filterTripsByGeolocationBounds,
} from "./trip-filters";
export * from "./trip-types";
