import { formatRowShare } from "./utils";
import { MEMBER_CASUAL_VALUES, TRIP_COLUMNS, type TripColumn, type TripRecord } from "./trip-types";

// Data quality counts for freshly coerced trips, before any filtering
export type DataQualityReport = {
  totalRows: number;
  nullCounts: Record<TripColumn, number>;
  duplicateRideIds: number;
  invalidMemberCasual: number;
  endBeforeStart: number;
};

export function profileTrips(trips: readonly TripRecord[]): DataQualityReport {
  const nullCounts: Record<TripColumn, number> = {
    ride_id: 0,
    rideable_type: 0,
    started_at: 0,
    ended_at: 0,
    start_station_name: 0,
    start_station_id: 0,
    end_station_name: 0,
    end_station_id: 0,
    start_lat: 0,
    start_lng: 0,
    end_lat: 0,
    end_lng: 0,
    member_casual: 0,
  };
  const rideIdCounts = new Map<string, number>();
  const memberCasualValues: readonly string[] = MEMBER_CASUAL_VALUES;
  let invalidMemberCasual = 0;
  let endBeforeStart = 0;

  for (const trip of trips) {
    for (const column of TRIP_COLUMNS) {
      if (trip[column] === null) nullCounts[column]++;
    }
    if (trip.ride_id !== null) {
      rideIdCounts.set(trip.ride_id, (rideIdCounts.get(trip.ride_id) ?? 0) + 1);
    }
    if (trip.member_casual !== null && !memberCasualValues.includes(trip.member_casual)) {
      invalidMemberCasual++;
    }
    if (trip.started_at !== null && trip.ended_at !== null && trip.ended_at < trip.started_at) {
      endBeforeStart++;
    }
  }

  // Count of ride_ids that appear more than once
  let duplicateRideIds = 0;
  for (const count of rideIdCounts.values()) {
    if (count > 1) duplicateRideIds++;
  }

  return {
    totalRows: trips.length,
    nullCounts,
    duplicateRideIds,
    invalidMemberCasual,
    endBeforeStart,
  };
}

export function formatDataQualityWarnings(report: DataQualityReport): string[] {
  const warnings: string[] = [];
  const total = report.totalRows;

  // NULL checks (coordinates include the 0.0 sentinel)
  for (const column of TRIP_COLUMNS) {
    const count = report.nullCounts[column];
    if (count > 0) warnings.push(`${formatRowShare(count, total)} with NULL ${column}`);
  }

  if (report.duplicateRideIds > 0) {
    warnings.push(`${report.duplicateRideIds} duplicate ride_ids will be deduplicated`);
  }
  if (report.invalidMemberCasual > 0) {
    warnings.push(
      `${formatRowShare(report.invalidMemberCasual, total)} with invalid member_casual (must be 'member' or 'casual')`
    );
  }
  if (report.endBeforeStart > 0) {
    warnings.push(`${formatRowShare(report.endBeforeStart, total)} with ended_at before started_at`);
  }

  return warnings;
}

export function printDataQualityReport(city: string, report: DataQualityReport): void {
  console.log(`${city}: Total rows: ${report.totalRows}`);
  const warnings = formatDataQualityWarnings(report);
  if (warnings.length > 0) {
    console.warn(`${city}: Data quality warnings:\n  - ${warnings.join("\n  - ")}`);
  } else {
    console.log(`${city}: No data quality issues found.`);
  }
}
