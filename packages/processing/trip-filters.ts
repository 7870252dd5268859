import { MissingStationGeometryError } from "./errors";
import { haversineDistances } from "./geo";
import {
  CRITICAL_COLUMNS,
  type StationBounds,
  type StationRecord,
  type TripRecord,
} from "./trip-types";

/**
 * Cleaning stages over a city's trips. Each stage returns a new array and
 * leaves its input untouched, so the stages can be run alone or in any order.
 *
 * Canonical order (see cleanCityTrips):
 * 1. Duplicates (first ride_id wins)
 * 2. Missing critical values
 * 3. End point inside the station bounding box
 * 4. Duration within [minMinutes, maxMinutes]
 * 5. Haversine distance > 0
 */

export const DEFAULT_MIN_DURATION_MINUTES = 0;
export const DEFAULT_MAX_DURATION_MINUTES = 24 * 60;

const MS_PER_MINUTE = 60 * 1000;

type StageInput<T> = {
  city: string;
  trips: readonly T[];
};

export function filterDuplicates<T extends TripRecord>(data: StageInput<T>): T[] {
  const { city, trips } = data;
  const seen = new Set<string | null>();
  const cleaned = trips.filter((trip) => {
    if (seen.has(trip.ride_id)) return false;
    seen.add(trip.ride_id);
    return true;
  });

  console.log(`${city}: Removed ${trips.length - cleaned.length} duplicate entries based on ride_id.`);
  return cleaned;
}

export function filterMissingValues<T extends TripRecord>(data: StageInput<T>): T[] {
  const { city, trips } = data;
  const cleaned = trips.filter((trip) => CRITICAL_COLUMNS.every((column) => trip[column] !== null));

  console.log(`${city}: Removed ${trips.length - cleaned.length} rows with missing critical columns.`);
  return cleaned;
}

export function computeStationBounds(data: {
  city: string;
  stations: readonly StationRecord[];
}): StationBounds {
  const { city, stations } = data;
  let minLat = Infinity;
  let maxLat = -Infinity;
  let minLng = Infinity;
  let maxLng = -Infinity;

  for (const { lat, lng } of stations) {
    if (!Number.isFinite(lat) || !Number.isFinite(lng)) continue;
    minLat = Math.min(minLat, lat);
    maxLat = Math.max(maxLat, lat);
    minLng = Math.min(minLng, lng);
    maxLng = Math.max(maxLng, lng);
  }

  if (minLat === Infinity) {
    throw new MissingStationGeometryError(city);
  }
  return { minLat, maxLat, minLng, maxLng };
}

function between(value: number | null, min: number, max: number): boolean {
  return value !== null && value >= min && value <= max;
}

// Only the end point is checked; trips may start outside the service area.
export function filterTripsByGeolocationBounds<T extends TripRecord>(
  data: StageInput<T> & { stations: readonly StationRecord[] }
): T[] {
  const { city, trips, stations } = data;
  const bounds = computeStationBounds({ city, stations });

  const cleaned = trips.filter(
    (trip) =>
      between(trip.end_lat, bounds.minLat, bounds.maxLat) &&
      between(trip.end_lng, bounds.minLng, bounds.maxLng)
  );

  const total = trips.length;
  const kept = cleaned.length;
  console.log(`${city}: ${total} total trips, ${total - kept} out of bound trips removed, ${kept} remain`);
  return cleaned;
}

export function tripDurationMinutes(trip: TripRecord): number {
  if (trip.started_at === null || trip.ended_at === null) return NaN;
  return (trip.ended_at.getTime() - trip.started_at.getTime()) / MS_PER_MINUTE;
}

export function filterTripsByDuration<T extends TripRecord>(
  data: StageInput<T> & { minMinutes?: number; maxMinutes?: number }
): T[] {
  const {
    city,
    trips,
    minMinutes = DEFAULT_MIN_DURATION_MINUTES,
    maxMinutes = DEFAULT_MAX_DURATION_MINUTES,
  } = data;
  if (minMinutes > maxMinutes) {
    throw new RangeError(`${city}: minMinutes (${minMinutes}) exceeds maxMinutes (${maxMinutes})`);
  }

  const cleaned = trips.filter((trip) => between(tripDurationMinutes(trip), minMinutes, maxMinutes));

  console.log(
    `${city}: Removed ${trips.length - cleaned.length} trips outside duration [${minMinutes}, ${maxMinutes}] minutes`
  );
  return cleaned;
}

// Missing coordinates become NaN, and NaN never passes the > 0 check
export function tripDistancesKm(trips: readonly TripRecord[]): Float64Array {
  const column = (pick: (trip: TripRecord) => number | null) =>
    Float64Array.from(trips, (trip) => pick(trip) ?? NaN);

  return haversineDistances({
    startLat: column((trip) => trip.start_lat),
    startLng: column((trip) => trip.start_lng),
    endLat: column((trip) => trip.end_lat),
    endLng: column((trip) => trip.end_lng),
  });
}

export function filterTripsByDistance<T extends TripRecord>(data: StageInput<T>): T[] {
  const { city, trips } = data;
  const distances = tripDistancesKm(trips);

  const cleaned = trips.filter((_, index) => (distances[index] ?? NaN) > 0);

  console.log(`${city}: Removed ${trips.length - cleaned.length} trips with zero or negative distance`);
  return cleaned;
}
