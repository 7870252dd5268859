import { TypeCoercionError } from "./errors";
import type { CoordinateColumn, RawRow, StationRecord, TripRecord } from "./trip-types";

// "2024-09-01 08:15:00", "2024-09-01T08:15:00.123", optionally with Z or an offset
const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:\d{2})?$/;

function readCell(row: RawRow, column: string): string | null {
  const value = row[column];
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

export function parseText(row: RawRow, column: string): string | null {
  return readCell(row, column);
}

// Timestamps without a zone are wall-clock times; they are kept on the UTC axis
// so durations are not skewed by the host's DST transitions.
export function parseTimestamp(row: RawRow, column: string, rowIndex: number): Date | null {
  const value = readCell(row, column);
  if (value === null) return null;

  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) throw new TypeCoercionError(column, rowIndex, value);

  const [, year, month, day, hour, minute, second = "0", fraction = "0", zone] = match;
  const parts = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
  };
  const millis = Math.round(Number(`0.${fraction}`) * 1000);

  const wallClock = new Date(
    Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second, millis)
  );
  // Date.UTC rolls "2024-02-30" into March and month 13 into the next year; reject instead
  const outOfRange =
    parts.hour > 23 ||
    parts.minute > 59 ||
    parts.second > 59 ||
    wallClock.getUTCFullYear() !== parts.year ||
    wallClock.getUTCMonth() !== parts.month - 1 ||
    wallClock.getUTCDate() !== parts.day;
  const offset = zoneOffsetMinutes(zone);
  if (outOfRange || offset === null) {
    throw new TypeCoercionError(column, rowIndex, value);
  }
  return new Date(wallClock.getTime() - offset * 60_000);
}

// "Z" and a missing zone are both UTC; null for an offset outside +-23:59
function zoneOffsetMinutes(zone: string | undefined): number | null {
  if (zone === undefined || zone === "Z") return 0;
  const sign = zone.startsWith("-") ? -1 : 1;
  const hours = Number(zone.slice(1, 3));
  const minutes = Number(zone.slice(4, 6));
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
}

// Plain decimal or exponent notation; Number() alone would also take "0x1A" or "Infinity"
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseNumber(row: RawRow, column: string, rowIndex: number): number | null {
  const value = readCell(row, column);
  if (value === null) return null;

  const parsed = DECIMAL_PATTERN.test(value) ? Number(value) : NaN;
  if (!Number.isFinite(parsed)) throw new TypeCoercionError(column, rowIndex, value);
  return parsed;
}

// 0.0 is how the feeds encode a missing coordinate
export function parseCoordinate(row: RawRow, column: CoordinateColumn, rowIndex: number): number | null {
  const parsed = parseNumber(row, column, rowIndex);
  return parsed === 0 ? null : parsed;
}

export function coerceTripRow(row: RawRow, rowIndex: number): TripRecord {
  return {
    ride_id: parseText(row, "ride_id"),
    rideable_type: parseText(row, "rideable_type"),
    started_at: parseTimestamp(row, "started_at", rowIndex),
    ended_at: parseTimestamp(row, "ended_at", rowIndex),
    start_station_name: parseText(row, "start_station_name"),
    start_station_id: parseText(row, "start_station_id"),
    end_station_name: parseText(row, "end_station_name"),
    end_station_id: parseText(row, "end_station_id"),
    start_lat: parseCoordinate(row, "start_lat", rowIndex),
    start_lng: parseCoordinate(row, "start_lng", rowIndex),
    end_lat: parseCoordinate(row, "end_lat", rowIndex),
    end_lng: parseCoordinate(row, "end_lng", rowIndex),
    member_casual: parseText(row, "member_casual"),
  };
}

export function coerceTripRows(rows: readonly RawRow[]): TripRecord[] {
  return rows.map((row, rowIndex) => coerceTripRow(row, rowIndex));
}

const LATITUDE_HEADERS = new Set(["lat", "latitude"]);
const LONGITUDE_HEADERS = new Set(["lng", "lon", "long", "longitude"]);

function findHeader(row: RawRow, accepted: Set<string>): string | undefined {
  return Object.keys(row).find((key) => accepted.has(key.trim().toLowerCase()));
}

/**
 * Station feeds name their coordinate columns inconsistently (lat/latitude,
 * lng/lon/long/longitude). Rows with an empty coordinate are skipped.
 */
export function coerceStationRows(rows: readonly RawRow[]): StationRecord[] {
  const stations: StationRecord[] = [];

  rows.forEach((row, rowIndex) => {
    const latHeader = findHeader(row, LATITUDE_HEADERS);
    const lngHeader = findHeader(row, LONGITUDE_HEADERS);
    if (latHeader === undefined || lngHeader === undefined) {
      throw new TypeCoercionError(latHeader === undefined ? "lat" : "lng", rowIndex, "");
    }

    const lat = parseNumber(row, latHeader, rowIndex);
    const lng = parseNumber(row, lngHeader, rowIndex);
    if (lat === null || lng === null) return;

    stations.push({ lat, lng });
  });

  return stations;
}
