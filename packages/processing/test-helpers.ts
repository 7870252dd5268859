import { vi } from "vitest";
import type { RawRow, TripRecord } from "./trip-types";

export function makeTrip(overrides: Partial<TripRecord> = {}): TripRecord {
  return {
    ride_id: "R1",
    rideable_type: "classic_bike",
    started_at: new Date(Date.UTC(2024, 8, 1, 8, 0, 0)),
    ended_at: new Date(Date.UTC(2024, 8, 1, 8, 15, 0)),
    start_station_name: "W 21 St & 6 Ave",
    start_station_id: "6140.05",
    end_station_name: "8 Ave & W 31 St",
    end_station_id: "6450.05",
    start_lat: 40.7417,
    start_lng: -73.9942,
    end_lat: 40.7527,
    end_lng: -73.9772,
    member_casual: "member",
    ...overrides,
  };
}

export function makeRawRow(overrides: RawRow = {}): RawRow {
  return {
    ride_id: "R1",
    rideable_type: "classic_bike",
    started_at: "2024-09-01 08:00:00",
    ended_at: "2024-09-01 08:15:00",
    start_station_name: "W 21 St & 6 Ave",
    start_station_id: "6140.05",
    end_station_name: "8 Ave & W 31 St",
    end_station_id: "6450.05",
    start_lat: "40.7417",
    start_lng: "-73.9942",
    end_lat: "40.7527",
    end_lng: "-73.9772",
    member_casual: "member",
    ...overrides,
  };
}

// Stage and pipeline logging is noisy; tests that assert on it spy directly
export function silenceConsole() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => {}),
    warn: vi.spyOn(console, "warn").mockImplementation(() => {}),
    error: vi.spyOn(console, "error").mockImplementation(() => {}),
  };
}
