import { beforeEach, describe, expect, it, vi } from "vitest";
import { MissingStationGeometryError } from "./errors";
import { EARTH_RADIUS_KM } from "./geo";
import { makeTrip, silenceConsole } from "./test-helpers";
import {
  computeStationBounds,
  filterDuplicates,
  filterMissingValues,
  filterTripsByDistance,
  filterTripsByDuration,
  filterTripsByGeolocationBounds,
  tripDistancesKm,
  tripDurationMinutes,
} from "./trip-filters";
import type { StationRecord, TripRecord } from "./trip-types";

const CITY = "NYC";

function endingAt(rideId: string, endLat: number, endLng: number): TripRecord {
  return makeTrip({ ride_id: rideId, end_lat: endLat, end_lng: endLng });
}

function lasting(rideId: string, durationMs: number): TripRecord {
  const startedAt = Date.UTC(2024, 8, 1, 8, 0, 0);
  return makeTrip({
    ride_id: rideId,
    started_at: new Date(startedAt),
    ended_at: new Date(startedAt + durationMs),
  });
}

const rideIds = (trips: readonly TripRecord[]) => trips.map((trip) => trip.ride_id);

let consoleSpies: ReturnType<typeof silenceConsole>;

beforeEach(() => {
  vi.restoreAllMocks();
  consoleSpies = silenceConsole();
});

describe("filterDuplicates", () => {
  const trips = [
    makeTrip({ ride_id: "A", rideable_type: "classic_bike" }),
    makeTrip({ ride_id: "B" }),
    makeTrip({ ride_id: "A", rideable_type: "electric_bike" }),
    makeTrip({ ride_id: "C" }),
    makeTrip({ ride_id: "B" }),
  ];

  it("keeps the first occurrence of each ride_id", () => {
    const cleaned = filterDuplicates({ city: CITY, trips });

    expect(rideIds(cleaned)).toEqual(["A", "B", "C"]);
    expect(cleaned[0]?.rideable_type).toBe("classic_bike");
  });

  it("leaves no two trips sharing a ride_id", () => {
    const cleaned = filterDuplicates({ city: CITY, trips });
    expect(new Set(rideIds(cleaned)).size).toBe(cleaned.length);
  });

  it("is idempotent", () => {
    const once = filterDuplicates({ city: CITY, trips });
    const twice = filterDuplicates({ city: CITY, trips: once });
    expect(twice).toEqual(once);
  });

  it("does not mutate its input", () => {
    filterDuplicates({ city: CITY, trips });
    expect(trips).toHaveLength(5);
  });

  it("logs the removed count tagged by city", () => {
    filterDuplicates({ city: CITY, trips });
    expect(consoleSpies.log).toHaveBeenCalledWith("NYC: Removed 2 duplicate entries based on ride_id.");
  });
});

describe("filterMissingValues", () => {
  it("drops trips missing any critical column", () => {
    const trips = [
      makeTrip({ ride_id: "ok" }),
      makeTrip({ ride_id: null }),
      makeTrip({ ride_id: "no-start", started_at: null }),
      makeTrip({ ride_id: "no-end", ended_at: null }),
      makeTrip({ ride_id: "no-start-lat", start_lat: null }),
      makeTrip({ ride_id: "no-start-lng", start_lng: null }),
      makeTrip({ ride_id: "no-end-lat", end_lat: null }),
      makeTrip({ ride_id: "no-end-lng", end_lng: null }),
    ];

    expect(rideIds(filterMissingValues({ city: CITY, trips }))).toEqual(["ok"]);
    expect(consoleSpies.log).toHaveBeenCalledWith("NYC: Removed 7 rows with missing critical columns.");
  });

  it("keeps trips with missing station names and ids", () => {
    const trips = [
      makeTrip({
        start_station_name: null,
        start_station_id: null,
        end_station_name: null,
        end_station_id: null,
      }),
    ];
    expect(filterMissingValues({ city: CITY, trips })).toHaveLength(1);
  });
});

describe("computeStationBounds", () => {
  it("spans every station", () => {
    const stations: StationRecord[] = [
      { lat: 40.7, lng: -73.95 },
      { lat: 40.8, lng: -74.02 },
      { lat: 40.75, lng: -73.9 },
    ];
    expect(computeStationBounds({ city: CITY, stations })).toEqual({
      minLat: 40.7,
      maxLat: 40.8,
      minLng: -74.02,
      maxLng: -73.9,
    });
  });

  it("throws a distinct error when there are no stations", () => {
    expect(() => computeStationBounds({ city: CITY, stations: [] })).toThrow(MissingStationGeometryError);
  });

  it("throws when no station has finite coordinates", () => {
    expect(() => computeStationBounds({ city: CITY, stations: [{ lat: NaN, lng: NaN }] })).toThrow(
      "NYC: no station coordinates available to build the geofence"
    );
  });
});

describe("filterTripsByGeolocationBounds", () => {
  const stations: StationRecord[] = [
    { lat: 0, lng: 0 },
    { lat: 10, lng: 10 },
  ];

  it("keeps trips ending inside the box, bounds included", () => {
    const trips = [
      endingAt("inside", 5, 5),
      endingAt("outside", 11, 5),
      endingAt("corner", 10, 10),
      endingAt("origin-corner", 0, 0),
      endingAt("west", 5, -0.5),
    ];

    const cleaned = filterTripsByGeolocationBounds({ city: CITY, trips, stations });

    expect(rideIds(cleaned)).toEqual(["inside", "corner", "origin-corner"]);
    expect(consoleSpies.log).toHaveBeenCalledWith(
      "NYC: 5 total trips, 2 out of bound trips removed, 3 remain"
    );
  });

  it("does not constrain the start point", () => {
    const trip = makeTrip({ start_lat: 50, start_lng: 50, end_lat: 5, end_lng: 5 });
    expect(filterTripsByGeolocationBounds({ city: CITY, trips: [trip], stations })).toHaveLength(1);
  });

  it("removes trips with an absent end point", () => {
    const trip = makeTrip({ end_lat: null, end_lng: 5 });
    expect(filterTripsByGeolocationBounds({ city: CITY, trips: [trip], stations })).toHaveLength(0);
  });

  it("fails without station geometry", () => {
    expect(() =>
      filterTripsByGeolocationBounds({ city: CITY, trips: [endingAt("inside", 5, 5)], stations: [] })
    ).toThrow(MissingStationGeometryError);
  });
});

describe("filterTripsByDuration", () => {
  it("applies inclusive bounds", () => {
    const trips = [
      lasting("exactly-60", 60 * 60 * 1000),
      lasting("just-over-60", 60.0001 * 60 * 1000),
      lasting("negative", -60 * 1000),
      lasting("zero", 0),
      lasting("thirty", 30 * 60 * 1000),
    ];

    const cleaned = filterTripsByDuration({ city: CITY, trips, minMinutes: 0, maxMinutes: 60 });

    expect(rideIds(cleaned)).toEqual(["exactly-60", "zero", "thirty"]);
    expect(consoleSpies.log).toHaveBeenCalledWith("NYC: Removed 2 trips outside duration [0, 60] minutes");
  });

  it("defaults to between 0 minutes and 24 hours", () => {
    const trips = [
      lasting("day", 24 * 60 * 60 * 1000),
      lasting("day-and-a-second", 24 * 60 * 60 * 1000 + 1000),
      lasting("zero", 0),
    ];
    expect(rideIds(filterTripsByDuration({ city: CITY, trips }))).toEqual(["day", "zero"]);
  });

  it("removes trips whose times are absent", () => {
    const trips = [makeTrip({ ended_at: null })];
    expect(filterTripsByDuration({ city: CITY, trips })).toHaveLength(0);
  });

  it("rejects an inverted window", () => {
    expect(() => filterTripsByDuration({ city: CITY, trips: [], minMinutes: 10, maxMinutes: 5 })).toThrow(
      RangeError
    );
  });
});

describe("tripDurationMinutes", () => {
  it("measures ended_at minus started_at", () => {
    expect(tripDurationMinutes(lasting("ninety-seconds", 90 * 1000))).toBe(1.5);
  });

  it("is NaN when a time is absent", () => {
    expect(tripDurationMinutes(makeTrip({ started_at: null }))).toBeNaN();
  });
});

describe("filterTripsByDistance", () => {
  // Latitude offset of 1 m along a meridian
  const oneMetreLat = 0.001 / ((EARTH_RADIUS_KM * Math.PI) / 180);

  it("removes round trips and keeps trips 1 m apart", () => {
    const trips = [
      makeTrip({ ride_id: "round-trip", start_lat: 40.75, start_lng: -73.98, end_lat: 40.75, end_lng: -73.98 }),
      makeTrip({
        ride_id: "one-metre",
        start_lat: 40.75,
        start_lng: -73.98,
        end_lat: 40.75 + oneMetreLat,
        end_lng: -73.98,
      }),
    ];

    expect(tripDistancesKm(trips)[1]).toBeCloseTo(0.001, 9);
    expect(rideIds(filterTripsByDistance({ city: CITY, trips }))).toEqual(["one-metre"]);
    expect(consoleSpies.log).toHaveBeenCalledWith("NYC: Removed 1 trips with zero or negative distance");
  });

  it("does not cap long trips", () => {
    const trips = [makeTrip({ start_lat: 40.7, start_lng: -74, end_lat: 41.9, end_lng: -87.6 })];
    expect(filterTripsByDistance({ city: CITY, trips })).toHaveLength(1);
  });

  it("removes trips with absent coordinates", () => {
    const trips = [makeTrip({ start_lat: null })];
    expect(tripDistancesKm(trips)[0]).toBeNaN();
    expect(filterTripsByDistance({ city: CITY, trips })).toHaveLength(0);
  });
});

describe("stage composition", () => {
  const stations: StationRecord[] = [
    { lat: 40.7, lng: -74.02 },
    { lat: 40.8, lng: -73.9 },
  ];
  const trips = [
    makeTrip({ ride_id: "A" }),
    makeTrip({ ride_id: "A" }),
    makeTrip({ ride_id: "B", start_lat: null }),
    makeTrip({ ride_id: "C", end_lat: 41.5 }),
    makeTrip({ ride_id: "D", ended_at: new Date(Date.UTC(2024, 8, 3, 8, 0, 0)) }),
    makeTrip({ ride_id: "E", start_lat: 40.7527, start_lng: -73.9772 }),
  ];

  const stages: Array<(input: readonly TripRecord[]) => TripRecord[]> = [
    (input) => filterDuplicates({ city: CITY, trips: input }),
    (input) => filterMissingValues({ city: CITY, trips: input }),
    (input) => filterTripsByGeolocationBounds({ city: CITY, trips: input, stations }),
    (input) => filterTripsByDuration({ city: CITY, trips: input }),
    (input) => filterTripsByDistance({ city: CITY, trips: input }),
  ];

  it("never grows the collection", () => {
    for (const stage of stages) {
      expect(stage(trips).length).toBeLessThanOrEqual(trips.length);
    }
  });

  it("reaches the same survivors in reverse order", () => {
    const forward = stages.reduce<readonly TripRecord[]>((acc, stage) => stage(acc), trips);
    const reverse = [...stages].reverse().reduce<readonly TripRecord[]>((acc, stage) => stage(acc), trips);

    expect(rideIds(forward)).toEqual(["A"]);
    expect(rideIds(reverse)).toEqual(["A"]);
  });
});
