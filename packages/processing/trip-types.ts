// Shared record types for the trip cleaning pipeline

// ============================================================================
// Columns
// ============================================================================

// Column order of both the raw trip CSVs and the cleaned output
export const TRIP_COLUMNS = [
  "ride_id",
  "rideable_type",
  "started_at",
  "ended_at",
  "start_station_name",
  "start_station_id",
  "end_station_name",
  "end_station_id",
  "start_lat",
  "start_lng",
  "end_lat",
  "end_lng",
  "member_casual",
] as const;

export type TripColumn = (typeof TRIP_COLUMNS)[number];

export const COORDINATE_COLUMNS = ["start_lat", "start_lng", "end_lat", "end_lng"] as const;

export type CoordinateColumn = (typeof COORDINATE_COLUMNS)[number];

// A row that is missing any of these cannot be placed on the map or timed
export const CRITICAL_COLUMNS = [
  "ride_id",
  "started_at",
  "ended_at",
  "start_lat",
  "start_lng",
  "end_lat",
  "end_lng",
] as const satisfies readonly TripColumn[];

export const MEMBER_CASUAL_VALUES = ["member", "casual"] as const;

export type MemberCasual = (typeof MEMBER_CASUAL_VALUES)[number];

// ============================================================================
// Raw Rows (as read from CSV, untyped)
// ============================================================================

export type RawRow = Record<string, string>;

// ============================================================================
// Typed Records
// ============================================================================

// Trip after type coercion. null means absent: empty CSV cells and the 0.0
// coordinate sentinel both end up here.
export type TripRecord = {
  ride_id: string | null;
  rideable_type: string | null;
  started_at: Date | null;
  ended_at: Date | null;
  start_station_name: string | null;
  start_station_id: string | null;
  end_station_name: string | null;
  end_station_id: string | null;
  start_lat: number | null;
  start_lng: number | null;
  end_lat: number | null;
  end_lng: number | null;
  member_casual: string | null;
};

// Trip that passed schema validation
export type CleanedTrip = {
  ride_id: string;
  rideable_type: string;
  started_at: Date;
  ended_at: Date;
  start_station_name: string | null;
  start_station_id: string | null;
  end_station_name: string | null;
  end_station_id: string | null;
  start_lat: number;
  start_lng: number;
  end_lat: number;
  end_lng: number;
  member_casual: MemberCasual;
};

export type StationRecord = {
  lat: number;
  lng: number;
};

export type StationBounds = {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
};
