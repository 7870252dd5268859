import { z } from "zod";
import { formatRowShare } from "./utils";
import {
  MEMBER_CASUAL_VALUES,
  type CleanedTrip,
  type TripRecord,
} from "./trip-types";

// Output contract for a cleaned trip collection
export const CleanedTripSchema = z.object({
  ride_id: z.string(),
  rideable_type: z.string(),
  started_at: z.date(),
  ended_at: z.date(),
  start_station_name: z.string().nullable(),
  start_station_id: z.string().nullable(),
  end_station_name: z.string().nullable(),
  end_station_id: z.string().nullable(),
  start_lat: z.number().finite(),
  end_lat: z.number().finite(),
  start_lng: z.number().finite(),
  end_lng: z.number().finite(),
  member_casual: z.enum(MEMBER_CASUAL_VALUES),
}) satisfies z.ZodType<CleanedTrip>;

export const CleanedTripCollectionSchema = z.array(CleanedTripSchema);

export type ValidationFailure = {
  // Row index in the validated collection; null for collection-level issues
  index: number | null;
  column: string | null;
  message: string;
};

export type ValidationOutcome =
  | { success: true; trips: CleanedTrip[] }
  | { success: false; failures: ValidationFailure[] };

function toFailure(issue: z.ZodIssue): ValidationFailure {
  const [index, column] = issue.path;
  return {
    index: typeof index === "number" ? index : null,
    column: typeof column === "string" ? column : null,
    message: issue.message,
  };
}

// Checked outside zod: array refinements are skipped once any element fails
export function findDuplicateRideIds(trips: readonly TripRecord[]): ValidationFailure[] {
  const firstSeenAt = new Map<string, number>();
  const failures: ValidationFailure[] = [];

  trips.forEach((trip, index) => {
    if (trip.ride_id === null) return;
    const first = firstSeenAt.get(trip.ride_id);
    if (first === undefined) {
      firstSeenAt.set(trip.ride_id, index);
    } else {
      failures.push({ index, column: "ride_id", message: `duplicate ride_id (first seen at row ${first})` });
    }
  });

  return failures;
}

export function validateCleanedTrips(trips: readonly TripRecord[]): ValidationOutcome {
  const result = CleanedTripCollectionSchema.safeParse(trips);
  const failures = [
    ...(result.success ? [] : result.error.issues.map(toFailure)),
    ...findDuplicateRideIds(trips),
  ];

  if (result.success && failures.length === 0) {
    return { success: true, trips: result.data };
  }
  return { success: false, failures };
}

// Groups failures by column and message, e.g. "3 rows (1.50%) with member_casual: Invalid enum value..."
export function summarizeValidationFailures(data: {
  failures: readonly ValidationFailure[];
  totalRows: number;
}): string[] {
  const { failures, totalRows } = data;
  const counts = new Map<string, number>();
  for (const failure of failures) {
    const key = `${failure.column ?? "(collection)"}: ${failure.message}`;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return Array.from(counts, ([key, count]) => `${formatRowShare(count, totalRows)} with ${key}`);
}
