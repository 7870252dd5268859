import { degreesToRadians } from "@turf/helpers";

export const EARTH_RADIUS_KM = 6371;

/**
 * Great-circle distance in kilometers between two points in decimal degrees.
 * NaN in any input yields NaN.
 */
export function haversineDistance(lat1: number, lng1: number, lat2: number, lng2: number): number {
  const phi1 = degreesToRadians(lat1);
  const phi2 = degreesToRadians(lat2);
  const deltaPhi = degreesToRadians(lat2 - lat1);
  const deltaLambda = degreesToRadians(lng2 - lng1);

  const a =
    Math.sin(deltaPhi / 2) ** 2 + Math.cos(phi1) * Math.cos(phi2) * Math.sin(deltaLambda / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_KM * c;
}

export type CoordinateColumns = {
  startLat: ArrayLike<number>;
  startLng: ArrayLike<number>;
  endLat: ArrayLike<number>;
  endLng: ArrayLike<number>;
};

// Element-wise haversine over equal-length coordinate columns
export function haversineDistances(data: CoordinateColumns): Float64Array {
  const { startLat, startLng, endLat, endLng } = data;
  const length = startLat.length;
  if (startLng.length !== length || endLat.length !== length || endLng.length !== length) {
    throw new RangeError(
      `Coordinate columns differ in length: ${length}, ${startLng.length}, ${endLat.length}, ${endLng.length}`
    );
  }

  const distances = new Float64Array(length);
  for (let i = 0; i < length; i++) {
    distances[i] = haversineDistance(
      Number(startLat[i]),
      Number(startLng[i]),
      Number(endLat[i]),
      Number(endLng[i])
    );
  }
  return distances;
}
