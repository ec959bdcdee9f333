import { EARTH_RADIUS_KM } from "../types/constants";

type Coordinate = number | null | undefined;

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;

/**
 * Great-circle distance in kilometres, rounded to two decimals.
 * Returns undefined when any coordinate is missing.
 */
export function haversineKm(
  lat1: Coordinate,
  lon1: Coordinate,
  lat2: Coordinate,
  lon2: Coordinate
): number | undefined {
  if (lat1 == null || lon1 == null || lat2 == null || lon2 == null) {
    return undefined;
  }

  const dLat = toRadians(lat2 - lat1);
  const dLon = toRadians(lon2 - lon1);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(dLon / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return Math.round(EARTH_RADIUS_KM * c * 100) / 100;
}
