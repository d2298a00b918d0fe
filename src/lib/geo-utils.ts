/**
 * Spherical geometry helpers shared by the rectangle projection and the
 * result filter. Everything here works on a perfect sphere.
 */

/** Mean Earth radius in km */
export const EARTH_RADIUS_KM = 6371.0088;

/** Great-circle circumference of the sphere in km */
export const EARTH_CIRCUMFERENCE_KM = 2 * Math.PI * EARTH_RADIUS_KM;

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Haversine distance between two points given in degrees.
 *
 * @returns Distance in km, always >= 0 for finite inputs
 */
export function calculateDistance(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number
): number {
  const dLat = toRadians(lat2 - lat1);
  const dLon = toRadians(lon2 - lon1);

  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(dLon / 2) ** 2;

  // Rounding can push `a` slightly above 1 for antipodal points
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(Math.min(1, a)));
}
