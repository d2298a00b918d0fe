import type { Airport, AirportWithDistance } from "@/types/airport";
import { calculateDistance } from "@/lib/geo-utils";

/**
 * Reduce the rectangle search results to the airports inside the circle.
 *
 * Each airport gets its distance from the origin attached; airports farther
 * than `radius` are dropped (exactly `radius` is kept). The result is sorted
 * by distance, keeping the incoming order for equal distances.
 */
export function filterAndSort(
  searchResults: readonly Airport[],
  radius: number,
  originLat: number,
  originLon: number
): AirportWithDistance[] {
  return searchResults
    .map((airport) => ({
      ...airport,
      distance: calculateDistance(originLat, originLon, airport.lat, airport.lon),
    }))
    .filter((airport) => airport.distance <= radius)
    .sort((a, b) => a.distance - b.distance);
}
