/**
 * Printable output for search results.
 */

import { find } from "geo-tz";
import type { AirportWithDistance } from "@/types/airport";

/**
 * Look up the IANA timezone for a coordinate.
 * Returns undefined if the point is not covered by any zone.
 */
export function getAirportTimezone(lat: number, lon: number): string | undefined {
  // The first zone is the most relevant for the exact point
  return find(lat, lon)[0];
}

/**
 * Format one result line.
 *
 * Example: "1. Budapest (47.4369, 19.2556) 12.34 km [Europe/Budapest]"
 */
export function formatAirportLine(
  airport: AirportWithDistance,
  index: number,
  lookupTimezone: (lat: number, lon: number) => string | undefined = getAirportTimezone
): string {
  const coords = `(${airport.lat.toFixed(4)}, ${airport.lon.toFixed(4)})`;
  const line = `${index + 1}. ${airport.name} ${coords} ${airport.distance.toFixed(2)} km`;
  const tz = lookupTimezone(airport.lat, airport.lon);
  return tz ? `${line} [${tz}]` : line;
}

export function formatSearchSummary(count: number, radius: number): string {
  const noun = count === 1 ? "airport" : "airports";
  return `Found ${count} ${noun} within ${radius} km`;
}

export function formatResults(airports: AirportWithDistance[], radius: number): string[] {
  return [
    formatSearchSummary(airports.length, radius),
    ...airports.map((airport, i) => formatAirportLine(airport, i)),
  ];
}
