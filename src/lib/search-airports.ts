import type { Airport, AirportWithDistance } from "@/types/airport";
import type { AirportDbConfig } from "@/lib/config";
import { loadConfig } from "@/lib/config";
import type { QueryRectangle } from "@/lib/enclosing-rectangle";
import { enclosingRectangle } from "@/lib/enclosing-rectangle";
import { filterAndSort } from "@/lib/airport-filter";
import {
  type SearchSession,
  toAirportSearchError,
  withSearchSession,
} from "@/lib/airport-db-client";
import type { AirportSearchError } from "@/lib/search-error";

export type SearchResult =
  | {
      success: true;
      airports: AirportWithDistance[];
      rectangle: QueryRectangle;
    }
  | {
      success: false;
      error: AirportSearchError;
    };

export interface SearchOptions {
  /** Reuse an open session; it is left open afterwards */
  session?: SearchSession;
  /** Config for a one-off session (defaults to the environment) */
  config?: AirportDbConfig;
}

// Resolved before the search starts: a ConfigError is not a database failure
function candidateFetcher(
  options: SearchOptions
): (rectangle: QueryRectangle) => Promise<Airport[]> {
  const { session } = options;
  if (session) {
    return (rectangle) => session.searchRectangle(rectangle);
  }
  const config = options.config ?? loadConfig();
  return (rectangle) =>
    withSearchSession(config, (oneOff) => oneOff.searchRectangle(rectangle));
}

/**
 * Find all airports within `radius` km of (lat, lon), nearest first.
 *
 * Inputs must already be validated: radius > 0, lat in [-90, 90],
 * lon in [-180, 180]. Database failures come back as `success: false`;
 * no partial results are returned.
 */
export async function searchAirports(
  radius: number,
  lat: number,
  lon: number,
  options: SearchOptions = {}
): Promise<SearchResult> {
  const rectangle = enclosingRectangle(radius, lat, lon);
  const fetchCandidates = candidateFetcher(options);

  try {
    const candidates = await fetchCandidates(rectangle);

    return {
      success: true,
      airports: filterAndSort(candidates, radius, lat, lon),
      rectangle,
    };
  } catch (err) {
    const error = toAirportSearchError(err);
    console.error(`[Search] ${error.kind} error:`, error.message);
    return { success: false, error };
  }
}
