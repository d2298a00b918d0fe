/**
 * Airport records as returned by the airport search index
 */
export interface Airport {
  /** Airport name (e.g., "Budapest Ferenc Liszt International") */
  name: string;
  /** Latitude in degrees, -90 to 90 */
  lat: number;
  /** Longitude in degrees, -180 to 180 */
  lon: number;
  /** Any further fields stored in the index are passed through untouched */
  [field: string]: unknown;
}

/**
 * An airport that passed the radius filter, with its distance from the origin
 */
export type AirportWithDistance = Airport & {
  /** Great-circle distance from the search origin in km */
  distance: number;
};
