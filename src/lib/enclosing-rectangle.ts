/**
 * Circle → lat/lon rectangle projection.
 *
 * The search index only answers `lat:[a TO b] AND lon:[c TO d]` queries, so a
 * radius search is turned into one rectangle, or two when the circle crosses
 * the antimeridian. The rectangles always contain the whole circle; the
 * corners that fall outside it are removed later by the distance filter.
 */

import { EARTH_CIRCUMFERENCE_KM, toRadians } from "@/lib/geo-utils";

export interface Bounds {
  latMin: number;
  latMax: number;
  lonMin: number;
  lonMax: number;
}

export type QueryRectangle =
  | { kind: "single"; bounds: Bounds }
  | {
      kind: "split";
      /** Piece from the western bound up to 180 */
      west: Bounds;
      /** Piece starting at -180 */
      east: Bounds;
    };

export const FULL_GLOBE: Readonly<Bounds> = Object.freeze({
  latMin: -90,
  latMax: 90,
  lonMin: -180,
  lonMax: 180,
});

const REL_TOLERANCE = 1e-9;

function isClose(a: number, b: number): boolean {
  return Math.abs(a - b) <= REL_TOLERANCE * Math.max(Math.abs(a), Math.abs(b));
}

function single(bounds: Bounds): QueryRectangle {
  return { kind: "single", bounds };
}

/**
 * Calculate the rectangle(s) enclosing a circle on the surface of the Earth.
 *
 * Every branch over-approximates: near the poles, or when the circle wraps
 * all the way around a line of latitude, the full longitude range is used.
 *
 * @param radius - Circle radius in km (> 0)
 * @param originLat - Circle centre latitude in degrees
 * @param originLon - Circle centre longitude in degrees
 */
export function enclosingRectangle(
  radius: number,
  originLat: number,
  originLon: number
): QueryRectangle {
  if (radius >= EARTH_CIRCUMFERENCE_KM / 2) {
    return single({ ...FULL_GLOBE });
  }

  // Linear approximation along a meridian
  const dLat = (radius / EARTH_CIRCUMFERENCE_KM) * 360;
  let latMin = originLat - dLat;
  let latMax = originLat + dLat;

  let poleReached = false;
  if (latMin <= -90 || isClose(latMin, -90)) {
    latMin = -90;
    poleReached = true;
  }
  if (latMax >= 90 || isClose(latMax, 90)) {
    latMax = 90;
    poleReached = true;
  }
  if (poleReached) {
    return single({ latMin, latMax, lonMin: -180, lonMax: 180 });
  }

  const smallCircumference = EARTH_CIRCUMFERENCE_KM * Math.cos(toRadians(originLat));
  if (radius >= smallCircumference / 2) {
    return single({ latMin, latMax, lonMin: -180, lonMax: 180 });
  }

  const dLon = (radius / smallCircumference) * 360;
  let lonMin = originLon - dLon;
  let lonMax = originLon + dLon;

  // dLon < 180 here, so at most one side can overflow
  if (lonMin < -180 || lonMax > 180) {
    if (lonMin < -180) lonMin += 360;
    if (lonMax > 180) lonMax -= 360;
    return {
      kind: "split",
      west: { latMin, latMax, lonMin, lonMax: 180 },
      east: { latMin, latMax, lonMin: -180, lonMax },
    };
  }

  return single({ latMin, latMax, lonMin, lonMax });
}

/**
 * Flatten a query rectangle into the list of bounds to query, west piece first.
 */
export function toQueryBounds(rectangle: QueryRectangle): Bounds[] {
  switch (rectangle.kind) {
    case "single":
      return [rectangle.bounds];
    case "split":
      return [rectangle.west, rectangle.east];
  }
}
