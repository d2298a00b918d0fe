import { describe, it, expect } from "vitest";
import {
  enclosingRectangle,
  FULL_GLOBE,
  toQueryBounds,
  type Bounds,
  type QueryRectangle,
} from "../enclosing-rectangle";
import { EARTH_CIRCUMFERENCE_KM } from "../geo-utils";

// Helper to unwrap a single rectangle, failing the test otherwise
function expectSingle(rectangle: QueryRectangle): Bounds {
  expect(rectangle.kind).toBe("single");
  if (rectangle.kind !== "single") throw new Error("expected a single rectangle");
  return rectangle.bounds;
}

function expectBoundsCloseTo(actual: Bounds, expected: Bounds): void {
  expect(actual.latMin).toBeCloseTo(expected.latMin, 9);
  expect(actual.latMax).toBeCloseTo(expected.latMax, 9);
  expect(actual.lonMin).toBeCloseTo(expected.lonMin, 9);
  expect(actual.lonMax).toBeCloseTo(expected.lonMax, 9);
}

describe("enclosingRectangle", () => {
  describe("whole globe", () => {
    it("covers the globe when the radius exceeds half the circumference", () => {
      expect(enclosingRectangle(20100, 47, 19)).toEqual({
        kind: "single",
        bounds: { latMin: -90, latMax: 90, lonMin: -180, lonMax: 180 },
      });
    });

    it("covers the globe at exactly half the circumference", () => {
      const bounds = expectSingle(enclosingRectangle(EARTH_CIRCUMFERENCE_KM / 2, -12, 100));
      expect(bounds).toEqual(FULL_GLOBE);
    });

    it("returns a fresh object each time", () => {
      const bounds = expectSingle(enclosingRectangle(30000, 0, 0));
      expect(bounds).not.toBe(FULL_GLOBE);
    });
  });

  describe("normal case", () => {
    it("returns roughly one degree each way for 111 km at the origin", () => {
      const bounds = expectSingle(enclosingRectangle(111, 0, 0));
      expectBoundsCloseTo(bounds, {
        latMin: -0.9982456037342371,
        latMax: 0.9982456037342371,
        lonMin: -0.9982456037342371,
        lonMax: 0.9982456037342371,
      });
    });

    it("widens the longitude span away from the equator", () => {
      const bounds = expectSingle(enclosingRectangle(50, 47, 19));
      expectBoundsCloseTo(bounds, {
        latMin: 46.55033981813773,
        latMax: 47.44966018186227,
        lonMin: 18.340672634724427,
        lonMax: 19.659327365275573,
      });
    });
  });

  describe("pole coverage", () => {
    it("spans all longitudes when the north pole is reached", () => {
      const bounds = expectSingle(enclosingRectangle(100, 89.9, 0));
      expect(bounds.latMax).toBe(90);
      expect(bounds.latMin).toBeCloseTo(89.00067963627545, 9);
      expect(bounds.lonMin).toBe(-180);
      expect(bounds.lonMax).toBe(180);
    });

    it("spans all longitudes when the south pole is reached", () => {
      const bounds = expectSingle(enclosingRectangle(100, -89.5, 30));
      expect(bounds.latMin).toBe(-90);
      expect(bounds.latMax).toBeCloseTo(-89.5 + 0.8993203637245379, 9);
      expect(bounds.lonMin).toBe(-180);
      expect(bounds.lonMax).toBe(180);
    });

    it("treats reaching the pole within rounding as reaching it", () => {
      // One degree of latitude, so latMax lands on 90 give or take an ulp
      const bounds = expectSingle(enclosingRectangle(EARTH_CIRCUMFERENCE_KM / 360, 89, 45));
      expect(bounds.latMax).toBe(90);
      expect(bounds.latMin).toBeCloseTo(88, 9);
      expect(bounds.lonMin).toBe(-180);
      expect(bounds.lonMax).toBe(180);
    });

    it("clamps both poles for a near-global radius", () => {
      const bounds = expectSingle(enclosingRectangle(15000, 0, 0));
      expect(bounds).toEqual({ latMin: -90, latMax: 90, lonMin: -180, lonMax: 180 });
    });
  });

  describe("antimeridian wraparound", () => {
    it("splits when the eastern bound passes 180", () => {
      const rectangle = enclosingRectangle(50, 0, 179.9);
      expect(rectangle.kind).toBe("split");
      if (rectangle.kind !== "split") return;

      expectBoundsCloseTo(rectangle.west, {
        latMin: -0.44966018186226897,
        latMax: 0.44966018186226897,
        lonMin: 179.45033981813773,
        lonMax: 180,
      });
      expectBoundsCloseTo(rectangle.east, {
        latMin: -0.44966018186226897,
        latMax: 0.44966018186226897,
        lonMin: -180,
        lonMax: 179.9 + 0.44966018186226897 - 360,
      });
    });

    it("splits when the western bound passes -180", () => {
      const rectangle = enclosingRectangle(100, 10, -179.5);
      expect(rectangle.kind).toBe("split");
      if (rectangle.kind !== "split") return;

      expectBoundsCloseTo(rectangle.west, {
        latMin: 9.100679636275462,
        latMax: 10.899320363724538,
        lonMin: 179.58680617006334,
        lonMax: 180,
      });
      expectBoundsCloseTo(rectangle.east, {
        latMin: 9.100679636275462,
        latMax: 10.899320363724538,
        lonMin: -180,
        lonMax: -178.58680617006334,
      });
    });

    it("keeps both pieces on the same latitudes", () => {
      const rectangle = enclosingRectangle(300, -41, 178);
      if (rectangle.kind !== "split") throw new Error("expected a split rectangle");
      expect(rectangle.west.latMin).toBe(rectangle.east.latMin);
      expect(rectangle.west.latMax).toBe(rectangle.east.latMax);
      expect(rectangle.west.lonMin).toBeGreaterThan(rectangle.east.lonMax);
    });

    it("does not split when the circle stays inside the range", () => {
      expect(enclosingRectangle(10, 0, 179.9).kind).toBe("single");
    });
  });

  describe("invariants", () => {
    const cases: Array<[number, number, number]> = [
      [1, 0, 0],
      [250, 47.43, 19.26],
      [800, -33.95, 151.18],
      [5000, 64.1, -21.9],
      [120, 51.47, 179.99],
      [120, -17.75, -179.99],
    ];

    it.each(cases)("radius %s at (%s, %s) gives valid bounds", (radius, lat, lon) => {
      for (const bounds of toQueryBounds(enclosingRectangle(radius, lat, lon))) {
        expect(bounds.latMin).toBeLessThanOrEqual(bounds.latMax);
        expect(bounds.latMin).toBeGreaterThanOrEqual(-90);
        expect(bounds.latMax).toBeLessThanOrEqual(90);
        expect(bounds.lonMin).toBeGreaterThanOrEqual(-180);
        expect(bounds.lonMax).toBeLessThanOrEqual(180);
        expect(bounds.lonMin).toBeLessThanOrEqual(bounds.lonMax);
      }
    });

    it.each(cases)("radius %s at (%s, %s) contains the origin", (radius, lat, lon) => {
      const pieces = toQueryBounds(enclosingRectangle(radius, lat, lon));
      const containing = pieces.filter(
        (b) => lat >= b.latMin && lat <= b.latMax && lon >= b.lonMin && lon <= b.lonMax
      );
      expect(containing).toHaveLength(1);
    });
  });
});

describe("toQueryBounds", () => {
  it("returns the single rectangle", () => {
    const bounds = { latMin: 1, latMax: 2, lonMin: 3, lonMax: 4 };
    expect(toQueryBounds({ kind: "single", bounds })).toEqual([bounds]);
  });

  it("returns the west piece before the east piece", () => {
    const west = { latMin: 1, latMax: 2, lonMin: 179, lonMax: 180 };
    const east = { latMin: 1, latMax: 2, lonMin: -180, lonMax: -179 };
    expect(toQueryBounds({ kind: "split", west, east })).toEqual([west, east]);
  });
});
