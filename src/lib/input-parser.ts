/**
 * Parsing of the interactive search prompt: "radius; latitude; longitude".
 */

import { z } from "zod";

export type ParsedInput =
  | { type: "quit" }
  | { type: "search"; radius: number; lat: number; lon: number }
  | { type: "invalid"; error: string };

const QUIT_COMMAND = "quit";
const FIELD_NAMES = ["radius", "latitude", "longitude"] as const;

export const searchInputSchema = z.object({
  radius: z
    .number()
    .finite({ message: "Radius must be a finite number" })
    .positive({ message: "Radius must be greater than 0" }),
  lat: z
    .number()
    .min(-90, { message: "Latitude must be between -90 and 90" })
    .max(90, { message: "Latitude must be between -90 and 90" }),
  lon: z
    .number()
    .min(-180, { message: "Longitude must be between -180 and 180" })
    .max(180, { message: "Longitude must be between -180 and 180" }),
});

// Decimal notation or Infinity; Number() alone would also take "0x10" or "0b1"
const DECIMAL_NUMBER = /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?|Infinity)$/;

function parseNumber(value: string): number | null {
  const trimmed = value.trim();
  if (!DECIMAL_NUMBER.test(trimmed)) return null;
  return Number(trimmed);
}

/**
 * Parse one line typed at the prompt.
 *
 * @example
 * parseSearchInput("100; 47.43; 19.26")
 * // { type: "search", radius: 100, lat: 47.43, lon: 19.26 }
 */
export function parseSearchInput(line: string): ParsedInput {
  const trimmed = line.trim();

  if (trimmed.toLowerCase() === QUIT_COMMAND) {
    return { type: "quit" };
  }

  const parts = trimmed.split(";");
  if (parts.length !== FIELD_NAMES.length) {
    return {
      type: "invalid",
      error: "Expected three values separated by semicolons: radius; latitude; longitude",
    };
  }

  const numbers: number[] = [];
  for (let i = 0; i < parts.length; i++) {
    const n = parseNumber(parts[i]);
    if (n === null) {
      return { type: "invalid", error: `The ${FIELD_NAMES[i]} is not a number` };
    }
    numbers.push(n);
  }

  const [radius, lat, lon] = numbers;
  const parsed = searchInputSchema.safeParse({ radius, lat, lon });
  if (!parsed.success) {
    return { type: "invalid", error: parsed.error.issues[0].message };
  }

  return { type: "search", ...parsed.data };
}
