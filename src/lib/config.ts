/**
 * Airport database configuration, read from environment variables.
 *
 * The defaults point at the public, world-readable airport database, so no
 * configuration is needed to run a search.
 */

import { z } from "zod";

/** The search API refuses pages larger than this */
export const MAX_PAGE_SIZE = 200;

const nonEmpty = z.string().trim().min(1);

const envSchema = z.object({
  AIRPORT_DB_URL: z.string().url().default("https://mikerhodes.cloudant.com"),
  AIRPORT_DB_NAME: nonEmpty.default("airportdb"),
  AIRPORT_DB_DESIGN_DOC: nonEmpty.default("view1"),
  AIRPORT_DB_INDEX: nonEmpty.default("geo"),
  AIRPORT_DB_PAGE_SIZE: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(MAX_PAGE_SIZE),
  AIRPORT_DB_USERNAME: nonEmpty.optional(),
  AIRPORT_DB_PASSWORD: z.string().min(1).optional(),
});

export interface AirportDbConfig {
  /** Server root without trailing slash */
  url: string;
  database: string;
  designDoc: string;
  index: string;
  pageSize: number;
  credentials?: { username: string; password: string };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Build the database config from the environment.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AirportDbConfig {
  // Blank variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid airport database configuration (${details})`);
  }

  const data = parsed.data;
  if (Boolean(data.AIRPORT_DB_USERNAME) !== Boolean(data.AIRPORT_DB_PASSWORD)) {
    throw new ConfigError(
      "AIRPORT_DB_USERNAME and AIRPORT_DB_PASSWORD must be set together"
    );
  }

  return {
    url: data.AIRPORT_DB_URL.replace(/\/+$/, ""),
    database: data.AIRPORT_DB_NAME,
    designDoc: data.AIRPORT_DB_DESIGN_DOC,
    index: data.AIRPORT_DB_INDEX,
    pageSize: data.AIRPORT_DB_PAGE_SIZE,
    credentials:
      data.AIRPORT_DB_USERNAME && data.AIRPORT_DB_PASSWORD
        ? { username: data.AIRPORT_DB_USERNAME, password: data.AIRPORT_DB_PASSWORD }
        : undefined,
  };
}
