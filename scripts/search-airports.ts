#!/usr/bin/env npx tsx
import "dotenv/config";

/**
 * Search the airport database for airports within a radius of a point.
 *
 * Usage:
 *   npx tsx scripts/search-airports.ts                                  # Interactive prompt
 *   npx tsx scripts/search-airports.ts --radius=50 --lat=47 --lon=19   # Single search
 */

import { createInterface } from "node:readline/promises";
import { loadConfig } from "../src/lib/config";
import { openSearchSession, type SearchSession } from "../src/lib/airport-db-client";
import { parseSearchInput } from "../src/lib/input-parser";
import { searchAirports } from "../src/lib/search-airports";
import { formatResults } from "../src/lib/result-formatter";
import { describeError } from "../src/lib/error-utils";

// CLI argument types
interface ParsedArgs {
  radius?: string; // --radius=<km>
  lat?: string; // --lat=<deg>
  lon?: string; // --lon=<deg>
  help: boolean; // --help, -h
}

const PROMPT = "radius; latitude; longitude (or quit)> ";

function printUsage(): void {
  console.log(`
Find airports within a radius (km) of a point.

Usage:
  npx tsx scripts/search-airports.ts                                 # Interactive prompt
  npx tsx scripts/search-airports.ts --radius=<km> --lat=<deg> --lon=<deg>

Interactive input:
  100; 47.43; 19.26   Airports within 100 km of 47.43N 19.26E
  quit                Exit

Options:
  --help, -h       Show this help message

Environment:
  AIRPORT_DB_URL, AIRPORT_DB_NAME, AIRPORT_DB_DESIGN_DOC, AIRPORT_DB_INDEX,
  AIRPORT_DB_PAGE_SIZE, AIRPORT_DB_USERNAME, AIRPORT_DB_PASSWORD
`);
}

function parseArgs(): ParsedArgs {
  const args = process.argv.slice(2);
  const parsed: ParsedArgs = { help: false };

  for (const arg of args) {
    if (arg === "--help" || arg === "-h") {
      parsed.help = true;
    } else if (arg.startsWith("--radius=")) {
      parsed.radius = arg.split("=")[1];
    } else if (arg.startsWith("--lat=")) {
      parsed.lat = arg.split("=")[1];
    } else if (arg.startsWith("--lon=")) {
      parsed.lon = arg.split("=")[1];
    } else {
      console.error(`Unknown argument: ${arg}\n`);
      printUsage();
      process.exit(1);
    }
  }

  return parsed;
}

/**
 * Run one search line and print the outcome. Returns false on failure.
 */
async function runSearch(line: string, session: SearchSession): Promise<boolean> {
  const input = parseSearchInput(line);
  if (input.type === "quit") {
    return true;
  }
  if (input.type === "invalid") {
    console.error(`[CLI] ${input.error}`);
    return false;
  }

  const result = await searchAirports(input.radius, input.lat, input.lon, { session });
  if (!result.success) {
    console.error(`[CLI] Search failed: ${describeError(result.error)}`);
    return false;
  }

  for (const output of formatResults(result.airports, input.radius)) {
    console.log(output);
  }
  return true;
}

async function interactive(session: SearchSession): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt(PROMPT);
  rl.prompt();

  try {
    for await (const line of rl) {
      if (!line.trim()) {
        rl.prompt();
        continue;
      }
      if (parseSearchInput(line).type === "quit") {
        break;
      }
      await runSearch(line, session);
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}

async function main(): Promise<void> {
  const args = parseArgs();
  if (args.help) {
    printUsage();
    return;
  }

  const session = openSearchSession(loadConfig());
  try {
    if (args.radius !== undefined || args.lat !== undefined || args.lon !== undefined) {
      const ok = await runSearch(`${args.radius ?? ""};${args.lat ?? ""};${args.lon ?? ""}`, session);
      process.exitCode = ok ? 0 : 1;
      return;
    }

    await interactive(session);
    console.log("Bye!");
  } finally {
    session.close();
  }
}

main().catch((error) => {
  console.error("Fatal error:", describeError(error));
  process.exit(1);
});
