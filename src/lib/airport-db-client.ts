/**
 * Client for the Cloudant airport database search index.
 *
 * The index answers Lucene range queries only and returns at most 200 rows
 * per request, so every rectangle is fetched page by page using the
 * bookmark returned with each page. Pages and rectangle pieces are fetched
 * one after another; each request waits for the previous bookmark.
 */

import { z } from "zod";
import type { Airport } from "@/types/airport";
import type { AirportDbConfig } from "@/lib/config";
import { MAX_PAGE_SIZE } from "@/lib/config";
import type { Bounds, QueryRectangle } from "@/lib/enclosing-rectangle";
import { toQueryBounds } from "@/lib/enclosing-rectangle";
import { AirportSearchError, isAirportSearchError } from "@/lib/search-error";
import { getErrorMessage } from "@/lib/error-utils";

// =============================================================================
// Response validation
// =============================================================================

const searchRowSchema = z.object({
  id: z.string().optional(),
  fields: z
    .object({
      name: z.string(),
      lat: z.number(),
      lon: z.number(),
    })
    .passthrough(),
});

const searchResponseSchema = z.object({
  total_rows: z.number().int().nonnegative(),
  bookmark: z.string(),
  rows: z.array(searchRowSchema),
});

export interface SearchPage {
  totalRows: number;
  bookmark: string;
  airports: Airport[];
}

/**
 * Build the index query for one rectangle.
 *
 * Example: "lat:[46.55 TO 47.45] AND lon:[18.34 TO 19.66]"
 */
export function buildSearchQuery(bounds: Bounds): string {
  return (
    `lat:[${bounds.latMin} TO ${bounds.latMax}] AND ` +
    `lon:[${bounds.lonMin} TO ${bounds.lonMax}]`
  );
}

function basicAuthHeader(credentials: { username: string; password: string }): string {
  const token = Buffer.from(`${credentials.username}:${credentials.password}`).toString("base64");
  return `Basic ${token}`;
}

// =============================================================================
// Search session
// =============================================================================

/**
 * An open handle on the airport database.
 *
 * Creating a session does no I/O; connection and authentication problems
 * only show up once a query runs. Call `close()` when done: it aborts any
 * request still in flight and rejects further queries.
 */
export class SearchSession {
  private readonly config: AirportDbConfig;
  private readonly controller = new AbortController();
  private closed = false;

  constructor(config: AirportDbConfig) {
    this.config = config;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.controller.abort();
  }

  private searchUrl(query: string, bookmark?: string): string {
    const { url, database, designDoc, index } = this.config;
    const params = new URLSearchParams({
      q: query,
      limit: String(Math.min(this.config.pageSize, MAX_PAGE_SIZE)),
      include_docs: "false",
    });
    if (bookmark) {
      params.set("bookmark", bookmark);
    }
    return (
      `${url}/${encodeURIComponent(database)}/_design/${encodeURIComponent(designDoc)}` +
      `/_search/${encodeURIComponent(index)}?${params.toString()}`
    );
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new AirportSearchError("session-closed", "Search session is closed");
    }
  }

  // The abort signal also cancels reading the body, not only the request
  private closedDuringRequest(err: unknown): AirportSearchError {
    return new AirportSearchError("session-closed", "Search session was closed", { cause: err });
  }

  /**
   * Fetch a single page of results for a query.
   *
   * @param bookmark - Continuation token from the previous page, if any
   */
  async fetchPage(query: string, bookmark?: string): Promise<SearchPage> {
    this.ensureOpen();

    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.config.credentials) {
      headers.Authorization = basicAuthHeader(this.config.credentials);
    }

    let response: Response;
    try {
      response = await fetch(this.searchUrl(query, bookmark), {
        headers,
        signal: this.controller.signal,
      });
    } catch (err) {
      if (this.closed) {
        throw this.closedDuringRequest(err);
      }
      throw new AirportSearchError(
        "network",
        `Could not reach the airport database: ${getErrorMessage(err)}`,
        { cause: err }
      );
    }

    if (!response.ok) {
      const detail = await response.text().catch((err: unknown) => {
        if (this.closed) {
          throw this.closedDuringRequest(err);
        }
        return "";
      });
      throw new AirportSearchError(
        "http",
        `Airport database returned HTTP ${response.status} ${response.statusText}`.trim(),
        { status: response.status, cause: detail || undefined }
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      if (this.closed) {
        throw this.closedDuringRequest(err);
      }
      throw new AirportSearchError("malformed-response", "Airport database returned invalid JSON", {
        cause: err,
      });
    }

    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      const firstIssue = parsed.error.issues[0];
      throw new AirportSearchError(
        "malformed-response",
        `Unexpected search response: ${firstIssue.path.join(".")} ${firstIssue.message}`,
        { cause: parsed.error }
      );
    }

    return {
      totalRows: parsed.data.total_rows,
      bookmark: parsed.data.bookmark,
      airports: parsed.data.rows.map((row) => ({ ...row.fields })),
    };
  }

  /**
   * Fetch every result of one query, following bookmarks until the
   * reported total is reached.
   */
  async fetchAll(query: string): Promise<Airport[]> {
    const airports: Airport[] = [];
    let page = await this.fetchPage(query);
    airports.push(...page.airports);
    console.debug(`[AirportDb] ${query}: ${page.totalRows} rows`);

    while (airports.length < page.totalRows) {
      const bookmark = page.bookmark;
      page = await this.fetchPage(query, bookmark);
      if (page.airports.length === 0) {
        // Without new rows the bookmark never advances
        throw new AirportSearchError(
          "malformed-response",
          `Search ended after ${airports.length} of ${page.totalRows} rows`
        );
      }
      airports.push(...page.airports);
    }

    return airports;
  }

  /**
   * Fetch all airports inside the rectangle, one piece after the other.
   * Results of a split rectangle are concatenated west piece first.
   */
  async searchRectangle(rectangle: QueryRectangle): Promise<Airport[]> {
    const results: Airport[] = [];
    for (const bounds of toQueryBounds(rectangle)) {
      results.push(...(await this.fetchAll(buildSearchQuery(bounds))));
    }
    return results;
  }
}

export function openSearchSession(config: AirportDbConfig): SearchSession {
  return new SearchSession(config);
}

/**
 * Run `fn` with a fresh session that is closed however `fn` finishes.
 */
export async function withSearchSession<T>(
  config: AirportDbConfig,
  fn: (session: SearchSession) => Promise<T>
): Promise<T> {
  const session = openSearchSession(config);
  try {
    return await fn(session);
  } finally {
    session.close();
  }
}

/**
 * Wrap anything thrown during a search into an AirportSearchError.
 */
export function toAirportSearchError(error: unknown): AirportSearchError {
  if (isAirportSearchError(error)) {
    return error;
  }
  return new AirportSearchError("network", `Airport search failed: ${getErrorMessage(error)}`, {
    cause: error,
  });
}
