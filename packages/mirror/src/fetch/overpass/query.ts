/**
 * Overpass API query construction and execution.
 *
 * The donor download: everything in a bbox, optionally narrowed by a tag
 * filter and pinned to a past date, with all referenced children.
 */

import type { BoundingBox } from "@sandbox-mirror/types";
import axios from "axios";
import { OverpassRateLimitError, overpassJson } from "overpass-ts";
import type { OverpassJson, OverpassOptions as OverpassTsOptions } from "overpass-ts";
import { formatOverpassBbox } from "../../bbox/index.js";
import type { ElementCollection } from "../../elements/collection.js";
import { DonorFetchError, RateLimitedError, errorMessage } from "../../errors.js";
import { parseOverpassElements } from "./parser.js";

/** Options for the filter/snapshot query */
export interface FilterQueryOptions {
  /** Tag filter without brackets, e.g. `"highway"` or `"building"="yes"` */
  filter?: string;
  /** Snapshot date (ISO 8601) for a historic view of the data */
  date?: string;
  /** Query timeout in seconds (default: 300) */
  timeout?: number;
}

/** Options for Overpass API requests */
export interface DonorFetchOptions extends FilterQueryOptions {
  /** User-agent string */
  userAgent?: string;
}

const DEFAULT_TIMEOUT = 300;

/**
 * Build the Overpass QL query.
 *
 * `(_.;>;)` recurses down so every node of a way and every member of a
 * relation comes along; `out meta qt` includes versions.
 *
 * @param bbox - Bounding box (WGS84)
 * @param options - Filter, date and timeout
 * @returns Overpass QL query string
 */
export function buildFilterQuery(bbox: BoundingBox, options: FilterQueryOptions = {}): string {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;
  const date = options.date ? `[date:"${options.date}"]` : "";
  const filter = options.filter ? `[${options.filter}]` : "";
  return (
    `[out:json][timeout:${timeout}]${date}[bbox:${formatOverpassBbox(bbox)}];` +
    `(nwr${filter};);` +
    "(_.;>;);" +
    "out meta qt;"
  );
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/** Text of `{endpoint}/status`, for rate-limit diagnostics */
export async function fetchOverpassStatus(endpoint: string): Promise<string> {
  try {
    const res = await axios.get<string>(`${trimSlash(endpoint)}/status`, {
      responseType: "text",
      validateStatus: () => true,
    });
    return res.data;
  } catch (err) {
    return `status unavailable: ${errorMessage(err)}`;
  }
}

/**
 * Download elements from an Overpass instance.
 *
 * overpass-ts makes a single request, so rate limiting is fatal; the
 * server status is logged first.
 * Any other failure, including an area the server considers too large,
 * aborts with DonorFetchError.
 *
 * @param bbox - Bounding box to query
 * @param endpoint - Overpass API base URL, without `/interpreter`
 * @param options - Filter, date, timeout and user agent
 */
export async function fetchByFilter(
  bbox: BoundingBox,
  endpoint: string,
  options: DonorFetchOptions = {}
): Promise<ElementCollection> {
  const query = buildFilterQuery(bbox, options);

  const overpassOpts: Partial<OverpassTsOptions> = {
    endpoint: `${trimSlash(endpoint)}/interpreter`,
  };
  if (options.userAgent) {
    overpassOpts.userAgent = options.userAgent;
  }

  let data: OverpassJson;
  try {
    console.log(`[overpass] GET ${overpassOpts.endpoint}`);
    data = await overpassJson(query, overpassOpts);
  } catch (err) {
    if (err instanceof OverpassRateLimitError) {
      console.warn(`[overpass] ${(await fetchOverpassStatus(endpoint)).trim()}`);
      throw new RateLimitedError("You are rate limited by the Overpass API", { cause: err });
    }
    throw new DonorFetchError(`Could not download data from Overpass API: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  return parseOverpassElements(data);
}
