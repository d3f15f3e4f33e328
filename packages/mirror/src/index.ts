/**
 * @sandbox-mirror/mirror
 *
 * Copies OSM data inside a bounding box into the development sandbox.
 *
 * Pipeline:
 * 1. Validate bbox
 * 2. Fetch and delete what the sandbox has there (OSM API, split on "too large")
 * 3. Download the donor data (Overpass), optionally filtered
 * 4. Renumber with placeholders and upload in capacity-sized changesets
 */

// Configuration and errors
export { DEFAULT_CONFIG, resolveConfig, type MirrorConfig } from "./config.js";
export {
  InvalidBboxError,
  RateLimitedError,
  DonorFetchError,
  ChangesetError,
  MalformedRecordError,
  errorMessage,
} from "./errors.js";

// Elements
export * from "./elements/index.js";

// Bounding boxes
export {
  parseBbox,
  normalizeBbox,
  bboxArea,
  validateBbox,
  splitBbox,
  formatOverpassBbox,
  fmtBbox,
} from "./bbox/index.js";

// Fetching
export * from "./fetch/index.js";

// Filters
export * from "./filters/index.js";

// Renumbering and upload
export * from "./renumber/index.js";
export * from "./upload/index.js";

// Orchestration
export * from "./pipeline/index.js";
export * from "./export/index.js";
