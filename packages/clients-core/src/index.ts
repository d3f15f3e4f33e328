// Base
export { BaseClient, type ClientConfig, type RequestParams } from "./baseClient.js";
export { ApiError } from "./errors.js";

// OSM API 0.6
export {
  OsmApiClient,
  formatBboxParam,
  type OsmApi,
  type OsmCapabilities,
} from "./osmApiClient.js";

// XML
export {
  parseOsmDocument,
  parseDiffResult,
  osmBody,
  diffResultBody,
  buildXml,
  type BuildXmlOptions,
} from "./xml.js";

// Types
export type {
  RawElementAttrs,
  RawTag,
  RawNodeRecord,
  RawWayRecord,
  RawMember,
  RawRelationRecord,
  RawElementGroup,
  RawApiLimits,
  RawOsmBody,
  RawOsmDocument,
  RawChangesetDocument,
  OsmChangeAction,
  RawChangeBlock,
  RawOsmChangeDocument,
  RawIdMapAttrs,
  RawDiffResultBody,
  RawDiffResultDocument,
} from "./types.js";
