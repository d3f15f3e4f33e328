/**
 * Raw XML shapes of OSM API 0.6 payloads, as produced and consumed by
 * xml2js with its default options (attributes under `$`, children as arrays).
 *
 * These mirror the wire format only; @sandbox-mirror/mirror converts them
 * into OsmElement values.
 */

// ---------------------------------------------------------------------------
// Elements
// ---------------------------------------------------------------------------

export interface RawElementAttrs {
  id: string;
  version?: string;
  changeset?: string;
  visible?: string;
  timestamp?: string;
  user?: string;
  uid?: string;
}

export interface RawTag {
  $: { k: string; v: string };
}

export interface RawNodeRecord {
  $: RawElementAttrs & { lat?: string; lon?: string };
  tag?: RawTag[];
}

export interface RawWayRecord {
  $: RawElementAttrs;
  tag?: RawTag[];
  nd?: { $: { ref: string } }[];
}

export interface RawMember {
  $: { type: string; ref: string; role?: string };
}

export interface RawRelationRecord {
  $: RawElementAttrs;
  tag?: RawTag[];
  member?: RawMember[];
}

export interface RawElementGroup {
  node?: RawNodeRecord[];
  way?: RawWayRecord[];
  relation?: RawRelationRecord[];
}

// ---------------------------------------------------------------------------
// <osm> documents (map, capabilities, user details)
// ---------------------------------------------------------------------------

export interface RawApiLimits {
  changesets?: { $?: { maximum_elements?: string } }[];
}

export interface RawOsmBody extends RawElementGroup {
  $?: Record<string, string>;
  api?: RawApiLimits[];
  user?: { $?: Record<string, string> }[];
}

/** An element without attributes or children parses to an empty string */
export interface RawOsmDocument {
  osm?: RawOsmBody | string;
}

// ---------------------------------------------------------------------------
// Changesets and uploads
// ---------------------------------------------------------------------------

export interface RawChangesetDocument {
  osm: {
    changeset: { tag: RawTag[] }[];
  };
}

export type OsmChangeAction = "create" | "delete";

/** One `<create>` or `<delete>` block; keys keep insertion order on output */
export interface RawChangeBlock extends RawElementGroup {
  $?: { "if-unused"?: "true" };
}

export interface RawOsmChangeDocument {
  osmChange: {
    $: { version: string; generator: string };
    create?: RawChangeBlock[];
    delete?: RawChangeBlock[];
  };
}

export interface RawIdMapAttrs {
  old_id: string;
  new_id?: string;
  new_version?: string;
}

export interface RawDiffResultBody {
  $?: Record<string, string>;
  node?: { $: RawIdMapAttrs }[];
  way?: { $: RawIdMapAttrs }[];
  relation?: { $: RawIdMapAttrs }[];
}

export interface RawDiffResultDocument {
  diffResult?: RawDiffResultBody | string;
}
