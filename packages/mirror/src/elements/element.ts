/**
 * Element model: parsing from OSM API records, geometry checks, ordering
 * and the osmChange records used for deletion and creation.
 */

import type {
  BoundingBox,
  OsmElement,
  OsmElementType,
  OsmNode,
  OsmRelation,
  OsmRelationMember,
  OsmTags,
  OsmWay,
} from "@sandbox-mirror/types";
import type {
  RawElementAttrs,
  RawElementGroup,
  RawMember,
  RawNodeRecord,
  RawRelationRecord,
  RawTag,
  RawWayRecord,
} from "@sandbox-mirror/clients-core";
import { MalformedRecordError } from "../errors.js";

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export function isElementType(value: string): value is OsmElementType {
  return value === "node" || value === "way" || value === "relation";
}

function parseInteger(value: string | undefined, what: string): number {
  const parsed = value === undefined ? NaN : Number(value);
  if (!Number.isInteger(parsed)) {
    throw new MalformedRecordError(`Invalid ${what}: ${value ?? "(missing)"}`);
  }
  return parsed;
}

function parseCoordinate(value: string | undefined, what: string): number {
  const parsed = value === undefined ? NaN : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new MalformedRecordError(`Invalid ${what}: ${value ?? "(missing)"}`);
  }
  return parsed;
}

function parseTags(tags: RawTag[] | undefined): OsmTags {
  const result: OsmTags = {};
  for (const tag of tags ?? []) {
    result[tag.$.k] = tag.$.v;
  }
  return result;
}

function parseIdentity(attrs: RawElementAttrs, type: OsmElementType): { id: number; version?: number } {
  const id = parseInteger(attrs.id, `${type} id`);
  if (attrs.version === undefined) return { id };
  return { id, version: parseInteger(attrs.version, `${type}/${id} version`) };
}

export function parseApiNode(record: RawNodeRecord): OsmNode {
  const { id, version } = parseIdentity(record.$, "node");
  return {
    type: "node",
    id,
    ...(version !== undefined ? { version } : {}),
    lat: parseCoordinate(record.$.lat, `node/${id} lat`),
    lon: parseCoordinate(record.$.lon, `node/${id} lon`),
    tags: parseTags(record.tag),
  };
}

export function parseApiWay(record: RawWayRecord): OsmWay {
  const { id, version } = parseIdentity(record.$, "way");
  return {
    type: "way",
    id,
    ...(version !== undefined ? { version } : {}),
    refs: (record.nd ?? []).map((nd) => parseInteger(nd.$.ref, `way/${id} node ref`)),
    tags: parseTags(record.tag),
  };
}

function parseMember(member: RawMember, relationId: number): OsmRelationMember {
  const { type, ref, role } = member.$;
  if (!isElementType(type)) {
    throw new MalformedRecordError(`Invalid member type in relation/${relationId}: ${type}`);
  }
  return { type, ref: parseInteger(ref, `relation/${relationId} member ref`), role: role ?? "" };
}

export function parseApiRelation(record: RawRelationRecord): OsmRelation {
  const { id, version } = parseIdentity(record.$, "relation");
  return {
    type: "relation",
    id,
    ...(version !== undefined ? { version } : {}),
    members: (record.member ?? []).map((member) => parseMember(member, id)),
    tags: parseTags(record.tag),
  };
}

/** Parse every node, way and relation record of an `<osm>` body */
export function parseApiElements(group: RawElementGroup): OsmElement[] {
  return [
    ...(group.node ?? []).map(parseApiNode),
    ...(group.way ?? []).map(parseApiWay),
    ...(group.relation ?? []).map(parseApiRelation),
  ];
}

// ---------------------------------------------------------------------------
// Geometry and references
// ---------------------------------------------------------------------------

/**
 * Whether an element lies inside a bbox (edges included).
 *
 * Only nodes carry coordinates; ways and relations always pass and are
 * judged through their members.
 */
export function isInside(element: OsmElement, bbox: BoundingBox): boolean {
  if (element.type !== "node") return true;
  return (
    element.lon >= bbox.minLng &&
    element.lon <= bbox.maxLng &&
    element.lat >= bbox.minLat &&
    element.lat <= bbox.maxLat
  );
}

/** Outgoing references of an element: way node refs and relation members */
export function referencesOf(element: OsmElement): { type: OsmElementType; ref: number }[] {
  switch (element.type) {
    case "node":
      return [];
    case "way":
      return element.refs.map((ref) => ({ type: "node" as const, ref }));
    case "relation":
      return element.members.map(({ type, ref }) => ({ type, ref }));
  }
}

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

/** Referenced kinds rank before referencing kinds */
export const SORT_RANK: Record<OsmElementType, number> = {
  node: 0,
  way: 1,
  relation: 2,
};

export function sortKey(element: OsmElement): [rank: number, id: number] {
  return [SORT_RANK[element.type], element.id];
}

/** Creation order: nodes, then ways, then relations; ascending id within a kind */
export function compareForCreate(a: OsmElement, b: OsmElement): number {
  const [rankA, idA] = sortKey(a);
  const [rankB, idB] = sortKey(b);
  return rankA - rankB || idA - idB;
}

/** Deletion order: the exact reverse of creation order */
export function compareForDelete(a: OsmElement, b: OsmElement): number {
  return compareForCreate(b, a);
}

// ---------------------------------------------------------------------------
// osmChange records
// ---------------------------------------------------------------------------

/** One element inside a `<create>` or `<delete>` block */
export type ChangeRecord =
  | { type: "node"; record: RawNodeRecord }
  | { type: "way"; record: RawWayRecord }
  | { type: "relation"; record: RawRelationRecord };

function recordAttrs(element: OsmElement, changesetId: number, visible: boolean): RawElementAttrs {
  const attrs: RawElementAttrs = { id: String(element.id) };
  if (element.version !== undefined) attrs.version = String(element.version);
  attrs.changeset = String(changesetId);
  attrs.visible = String(visible);
  return attrs;
}

function tagRecords(tags: OsmTags): RawTag[] | undefined {
  const entries = Object.entries(tags);
  if (entries.length === 0) return undefined;
  return entries.map(([k, v]) => ({ $: { k, v } }));
}

/** Deletion stub: identity, version and changeset only */
export function toDeletePayload(element: OsmElement, changesetId: number): ChangeRecord {
  const $ = recordAttrs(element, changesetId, false);
  switch (element.type) {
    case "node":
      return { type: "node", record: { $ } };
    case "way":
      return { type: "way", record: { $ } };
    case "relation":
      return { type: "relation", record: { $ } };
  }
}

/** Full record: coordinates, every tag, node refs or members */
export function toCreatePayload(element: OsmElement, changesetId: number): ChangeRecord {
  const attrs = recordAttrs(element, changesetId, true);
  const tag = tagRecords(element.tags);

  switch (element.type) {
    case "node": {
      const record: RawNodeRecord = {
        $: { ...attrs, lat: String(element.lat), lon: String(element.lon) },
      };
      if (tag) record.tag = tag;
      return { type: "node", record };
    }
    case "way": {
      const record: RawWayRecord = { $: attrs };
      if (tag) record.tag = tag;
      if (element.refs.length > 0) {
        record.nd = element.refs.map((ref) => ({ $: { ref: String(ref) } }));
      }
      return { type: "way", record };
    }
    case "relation": {
      const record: RawRelationRecord = { $: attrs };
      if (tag) record.tag = tag;
      if (element.members.length > 0) {
        record.member = element.members.map(({ type, ref, role }) => ({
          $: { type, ref: String(ref), role },
        }));
      }
      return { type: "relation", record };
    }
  }
}
