/**
 * OSM element types shared by the fetchers, the uploader and the CLI.
 *
 * Elements are mutable: the renumbering step rewrites ids and references
 * in place between upload batches.
 */

/** The three OSM element kinds, in creation order */
export type OsmElementType = "node" | "way" | "relation";

export const OSM_ELEMENT_TYPES: readonly OsmElementType[] = ["node", "way", "relation"];

/** OSM tags as key-value pairs */
export type OsmTags = Record<string, string>;

interface OsmElementBase {
  id: number;
  /** Revision owned by the server the element was fetched from */
  version?: number;
  tags: OsmTags;
}

/** A located vertex */
export interface OsmNode extends OsmElementBase {
  type: "node";
  lat: number;
  lon: number;
}

/** An ordered sequence of node references */
export interface OsmWay extends OsmElementBase {
  type: "way";
  refs: number[];
}

export interface OsmRelationMember {
  type: OsmElementType;
  ref: number;
  role: string;
}

/** A collection of typed references with roles */
export interface OsmRelation extends OsmElementBase {
  type: "relation";
  members: OsmRelationMember[];
}

/** Union of all OSM element types */
export type OsmElement = OsmNode | OsmWay | OsmRelation;

/** Composite key, e.g. `"way/42"` */
export type ElementKey = `${OsmElementType}/${number}`;

export function elementKey(type: OsmElementType, id: number): ElementKey {
  return `${type}/${id}`;
}
