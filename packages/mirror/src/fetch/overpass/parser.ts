/**
 * Overpass JSON response parser.
 *
 * Converts `out meta` elements into OsmElements. Non-OSM elements
 * (areas, counts, timelines) are skipped.
 */

import type { OsmNode, OsmRelation, OsmWay } from "@sandbox-mirror/types";
import type { OverpassJson, OverpassNode, OverpassRelation, OverpassWay } from "overpass-ts";
import { ElementCollection } from "../../elements/collection.js";

export function parseOverpassNode(node: OverpassNode): OsmNode {
  return {
    type: "node",
    id: node.id,
    ...(node.version !== undefined ? { version: node.version } : {}),
    lat: node.lat,
    lon: node.lon,
    tags: { ...node.tags },
  };
}

export function parseOverpassWay(way: OverpassWay): OsmWay {
  return {
    type: "way",
    id: way.id,
    ...(way.version !== undefined ? { version: way.version } : {}),
    refs: [...way.nodes],
    tags: { ...way.tags },
  };
}

export function parseOverpassRelation(relation: OverpassRelation): OsmRelation {
  return {
    type: "relation",
    id: relation.id,
    ...(relation.version !== undefined ? { version: relation.version } : {}),
    members: relation.members.map(({ type, ref, role }) => ({ type, ref, role })),
    tags: { ...relation.tags },
  };
}

/** Collect the nodes, ways and relations of a response, keyed by type/id */
export function parseOverpassElements(response: OverpassJson): ElementCollection {
  const collection = new ElementCollection();
  for (const element of response.elements) {
    switch (element.type) {
      case "node":
        collection.add(parseOverpassNode(element as OverpassNode));
        break;
      case "way":
        collection.add(parseOverpassWay(element as OverpassWay));
        break;
      case "relation":
        collection.add(parseOverpassRelation(element as OverpassRelation));
        break;
    }
  }
  return collection;
}
