/**
 * Optional post-download passes over the donor data.
 *
 * Each stage mutates the collection in place and returns how many
 * elements it removed. None runs unless configured.
 */

import type { BoundingBox } from "@sandbox-mirror/types";
import type { ElementCollection } from "../elements/collection.js";
import { isInside } from "../elements/element.js";

/**
 * Drop nodes outside the bbox, and relations that have a relation
 * member (nested relations would be clipped partially).
 */
export function restrictToBbox(collection: ElementCollection, bbox: BoundingBox): number {
  let removed = 0;
  for (const element of collection.values()) {
    const nested =
      element.type === "relation" && element.members.some((member) => member.type === "relation");
    if (!isInside(element, bbox) || nested) {
      collection.delete(element.type, element.id);
      removed++;
    }
  }
  return removed;
}

/**
 * Drop ways referencing a missing node, then relations referencing a
 * missing node or way.
 *
 * Single pass: a relation is checked against the ways that survived the
 * first step, but elements removed here do not cascade further.
 */
export function dropDanglingReferences(collection: ElementCollection): number {
  let removed = 0;
  const nodes = collection.idsOfType("node");
  for (const way of collection.ofType("way")) {
    if (way.refs.some((ref) => !nodes.has(ref))) {
      collection.delete("way", way.id);
      removed++;
    }
  }

  const ways = collection.idsOfType("way");
  for (const relation of collection.ofType("relation")) {
    const dangling = relation.members.some(
      (member) =>
        (member.type === "node" && !nodes.has(member.ref)) ||
        (member.type === "way" && !ways.has(member.ref))
    );
    if (dangling) {
      collection.delete("relation", relation.id);
      removed++;
    }
  }
  return removed;
}

/** Drop untagged nodes that no way or relation references */
export function dropUnreferencedBarePoints(collection: ElementCollection): number {
  const referenced = new Set<number>();
  for (const way of collection.ofType("way")) {
    for (const ref of way.refs) referenced.add(ref);
  }
  for (const relation of collection.ofType("relation")) {
    for (const member of relation.members) {
      if (member.type === "node") referenced.add(member.ref);
    }
  }

  let removed = 0;
  for (const node of collection.ofType("node")) {
    if (!referenced.has(node.id) && Object.keys(node.tags).length === 0) {
      collection.delete("node", node.id);
      removed++;
    }
  }
  return removed;
}

// ---------------------------------------------------------------------------
// Stage registry
// ---------------------------------------------------------------------------

export type FilterStage = (collection: ElementCollection, bbox: BoundingBox) => number;

export type FilterStageName = "restrict-bbox" | "drop-dangling" | "drop-orphans";

export const FILTER_STAGES: Record<FilterStageName, FilterStage> = {
  "restrict-bbox": restrictToBbox,
  "drop-dangling": (collection) => dropDanglingReferences(collection),
  "drop-orphans": (collection) => dropUnreferencedBarePoints(collection),
};

export const FILTER_STAGE_NAMES: readonly FilterStageName[] = [
  "restrict-bbox",
  "drop-dangling",
  "drop-orphans",
];

export function isFilterStageName(value: string): value is FilterStageName {
  return FILTER_STAGE_NAMES.some((name) => name === value);
}

export interface FilterStageReport {
  stage: FilterStageName;
  removed: number;
}

/** Run the named stages in order */
export function applyFilterStages(
  collection: ElementCollection,
  stages: readonly FilterStageName[],
  bbox: BoundingBox
): FilterStageReport[] {
  return stages.map((stage) => ({ stage, removed: FILTER_STAGES[stage](collection, bbox) }));
}
