/**
 * Identifier renumbering across the two id spaces of an upload:
 * negative placeholders assigned before upload, and the real ids the
 * server returns for each batch.
 */

import { elementKey, type ElementKey, type OsmElement, type OsmElementType } from "@sandbox-mirror/types";
import type { RawDiffResultBody } from "@sandbox-mirror/clients-core";
import { MalformedRecordError } from "../errors.js";

export interface IdMapEntry {
  type: OsmElementType;
  oldId: number;
  newId: number;
}

/** Integer remapping table keyed by `(type, oldId)` */
export class IdMap {
  private ids = new Map<ElementKey, IdMapEntry>();

  /**
   * Build a map from an upload's `<diffResult>`.
   *
   * Entries without `new_id` (deletions) are skipped.
   */
  static fromDiffResult(diff: RawDiffResultBody): IdMap {
    const map = new IdMap();
    for (const type of ["node", "way", "relation"] as const) {
      for (const { $ } of diff[type] ?? []) {
        if ($.new_id === undefined) continue;
        const oldId = Number($.old_id);
        const newId = Number($.new_id);
        if (!Number.isInteger(oldId) || !Number.isInteger(newId)) {
          throw new MalformedRecordError(`Invalid ${type} id pair in diff result: ${$.old_id} → ${$.new_id}`);
        }
        map.set(type, oldId, newId);
      }
    }
    return map;
  }

  get size(): number {
    return this.ids.size;
  }

  set(type: OsmElementType, oldId: number, newId: number): this {
    this.ids.set(elementKey(type, oldId), { type, oldId, newId });
    return this;
  }

  get(type: OsmElementType, oldId: number): number | undefined {
    return this.ids.get(elementKey(type, oldId))?.newId;
  }

  has(type: OsmElementType, oldId: number): boolean {
    return this.ids.has(elementKey(type, oldId));
  }

  /** Mapped id, or the id itself when the map does not cover it */
  resolve(type: OsmElementType, id: number): number {
    return this.get(type, id) ?? id;
  }

  entries(): IdMapEntry[] {
    return [...this.ids.values()];
  }

  /** Add every entry of another map; later entries replace earlier ones */
  extend(other: IdMap): this {
    for (const { type, oldId, newId } of other.entries()) {
      this.set(type, oldId, newId);
    }
    return this;
  }
}

/**
 * Rewrite ids and references in place.
 *
 * Element ids, way node refs and relation member refs covered by the map
 * are replaced; anything else is left as is.
 */
export function applyIdMap(elements: Iterable<OsmElement>, idMap: IdMap): void {
  for (const element of elements) {
    element.id = idMap.resolve(element.type, element.id);
    switch (element.type) {
      case "node":
        break;
      case "way":
        element.refs = element.refs.map((ref) => idMap.resolve("node", ref));
        break;
      case "relation":
        element.members = element.members.map((member) => ({
          ...member,
          ref: idMap.resolve(member.type, member.ref),
        }));
        break;
    }
  }
}

/**
 * Give every element a placeholder id (-1, -2, …) in the order given and
 * rewrite all references with the same mapping.
 *
 * Callers sort first (see compareForCreate); the order here is the
 * placeholder order.
 */
export function assignPlaceholders(elements: readonly OsmElement[]): IdMap {
  const idMap = new IdMap();
  let next = -1;
  for (const element of elements) {
    idMap.set(element.type, element.id, next);
    next--;
  }
  applyIdMap(elements, idMap);
  return idMap;
}
