/**
 * Batched deletion and creation against an OSM API server.
 *
 * Batches run strictly one after another: creations depend on the ids
 * returned by earlier batches, and a batch is never resubmitted.
 */

import type { OsmApi } from "@sandbox-mirror/clients-core";
import type { ElementCollection } from "../elements/collection.js";
import { compareForCreate, compareForDelete } from "../elements/element.js";
import { IdMap, applyIdMap, assignPlaceholders } from "../renumber/id-map.js";
import { withChangeset } from "../upload/changeset.js";

/** Fallback capacity when a server does not advertise one */
export const DEFAULT_CHANGESET_CAPACITY = 10000;

export interface BatchOptions {
  comment: string;
  createdBy: string;
  /** Capacity to assume when the server does not advertise one */
  defaultCapacity?: number;
}

export interface UploadResult {
  batches: number;
  /** Original donor ids to the ids created on the server */
  idMap: IdMap;
}

/** Split into consecutive slices of at most `size` items */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Maximum number of elements per changeset, from the server's
 * capabilities.
 */
export async function getChangesetCapacity(
  api: OsmApi,
  fallback: number = DEFAULT_CHANGESET_CAPACITY
): Promise<number> {
  const { maxChangesetElements } = await api.getCapabilities();
  if (maxChangesetElements === undefined) {
    console.warn(`[api] Failed to get maximum changeset size, using ${fallback.toLocaleString()}`);
    return fallback;
  }
  return maxChangesetElements;
}

/**
 * Delete every element of the collection from the server.
 *
 * Referencing elements go first (relations, then ways, then nodes), in
 * batches sized by the server's capacity, one changeset per batch.
 *
 * @returns Number of batches uploaded
 */
export async function deleteElements(
  collection: ElementCollection,
  api: OsmApi,
  options: BatchOptions
): Promise<number> {
  const capacity = await getChangesetCapacity(api, options.defaultCapacity);
  const batches = chunk(collection.values().sort(compareForDelete), capacity);

  for (const [index, batch] of batches.entries()) {
    console.log(
      `[mirror] Deleting batch ${index + 1}/${batches.length} (${batch.length.toLocaleString()} elements)`
    );
    await withChangeset(api, options, (scope) => scope.upload("delete", batch));
  }
  return batches.length;
}

/**
 * Create every element of the collection on the target server.
 *
 * Elements are sorted for creation, renumbered with placeholders, and
 * uploaded in batches sized by `capacityApi`'s capacity. After each
 * batch the returned ids are applied to every element not yet uploaded,
 * so later batches reference the real ids of earlier ones.
 *
 * Elements are mutated in place.
 */
export async function uploadElements(
  collection: ElementCollection,
  targetApi: OsmApi,
  capacityApi: OsmApi,
  options: BatchOptions
): Promise<UploadResult> {
  const capacity = await getChangesetCapacity(capacityApi, options.defaultCapacity);
  const values = collection.values().sort(compareForCreate);
  const placeholders = assignPlaceholders(values);
  const created = new IdMap();

  const batches = chunk(values, capacity);
  let uploaded = 0;
  for (const [index, batch] of batches.entries()) {
    console.log(
      `[mirror] Uploading batch ${index + 1}/${batches.length} (${batch.length.toLocaleString()} elements)`
    );
    const idMap = await withChangeset(targetApi, options, (scope) => scope.upload("create", batch));
    uploaded += batch.length;
    applyIdMap(values.slice(uploaded), idMap);
    created.extend(idMap);
  }

  // Donor id → placeholder → real id
  const idMap = new IdMap();
  for (const { type, oldId, newId } of placeholders.entries()) {
    const real = created.get(type, newId);
    if (real !== undefined) idMap.set(type, oldId, real);
  }
  return { batches: batches.length, idMap };
}
