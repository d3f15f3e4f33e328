/**
 * Top-level mirroring protocol.
 *
 * 1. Validate the bbox
 * 2. Fetch what the sandbox already has there (confirm above a threshold)
 * 3. Delete it
 * 4. Download the donor data and run the configured filter stages
 * 5. Stop if there is nothing to copy
 * 6–7. Renumber and upload in batches
 *
 * Any transport failure is fatal to the run; nothing is retried.
 */

import type { BoundingBox } from "@sandbox-mirror/types";
import type { OsmApi } from "@sandbox-mirror/clients-core";
import { fmtBbox, validateBbox } from "../bbox/index.js";
import { DEFAULT_CONFIG, type MirrorConfig } from "../config.js";
import type { ElementCollection } from "../elements/collection.js";
import { writeOsmChangeFile } from "../export/osc.js";
import { fetchByBbox } from "../fetch/api.js";
import { fetchByFilter } from "../fetch/overpass/query.js";
import { applyFilterStages, type FilterStageName, type FilterStageReport } from "../filters/index.js";
import type { IdMap } from "../renumber/id-map.js";
import { deleteElements, uploadElements } from "./batches.js";

/** Downloads the data to copy */
export type DonorFetcher = (bbox: BoundingBox) => Promise<ElementCollection>;

/** Asked before deleting more than `confirmThreshold` elements */
export type ConfirmDeletion = (count: number) => Promise<boolean>;

export interface DonorOptions {
  /** Overpass tag filter, e.g. `"building"` */
  filter?: string;
  /** Snapshot date (ISO 8601) */
  date?: string;
  /** Filter stages to run after download, in order */
  stages?: readonly FilterStageName[];
  /** Replaces the Overpass download (tests, other donors) */
  fetchDonor?: DonorFetcher;
}

export interface MirrorOptions extends DonorOptions {
  bbox: BoundingBox;
  /** Destination server, authorized */
  sandbox: OsmApi;
  /** Server whose changeset capacity sizes the create batches */
  production: OsmApi;
  config?: MirrorConfig;
  /** Defaults to declining */
  confirm?: ConfirmDeletion;
}

export type MirrorResult =
  | { status: "declined"; existing: number }
  | { status: "empty"; deleted: number; deleteBatches: number }
  | {
      status: "uploaded";
      deleted: number;
      deleteBatches: number;
      created: number;
      createBatches: number;
      stages: FilterStageReport[];
      idMap: IdMap;
    };

export interface ExportOptions extends DonorOptions {
  bbox: BoundingBox;
  /** Destination .osc file */
  path: string;
  config?: MirrorConfig;
}

export type ExportResult =
  | { status: "empty" }
  | { status: "exported"; path: string; count: number; stages: FilterStageReport[] };

const declineAll: ConfirmDeletion = async () => false;

async function downloadDonor(
  bbox: BoundingBox,
  options: DonorOptions,
  config: MirrorConfig
): Promise<{ elements: ElementCollection; stages: FilterStageReport[] }> {
  console.log("[mirror] Downloading new data.");
  const fetchDonor =
    options.fetchDonor ??
    ((area: BoundingBox) =>
      fetchByFilter(area, config.overpassEndpoint, {
        filter: options.filter,
        date: options.date,
        timeout: config.overpassTimeout,
        userAgent: config.createdBy,
      }));

  const elements = await fetchDonor(bbox);
  console.log(`[mirror] Downloaded ${elements.size.toLocaleString()} elements.`);

  const stages = applyFilterStages(elements, options.stages ?? [], bbox);
  for (const { stage, removed } of stages) {
    console.log(`[mirror] ${stage}: removed ${removed.toLocaleString()} elements`);
  }
  return { elements, stages };
}

/**
 * Replace the sandbox contents of a bbox with a copy of the donor data.
 */
export async function mirrorArea(options: MirrorOptions): Promise<MirrorResult> {
  const config = options.config ?? DEFAULT_CONFIG;
  const bbox = validateBbox(options.bbox, config.maxArea);
  const confirm = options.confirm ?? declineAll;
  console.log(`[mirror] Mirroring ${fmtBbox(bbox)}`);

  const existing = await fetchByBbox(bbox, options.sandbox);
  let deleted = 0;
  let deleteBatches = 0;
  if (existing.size === 0) {
    console.log("[mirror] Sandbox is empty there.");
  } else {
    if (existing.size > config.confirmThreshold && !(await confirm(existing.size))) {
      console.log("[mirror] Aborted, nothing was deleted.");
      return { status: "declined", existing: existing.size };
    }
    console.log(`[mirror] Clearing the area: ${existing.size.toLocaleString()} elements.`);
    deleteBatches = await deleteElements(existing, options.sandbox, {
      comment: config.deleteComment,
      createdBy: config.createdBy,
      defaultCapacity: config.defaultCapacity,
    });
    deleted = existing.size;
  }

  const { elements, stages } = await downloadDonor(bbox, options, config);
  if (elements.size === 0) {
    console.log("[mirror] No elements in the given bounding box.");
    return { status: "empty", deleted, deleteBatches };
  }

  console.log("[mirror] Uploading new data.");
  const { batches, idMap } = await uploadElements(elements, options.sandbox, options.production, {
    comment: config.createComment,
    createdBy: config.createdBy,
    defaultCapacity: config.defaultCapacity,
  });
  console.log("[mirror] Done.");

  return {
    status: "uploaded",
    deleted,
    deleteBatches,
    created: elements.size,
    createBatches: batches,
    stages,
    idMap,
  };
}

/**
 * Download the donor data and write it as an osmChange file instead of
 * uploading. The sandbox is never contacted.
 */
export async function exportArea(options: ExportOptions): Promise<ExportResult> {
  const config = options.config ?? DEFAULT_CONFIG;
  const bbox = validateBbox(options.bbox, config.maxArea);

  const { elements, stages } = await downloadDonor(bbox, options, config);
  if (elements.size === 0) {
    console.log("[mirror] No elements in the given bounding box.");
    return { status: "empty" };
  }

  writeOsmChangeFile(elements.values(), options.path, config.createdBy);
  return { status: "exported", path: options.path, count: elements.size, stages };
}
