/**
 * Changeset-scoped uploads.
 *
 * A scope opens a changeset, allows exactly one homogeneous upload, and
 * closes the changeset on the way out whatever happened inside.
 */

import type { OsmElement } from "@sandbox-mirror/types";
import type { OsmApi, OsmChangeAction } from "@sandbox-mirror/clients-core";
import { toCreatePayload, toDeletePayload } from "../elements/element.js";
import { ChangesetError, errorMessage } from "../errors.js";
import { IdMap } from "../renumber/id-map.js";
import { buildChangesetDocument, buildOsmChange } from "./osm-change.js";

export interface ChangesetOptions {
  comment: string;
  /** `created_by` tag and osmChange generator */
  createdBy: string;
}

export interface ChangesetScope {
  /** Server-assigned changeset id */
  readonly id: number;
  /**
   * Upload one batch, all creations or all deletions.
   *
   * @returns Real ids for created elements, keyed by their submitted ids
   */
  upload(action: OsmChangeAction, elements: readonly OsmElement[]): Promise<IdMap>;
}

class ChangesetUploadScope implements ChangesetScope {
  private used = false;

  constructor(
    private readonly api: OsmApi,
    readonly id: number,
    private readonly createdBy: string
  ) {}

  async upload(action: OsmChangeAction, elements: readonly OsmElement[]): Promise<IdMap> {
    if (this.used) {
      throw new Error(`Changeset ${this.id} already received its upload`);
    }
    this.used = true;

    const toRecord = action === "create" ? toCreatePayload : toDeletePayload;
    const change = buildOsmChange(
      action,
      elements.map((element) => toRecord(element, this.id)),
      this.createdBy
    );

    try {
      const diff = await this.api.uploadChangeset(this.id, change);
      return IdMap.fromDiffResult(diff);
    } catch (err) {
      throw new ChangesetError(
        `Failed to upload ${elements.length.toLocaleString()} ${action === "create" ? "creations" : "deletions"} to changeset ${this.id}: ${errorMessage(err)}`,
        { cause: err }
      );
    }
  }
}

/**
 * Run `fn` inside a freshly opened changeset.
 *
 * The changeset is closed after `fn` settles; a failed close is logged
 * and never thrown, since the upload is already committed (or an earlier
 * error is already propagating).
 */
export async function withChangeset<T>(
  api: OsmApi,
  options: ChangesetOptions,
  fn: (scope: ChangesetScope) => Promise<T>
): Promise<T> {
  let id: number;
  try {
    id = await api.createChangeset(buildChangesetDocument(options.comment, options.createdBy));
  } catch (err) {
    throw new ChangesetError(`Failed to create a changeset: ${errorMessage(err)}`, { cause: err });
  }
  console.log(`[changeset] Opened ${id}`);

  try {
    return await fn(new ChangesetUploadScope(api, id, options.createdBy));
  } finally {
    try {
      await api.closeChangeset(id);
      console.log(`[changeset] Closed ${id}`);
    } catch (err) {
      console.warn(`[changeset] Failed to close changeset ${id}: ${errorMessage(err)}`);
    }
  }
}
