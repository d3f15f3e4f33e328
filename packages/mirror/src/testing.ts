/**
 * In-process stand-ins for tests: a fake OSM API server and element
 * builders.
 */

import {
  OSM_ELEMENT_TYPES,
  type BoundingBox,
  type OsmElement,
  type OsmElementType,
  type OsmNode,
  type OsmRelation,
  type OsmRelationMember,
  type OsmTags,
  type OsmWay,
} from "@sandbox-mirror/types";
import type {
  OsmApi,
  OsmCapabilities,
  RawChangesetDocument,
  RawDiffResultBody,
  RawElementGroup,
  RawOsmBody,
  RawOsmChangeDocument,
} from "@sandbox-mirror/clients-core";
import { toCreatePayload } from "./elements/element.js";

export function node(id: number, lat = 50.01, lon = 10.01, tags: OsmTags = {}): OsmNode {
  return { type: "node", id, lat, lon, tags };
}

export function way(id: number, refs: number[], tags: OsmTags = {}): OsmWay {
  return { type: "way", id, refs, tags };
}

export function relation(id: number, members: OsmRelationMember[], tags: OsmTags = {}): OsmRelation {
  return { type: "relation", id, members, tags };
}

/** `<osm>` body holding the given elements, as `GET map` would return it */
export function mapBody(elements: OsmElement[]): RawOsmBody {
  const body: RawOsmBody = {};
  for (const element of elements) {
    const payload = toCreatePayload(element, 1);
    switch (payload.type) {
      case "node":
        (body.node ??= []).push(payload.record);
        break;
      case "way":
        (body.way ??= []).push(payload.record);
        break;
      case "relation":
        (body.relation ??= []).push(payload.record);
        break;
    }
  }
  return body;
}

export interface RecordedUpload {
  changeset: number;
  change: RawOsmChangeDocument;
}

/**
 * OSM API server held in memory.
 *
 * Created elements get ids counting up from 1000 (nodes), 2000 (ways)
 * and 3000 (relations); changesets count up from 100.
 */
export class FakeOsmApi implements OsmApi {
  capabilities: OsmCapabilities = {};
  mapHandler: (bbox: BoundingBox) => RawOsmBody = () => ({});
  closeError: Error | undefined;
  uploadError: Error | undefined;
  createError: Error | undefined;

  readonly mapCalls: BoundingBox[] = [];
  readonly opened: { id: number; changeset: RawChangesetDocument }[] = [];
  readonly uploads: RecordedUpload[] = [];
  readonly closed: number[] = [];

  private nextChangeset = 100;
  private nextIds: Record<OsmElementType, number> = { node: 1000, way: 2000, relation: 3000 };

  async getCapabilities(): Promise<OsmCapabilities> {
    return this.capabilities;
  }

  async getMap(bbox: BoundingBox): Promise<RawOsmBody> {
    this.mapCalls.push(bbox);
    return this.mapHandler(bbox);
  }

  async createChangeset(changeset: RawChangesetDocument): Promise<number> {
    if (this.createError) throw this.createError;
    const id = this.nextChangeset++;
    this.opened.push({ id, changeset });
    return id;
  }

  async uploadChangeset(id: number, change: RawOsmChangeDocument): Promise<RawDiffResultBody> {
    this.uploads.push({ changeset: id, change });
    if (this.uploadError) throw this.uploadError;

    const diff: RawDiffResultBody = {};
    const created = change.osmChange.create?.[0];
    const deleted = change.osmChange.delete?.[0];
    for (const type of OSM_ELEMENT_TYPES) {
      const entries = [
        ...recordIds(created, type).map((id) => ({
          $: { old_id: id, new_id: String(this.nextIds[type]++), new_version: "1" },
        })),
        ...recordIds(deleted, type).map((id) => ({ $: { old_id: id } })),
      ];
      if (entries.length > 0) diff[type] = entries;
    }
    return diff;
  }

  async closeChangeset(id: number): Promise<void> {
    if (this.closeError) throw this.closeError;
    this.closed.push(id);
  }

  async getUserDetails(): Promise<RawOsmBody> {
    return { user: [{ $: { id: "1", display_name: "tester" } }] };
  }

  /** Records of one kind in an upload's single block */
  uploadedIds(index: number, type: OsmElementType): string[] {
    const change = this.uploads[index]?.change.osmChange;
    return recordIds(change?.create?.[0] ?? change?.delete?.[0], type);
  }
}

function recordIds(group: RawElementGroup | undefined, type: OsmElementType): string[] {
  const records: { $: { id: string } }[] = group?.[type] ?? [];
  return records.map((record) => record.$.id);
}
