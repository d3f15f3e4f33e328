/**
 * osmChange envelopes and changeset documents.
 */

import type {
  OsmChangeAction,
  RawChangeBlock,
  RawChangesetDocument,
  RawOsmChangeDocument,
} from "@sandbox-mirror/clients-core";
import type { ChangeRecord } from "../elements/element.js";

/** `<osm><changeset>` body for `PUT changeset/create` */
export function buildChangesetDocument(comment: string, createdBy: string): RawChangesetDocument {
  return {
    osm: {
      changeset: [
        {
          tag: [{ $: { k: "comment", v: comment } }, { $: { k: "created_by", v: createdBy } }],
        },
      ],
    },
  };
}

/**
 * Group records into one `<create>` or `<delete>` block.
 *
 * Kinds appear in the order of their first record, and records keep
 * their order within a kind, so a sorted batch stays sorted.
 */
function buildBlock(action: OsmChangeAction, records: readonly ChangeRecord[]): RawChangeBlock {
  const block: RawChangeBlock = action === "delete" ? { $: { "if-unused": "true" } } : {};
  for (const entry of records) {
    switch (entry.type) {
      case "node":
        (block.node ??= []).push(entry.record);
        break;
      case "way":
        (block.way ??= []).push(entry.record);
        break;
      case "relation":
        (block.relation ??= []).push(entry.record);
        break;
    }
  }
  return block;
}

/**
 * osmChange document holding a single homogeneous block.
 *
 * Deletions carry `if-unused` so the server skips anything still
 * referenced from outside the batch instead of failing it.
 */
export function buildOsmChange(
  action: OsmChangeAction,
  records: readonly ChangeRecord[],
  generator: string
): RawOsmChangeDocument {
  const envelope: RawOsmChangeDocument["osmChange"] = { $: { version: "0.6", generator } };
  envelope[action] = [buildBlock(action, records)];
  return { osmChange: envelope };
}
