/**
 * osmChange file export, for inspecting what would be uploaded.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { OsmElement } from "@sandbox-mirror/types";
import { buildXml } from "@sandbox-mirror/clients-core";
import { compareForCreate, toCreatePayload } from "../elements/element.js";
import { assignPlaceholders } from "../renumber/id-map.js";
import { buildOsmChange } from "../upload/osm-change.js";

/** Changeset id written into exported records */
const EXPORT_CHANGESET_ID = 1;

/**
 * Render elements as a pretty-printed `<create>` osmChange document.
 *
 * Elements are sorted and renumbered with placeholders (in place),
 * exactly as they would be before an upload.
 */
export function renderOsmChange(elements: OsmElement[], generator: string): string {
  const sorted = [...elements].sort(compareForCreate);
  assignPlaceholders(sorted);
  const change = buildOsmChange(
    "create",
    sorted.map((element) => toCreatePayload(element, EXPORT_CHANGESET_ID)),
    generator
  );
  return buildXml(change, { pretty: true });
}

/** Write elements to an .osc file, creating its directory if needed */
export function writeOsmChangeFile(elements: OsmElement[], path: string, generator: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, renderOsmChange(elements, generator) + "\n");
  console.log(`[mirror] Wrote ${elements.length.toLocaleString()} elements to ${path}`);
}
