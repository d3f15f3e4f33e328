/**
 * XML (de)serialization of OSM API payloads via xml2js.
 */

import { Builder, parseStringPromise } from "xml2js";
import type {
  RawChangesetDocument,
  RawDiffResultBody,
  RawDiffResultDocument,
  RawOsmBody,
  RawOsmChangeDocument,
  RawOsmDocument,
} from "./types.js";

export interface BuildXmlOptions {
  /** Indent output for files meant to be read by people (default: false) */
  pretty?: boolean;
}

/** Parse an `<osm>` document (map data, capabilities, user details) */
export async function parseOsmDocument(text: string): Promise<RawOsmDocument> {
  const parsed: RawOsmDocument | null = await parseStringPromise(text);
  return parsed ?? {};
}

/** Parse the `<diffResult>` returned by a changeset upload */
export async function parseDiffResult(text: string): Promise<RawDiffResultDocument> {
  const parsed: RawDiffResultDocument | null = await parseStringPromise(text);
  return parsed ?? {};
}

/** Body of an `<osm>` document; empty when the root had no content */
export function osmBody(doc: RawOsmDocument): RawOsmBody {
  return typeof doc.osm === "object" ? doc.osm : {};
}

/** Body of a `<diffResult>` document; empty when the root had no content */
export function diffResultBody(doc: RawDiffResultDocument): RawDiffResultBody {
  return typeof doc.diffResult === "object" ? doc.diffResult : {};
}

/** Serialize a changeset or osmChange document */
export function buildXml(
  doc: RawOsmChangeDocument | RawChangesetDocument,
  options: BuildXmlOptions = {}
): string {
  const builder = new Builder({
    xmldec: { version: "1.0", encoding: "UTF-8" },
    renderOpts: { pretty: options.pretty ?? false, indent: "  ", newline: "\n" },
  });
  return builder.buildObject(doc);
}
