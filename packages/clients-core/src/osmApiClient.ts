import type { BoundingBox } from "@sandbox-mirror/types";
import { BaseClient, type ClientConfig } from "./baseClient.js";
import type {
  RawChangesetDocument,
  RawDiffResultBody,
  RawOsmBody,
  RawOsmChangeDocument,
} from "./types.js";
import { buildXml, diffResultBody, osmBody, parseDiffResult, parseOsmDocument } from "./xml.js";

/** Server self-described limits relevant to uploads */
export interface OsmCapabilities {
  /** Maximum number of elements accepted in one changeset, when advertised */
  maxChangesetElements?: number;
}

/**
 * The OSM API 0.6 operations the mirror pipeline calls through.
 *
 * Implemented by OsmApiClient; tests substitute in-process fakes.
 */
export interface OsmApi {
  /** `GET capabilities` */
  getCapabilities(): Promise<OsmCapabilities>;
  /** `GET map?bbox=…` — every element in the box, plus referenced children */
  getMap(bbox: BoundingBox): Promise<RawOsmBody>;
  /** `PUT changeset/create` — returns the new changeset id */
  createChangeset(changeset: RawChangesetDocument): Promise<number>;
  /** `POST changeset/{id}/upload` — returns the diff result */
  uploadChangeset(id: number, change: RawOsmChangeDocument): Promise<RawDiffResultBody>;
  /** `PUT changeset/{id}/close` */
  closeChangeset(id: number): Promise<void>;
  /** `GET user/details` — requires authorization */
  getUserDetails(): Promise<RawOsmBody>;
}

/** Format a bbox as the API expects it: `minlon,minlat,maxlon,maxlat` */
export function formatBboxParam(bbox: BoundingBox): string {
  return `${bbox.minLng},${bbox.minLat},${bbox.maxLng},${bbox.maxLat}`;
}

export class OsmApiClient implements OsmApi {
  private capabilities: BaseClient;
  private map: BaseClient;
  private changeset: BaseClient;
  private user: BaseClient;

  constructor(config: ClientConfig) {
    this.capabilities = new BaseClient("capabilities", config);
    this.map = new BaseClient("map", config);
    this.changeset = new BaseClient("changeset", config);
    this.user = new BaseClient("user", config);
  }

  /** Update the Authorization header on every resource */
  public setAuthorization(authorization: string | undefined): void {
    for (const client of [this.capabilities, this.map, this.changeset, this.user]) {
      client.setAuthorization(authorization);
    }
  }

  public async getCapabilities(): Promise<OsmCapabilities> {
    const body = osmBody(await parseOsmDocument(await this.capabilities.get()));
    const raw = body.api?.[0]?.changesets?.[0]?.$?.maximum_elements;
    const max = raw === undefined ? NaN : Number.parseInt(raw, 10);
    return Number.isInteger(max) && max > 0 ? { maxChangesetElements: max } : {};
  }

  public async getMap(bbox: BoundingBox): Promise<RawOsmBody> {
    const text = await this.map.get({ query: { bbox: formatBboxParam(bbox) } });
    return osmBody(await parseOsmDocument(text));
  }

  public async createChangeset(changeset: RawChangesetDocument): Promise<number> {
    const text = await this.changeset.put({ path: "create", body: buildXml(changeset) });
    const id = Number(text.trim());
    if (!Number.isInteger(id) || id <= 0) {
      throw new Error(`Unexpected changeset id in response: ${text.trim()}`);
    }
    return id;
  }

  public async uploadChangeset(
    id: number,
    change: RawOsmChangeDocument
  ): Promise<RawDiffResultBody> {
    const text = await this.changeset.post({ path: `${id}/upload`, body: buildXml(change) });
    return diffResultBody(await parseDiffResult(text));
  }

  public async closeChangeset(id: number): Promise<void> {
    await this.changeset.put({ path: `${id}/close` });
  }

  public async getUserDetails(): Promise<RawOsmBody> {
    return osmBody(await parseOsmDocument(await this.user.get({ path: "details" })));
  }
}
