/**
 * Download from an OSM API 0.6 server (the sandbox) by bounding box.
 */

import type { BoundingBox } from "@sandbox-mirror/types";
import { ApiError, type OsmApi } from "@sandbox-mirror/clients-core";
import { fmtBbox, splitBbox } from "../bbox/index.js";
import { ElementCollection } from "../elements/collection.js";
import { parseApiElements } from "../elements/element.js";
import { RateLimitedError } from "../errors.js";

/** HTTP status for "area too large" / "too many nodes" on `GET map` */
const AREA_TOO_LARGE = 400;
/** HTTP status for "bandwidth limit exceeded" */
const BLOCKED = 509;

/**
 * Fetch every element in a bbox.
 *
 * When the server rejects the area as too large, the bbox is split into
 * quadrants and each is fetched recursively; results merge first-wins.
 * A blocked (509) response is fatal.
 */
export async function fetchByBbox(bbox: BoundingBox, api: OsmApi): Promise<ElementCollection> {
  try {
    const body = await api.getMap(bbox);
    return ElementCollection.from(parseApiElements(body));
  } catch (err) {
    if (!(err instanceof ApiError)) throw err;

    if (err.status === AREA_TOO_LARGE) {
      console.log(`[api] Area too large, splitting ${fmtBbox(bbox)} in four`);
      const merged = new ElementCollection();
      for (const part of splitBbox(bbox)) {
        merged.merge(await fetchByBbox(part, api));
      }
      return merged;
    }

    if (err.status === BLOCKED) {
      throw new RateLimitedError(
        `You have been blocked from the API for downloading too much: ${err.body.trim()}`,
        { cause: err }
      );
    }
    throw err;
  }
}
