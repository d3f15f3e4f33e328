import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ApiError } from "@sandbox-mirror/clients-core";
import { fetchByBbox } from "./api.js";
import { RateLimitedError } from "../errors.js";
import { FakeOsmApi, mapBody, node, way } from "../testing.js";

describe("fetchByBbox", () => {
  let api: FakeOsmApi;

  beforeEach(() => {
    api = new FakeOsmApi();
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("parses a single map response", async () => {
    api.mapHandler = () => mapBody([node(1), node(2), way(3, [1, 2])]);

    const result = await fetchByBbox({ minLng: 10, minLat: 50, maxLng: 10.05, maxLat: 50.05 }, api);

    expect(result.keys()).toEqual(["node/1", "node/2", "way/3"]);
    expect(api.mapCalls).toHaveLength(1);
  });

  it("splits into four quadrants when the area is too large", async () => {
    api.mapHandler = (bbox) => {
      if (bbox.maxLng - bbox.minLng === 1) {
        throw new ApiError("GET", "/map", 400, "You requested too many nodes");
      }
      // Every quadrant sees the shared way and its own corner node
      return mapBody([node(100), node(bbox.minLng * 10 + bbox.minLat * 20), way(7, [100])]);
    };

    const result = await fetchByBbox({ minLng: 0, minLat: 0, maxLng: 1, maxLat: 1 }, api);

    expect(api.mapCalls).toHaveLength(5);
    expect(api.mapCalls.slice(1)).toEqual([
      { minLng: 0, minLat: 0, maxLng: 0.5, maxLat: 0.5 },
      { minLng: 0, minLat: 0.5, maxLng: 0.5, maxLat: 1 },
      { minLng: 0.5, minLat: 0, maxLng: 1, maxLat: 0.5 },
      { minLng: 0.5, minLat: 0.5, maxLng: 1, maxLat: 1 },
    ]);
    expect(result.keys()).toEqual(["node/100", "node/0", "way/7", "node/10", "node/5", "node/15"]);
  });

  it("treats a blocked response as fatal", async () => {
    api.mapHandler = () => {
      throw new ApiError("GET", "/map", 509, "Bandwidth limit exceeded\n");
    };

    const err = await fetchByBbox({ minLng: 0, minLat: 0, maxLng: 1, maxLat: 1 }, api).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(RateLimitedError);
    expect(err).toHaveProperty(
      "message",
      "You have been blocked from the API for downloading too much: Bandwidth limit exceeded"
    );
    expect(api.mapCalls).toHaveLength(1);
  });

  it("rethrows other API errors unchanged", async () => {
    const failure = new ApiError("GET", "/map", 500, "oops");
    api.mapHandler = () => {
      throw failure;
    };

    await expect(fetchByBbox({ minLng: 0, minLat: 0, maxLng: 1, maxLat: 1 }, api)).rejects.toBe(
      failure
    );
  });
});
