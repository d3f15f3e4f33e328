import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ApiError } from "@sandbox-mirror/clients-core";
import { exportArea, mirrorArea } from "./mirror.js";
import { DEFAULT_CONFIG } from "../config.js";
import { ElementCollection } from "../elements/collection.js";
import { InvalidBboxError } from "../errors.js";
import { FakeOsmApi, mapBody, node, way } from "../testing.js";

const bbox = { minLng: 10, minLat: 50, maxLng: 10.05, maxLat: 50.05 };

function donor(count: number): ElementCollection {
  return ElementCollection.from(Array.from({ length: count }, (_, i) => node(i + 1)));
}

describe("mirrorArea", () => {
  let sandbox: FakeOsmApi;
  let production: FakeOsmApi;

  beforeEach(() => {
    sandbox = new FakeOsmApi();
    production = new FakeOsmApi();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("rejects an oversized bbox before any request", async () => {
    await expect(
      mirrorArea({ bbox: { minLng: 0, minLat: 0, maxLng: 1, maxLat: 1 }, sandbox, production })
    ).rejects.toBeInstanceOf(InvalidBboxError);
    expect(sandbox.mapCalls).toEqual([]);
  });

  it("uploads into an empty sandbox without deleting", async () => {
    production.capabilities = { maxChangesetElements: 10 };

    const result = await mirrorArea({
      bbox,
      sandbox,
      production,
      fetchDonor: async () => donor(25),
    });

    expect(result).toMatchObject({
      status: "uploaded",
      deleted: 0,
      deleteBatches: 0,
      created: 25,
      createBatches: Math.ceil(25 / 10),
    });
    expect(sandbox.uploads.every((u) => u.change.osmChange.delete === undefined)).toBe(true);
    expect(sandbox.opened.map((c) => c.changeset.osm.changeset[0]?.tag[0]?.$.v)).toEqual([
      "Copying data from OSM",
      "Copying data from OSM",
      "Copying data from OSM",
    ]);
  });

  it("clears existing data before uploading", async () => {
    sandbox.mapHandler = () => mapBody([node(501), node(502), way(600, [501, 502])]);
    const fetchDonor = vi.fn(async () => ElementCollection.from([node(1), node(2), way(3, [1, 2])]));

    const result = await mirrorArea({ bbox, sandbox, production, fetchDonor });

    expect(result).toMatchObject({ status: "uploaded", deleted: 3, deleteBatches: 1, created: 3 });
    expect(fetchDonor).toHaveBeenCalledWith(bbox);
    expect(sandbox.uploads[0]?.change.osmChange.delete).toBeDefined();
    expect(sandbox.uploadedIds(0, "way")).toEqual(["600"]);
    expect(sandbox.uploads[1]?.change.osmChange.create).toBeDefined();
    expect(sandbox.opened[0]?.changeset.osm.changeset[0]?.tag[0]?.$.v).toBe(
      "Clearing an area before uploading"
    );
  });

  it("stops without deleting when a large deletion is declined", async () => {
    sandbox.mapHandler = () =>
      mapBody(Array.from({ length: 10001 }, (_, i) => node(i + 1)));
    const confirm = vi.fn(async () => false);
    const fetchDonor = vi.fn(async () => donor(1));

    const result = await mirrorArea({ bbox, sandbox, production, confirm, fetchDonor });

    expect(result).toEqual({ status: "declined", existing: 10001 });
    expect(confirm).toHaveBeenCalledWith(10001);
    expect(sandbox.opened).toEqual([]);
    expect(sandbox.uploads).toEqual([]);
    expect(fetchDonor).not.toHaveBeenCalled();
  });

  it("deletes a large area once confirmed", async () => {
    sandbox.mapHandler = () => mapBody(Array.from({ length: 12 }, (_, i) => node(i + 1)));
    const config = { ...DEFAULT_CONFIG, confirmThreshold: 10 };

    const result = await mirrorArea({
      bbox,
      sandbox,
      production,
      config,
      confirm: async () => true,
      fetchDonor: async () => donor(0),
    });

    expect(result).toEqual({ status: "empty", deleted: 12, deleteBatches: 1 });
  });

  it("does not ask below the threshold", async () => {
    sandbox.mapHandler = () => mapBody([node(1)]);
    const confirm = vi.fn(async () => false);

    const result = await mirrorArea({ bbox, sandbox, production, confirm, fetchDonor: async () => donor(0) });

    expect(confirm).not.toHaveBeenCalled();
    expect(result.status).toBe("empty");
  });

  it("runs the configured filter stages on the donor data", async () => {
    const result = await mirrorArea({
      bbox,
      sandbox,
      production,
      stages: ["restrict-bbox"],
      fetchDonor: async () => ElementCollection.from([node(1), node(2, 60, 10)]),
    });

    expect(result).toMatchObject({
      status: "uploaded",
      created: 1,
      stages: [{ stage: "restrict-bbox", removed: 1 }],
    });
  });

  it("propagates upload failures", async () => {
    sandbox.uploadError = new ApiError("POST", "/changeset/100/upload", 500, "Internal error");

    await expect(
      mirrorArea({ bbox, sandbox, production, fetchDonor: async () => donor(3) })
    ).rejects.toThrow("Failed to upload 3 creations to changeset 100");
    expect(sandbox.closed).toEqual([100]);
  });
});

describe("exportArea", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "mirror-export-test-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("writes the renumbered donor data to a file", async () => {
    const path = join(dir, "out", "area.osc");

    const result = await exportArea({
      bbox,
      path,
      fetchDonor: async () => ElementCollection.from([way(3, [1, 2]), node(2), node(1)]),
    });

    expect(result).toEqual({ status: "exported", path, count: 3, stages: [] });
    const xml = readFileSync(path, "utf8");
    expect(xml).toContain('<osmChange version="0.6" generator="sandbox-mirror 1.0">');
    expect(xml).toContain('<way id="-3" changeset="1" visible="true">');
    expect(xml).toContain('<nd ref="-1"/>');
  });

  it("writes nothing for an empty area", async () => {
    const path = join(dir, "empty.osc");

    await expect(exportArea({ bbox, path, fetchDonor: async () => donor(0) })).resolves.toEqual({
      status: "empty",
    });
  });
});
