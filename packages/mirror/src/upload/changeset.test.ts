import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ApiError } from "@sandbox-mirror/clients-core";
import { withChangeset } from "./changeset.js";
import { ChangesetError } from "../errors.js";
import { FakeOsmApi, node, way } from "../testing.js";

const options = { comment: "Copying data from OSM", createdBy: "sandbox-mirror test" };

describe("withChangeset", () => {
  let api: FakeOsmApi;

  beforeEach(() => {
    api = new FakeOsmApi();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("opens, uploads once and closes", async () => {
    const idMap = await withChangeset(api, options, (scope) =>
      scope.upload("create", [node(-1), node(-2), way(-3, [-1, -2])])
    );

    expect(api.opened.map((c) => c.id)).toEqual([100]);
    expect(api.opened[0]?.changeset.osm.changeset[0]?.tag).toEqual([
      { $: { k: "comment", v: "Copying data from OSM" } },
      { $: { k: "created_by", v: "sandbox-mirror test" } },
    ]);
    expect(api.uploads).toHaveLength(1);
    expect(api.uploads[0]?.changeset).toBe(100);
    expect(api.uploads[0]?.change.osmChange.create?.[0]?.node?.[0]?.$.changeset).toBe("100");
    expect(api.closed).toEqual([100]);
    expect(idMap.entries()).toEqual([
      { type: "node", oldId: -1, newId: 1000 },
      { type: "node", oldId: -2, newId: 1001 },
      { type: "way", oldId: -3, newId: 2000 },
    ]);
  });

  it("returns an empty map for deletions", async () => {
    const idMap = await withChangeset(api, options, (scope) => scope.upload("delete", [node(5)]));

    expect(idMap.size).toBe(0);
    expect(api.uploadedIds(0, "node")).toEqual(["5"]);
  });

  it("refuses a second upload into the same changeset", async () => {
    await expect(
      withChangeset(api, options, async (scope) => {
        await scope.upload("delete", [node(1)]);
        await scope.upload("delete", [node(2)]);
      })
    ).rejects.toThrow("Changeset 100 already received its upload");
    expect(api.uploads).toHaveLength(1);
    expect(api.closed).toEqual([100]);
  });

  it("fails without uploading when the changeset cannot be opened", async () => {
    api.createError = new ApiError("PUT", "/changeset/create", 401, "Unauthorized");
    const fn = vi.fn();

    await expect(withChangeset(api, options, fn)).rejects.toThrow(
      new ChangesetError("Failed to create a changeset: PUT /changeset/create failed: 401 Unauthorized")
    );
    expect(fn).not.toHaveBeenCalled();
    expect(api.closed).toEqual([]);
  });

  it("closes the changeset when the upload fails", async () => {
    api.uploadError = new ApiError("POST", "/changeset/100/upload", 409, "Conflict");

    await expect(
      withChangeset(api, options, (scope) => scope.upload("create", [node(-1)]))
    ).rejects.toThrow(
      "Failed to upload 1 creations to changeset 100: POST /changeset/100/upload failed: 409 Conflict"
    );
    expect(api.closed).toEqual([100]);
  });

  it("downgrades a failed close to a warning", async () => {
    api.closeError = new Error("connection reset");

    const idMap = await withChangeset(api, options, (scope) => scope.upload("create", [node(-1)]));

    expect(idMap.get("node", -1)).toBe(1000);
    expect(console.warn).toHaveBeenCalledWith(
      "[changeset] Failed to close changeset 100: connection reset"
    );
  });
});
