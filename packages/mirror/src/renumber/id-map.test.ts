import { describe, it, expect } from "vitest";
import type { OsmElement } from "@sandbox-mirror/types";
import { IdMap, applyIdMap, assignPlaceholders } from "./id-map.js";
import { compareForCreate } from "../elements/element.js";
import { MalformedRecordError } from "../errors.js";
import { node, relation, way } from "../testing.js";

describe("IdMap", () => {
  it("keys by type as well as id", () => {
    const map = new IdMap().set("node", 1, 100).set("way", 1, 200);

    expect(map.get("node", 1)).toBe(100);
    expect(map.get("way", 1)).toBe(200);
    expect(map.get("relation", 1)).toBeUndefined();
    expect(map.resolve("relation", 1)).toBe(1);
    expect(map.size).toBe(2);
  });

  it("extends cumulatively", () => {
    const total = new IdMap().set("node", -1, 10);
    total.extend(new IdMap().set("node", -2, 11));

    expect(total.entries()).toEqual([
      { type: "node", oldId: -1, newId: 10 },
      { type: "node", oldId: -2, newId: 11 },
    ]);
  });

  it("reads a diff result and skips deletions", () => {
    const map = IdMap.fromDiffResult({
      node: [
        { $: { old_id: "-1", new_id: "501", new_version: "1" } },
        { $: { old_id: "42" } },
      ],
      way: [{ $: { old_id: "-2", new_id: "77", new_version: "1" } }],
    });

    expect(map.entries()).toEqual([
      { type: "node", oldId: -1, newId: 501 },
      { type: "way", oldId: -2, newId: 77 },
    ]);
  });

  it("rejects malformed ids in a diff result", () => {
    expect(() =>
      IdMap.fromDiffResult({ node: [{ $: { old_id: "-1", new_id: "abc" } }] })
    ).toThrow(MalformedRecordError);
  });
});

describe("applyIdMap", () => {
  it("rewrites ids, way refs and typed member refs", () => {
    const elements: OsmElement[] = [
      node(1),
      way(1, [1, 2]),
      relation(5, [
        { type: "node", ref: 1, role: "stop" },
        { type: "way", ref: 1, role: "platform" },
      ]),
    ];
    const map = new IdMap().set("node", 1, 10).set("way", 1, 20);

    applyIdMap(elements, map);

    expect(elements).toEqual([
      node(10),
      way(20, [10, 2]),
      relation(5, [
        { type: "node", ref: 10, role: "stop" },
        { type: "way", ref: 20, role: "platform" },
      ]),
    ]);
  });
});

describe("assignPlaceholders", () => {
  it("numbers three points and a path -1 to -4 in sort order", () => {
    const elements: OsmElement[] = [way(10, [1, 2]), node(3), node(1), node(2)];
    const sorted = [...elements].sort(compareForCreate);

    const map = assignPlaceholders(sorted);

    expect(sorted).toEqual([node(-1), node(-2), node(-3), way(-4, [-1, -2])]);
    expect(map.get("node", 1)).toBe(-1);
    expect(map.get("way", 10)).toBe(-4);
  });

  it("leaves references to elements outside the set untouched", () => {
    const elements: OsmElement[] = [node(1), way(10, [1, 99])];

    assignPlaceholders(elements);

    expect(elements[1]).toEqual(way(-2, [-1, 99]));
  });

  it("maps relation members across kinds with one consistent table", () => {
    const elements: OsmElement[] = [
      node(7),
      way(7, [7]),
      relation(7, [
        { type: "way", ref: 7, role: "outer" },
        { type: "relation", ref: 7, role: "subarea" },
      ]),
    ];

    assignPlaceholders(elements);

    expect(elements).toEqual([
      node(-1),
      way(-2, [-1]),
      relation(-3, [
        { type: "way", ref: -2, role: "outer" },
        { type: "relation", ref: -3, role: "subarea" },
      ]),
    ]);
  });
});
