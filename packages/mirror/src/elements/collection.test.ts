import { describe, it, expect } from "vitest";
import { ElementCollection } from "./collection.js";
import { node, relation, way } from "../testing.js";

describe("ElementCollection", () => {
  it("keys elements by type and id", () => {
    const collection = ElementCollection.from([node(1), way(1, [1]), relation(1, [])]);

    expect(collection.size).toBe(3);
    expect(collection.keys()).toEqual(["node/1", "way/1", "relation/1"]);
    expect(collection.get("way", 1)).toEqual(way(1, [1]));
    expect(collection.has("relation", 2)).toBe(false);
  });

  it("keeps the first element seen for a key", () => {
    const collection = new ElementCollection();

    expect(collection.add(node(1, 50, 10, { name: "first" }))).toBe(true);
    expect(collection.add(node(1, 51, 11, { name: "second" }))).toBe(false);
    expect(collection.get("node", 1)).toEqual(node(1, 50, 10, { name: "first" }));
  });

  it("merges and counts only new keys", () => {
    const collection = ElementCollection.from([node(1), node(2)]);
    const added = collection.merge(ElementCollection.from([node(2), node(3)]));

    expect(added).toBe(1);
    expect(collection.idsOfType("node")).toEqual(new Set([1, 2, 3]));
  });

  it("filters by type", () => {
    const collection = ElementCollection.from([node(1), way(2, [1]), node(3)]);

    expect(collection.ofType("node").map((n) => n.id)).toEqual([1, 3]);
    expect(collection.ofType("way")[0]?.refs).toEqual([1]);
  });

  it("deletes and iterates", () => {
    const collection = ElementCollection.from([node(1), node(2)]);

    expect(collection.delete("node", 1)).toBe(true);
    expect(collection.delete("node", 1)).toBe(false);
    expect([...collection].map((e) => e.id)).toEqual([2]);
  });
});
