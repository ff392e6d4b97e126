import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { compactText, dedupePreserveOrder, isFragmentEmpty, mergeFragments } from "@/lib/graph";

describe("graph helpers", () => {
  it("compacts whitespace and truncates long text", () => {
    assert.equal(compactText("  INSR \n activates   IRS1 "), "INSR activates IRS1");
    assert.equal(compactText("abcdefghij", 5), "abcd…");
  });

  it("dedupes while keeping first occurrence order", () => {
    assert.deepEqual(dedupePreserveOrder(["b", "a", "b", "c", "a"]), ["b", "a", "c"]);
  });

  it("merges fragments by node id and edge key", () => {
    const merged = mergeFragments([
      {
        nodes: [{ id: "INSR", labels: ["Gene"], pathways: ["Insulin signaling pathway"] }],
        edges: [{ source: "INSR", target: "IRS1", relation: "activation" }],
      },
      {
        nodes: [{ id: "INSR", labels: ["Gene"], pathways: ["Type II diabetes mellitus"] }],
        edges: [
          { source: "INSR", target: "IRS1", relation: "activation" },
          { source: "IRS1", target: "PIK3CA", relation: "activation" },
        ],
      },
    ]);

    assert.deepEqual(merged.nodes, [
      {
        id: "INSR",
        labels: ["Gene"],
        pathways: ["Insulin signaling pathway", "Type II diabetes mellitus"],
      },
      { id: "IRS1", labels: [], pathways: [] },
      { id: "PIK3CA", labels: [], pathways: [] },
    ]);
    assert.equal(merged.edges.length, 2);
  });

  it("reports empty fragments", () => {
    assert.equal(isFragmentEmpty({ nodes: [], edges: [] }), true);
    assert.equal(isFragmentEmpty(mergeFragments([])), true);
  });
});
