import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { fragmentFromRows } from "@/server/graph/fragment";

describe("fragmentFromRows", () => {
  it("collects nodes and edges from nested values and edge columns", () => {
    const fragment = fragmentFromRows([
      {
        gene: { name: "INSR", labels: ["Gene"], pathway_titles: ["Insulin signaling pathway"] },
        rel: { source: "INSR", target: "IRS1", relation: "activation" },
        partner: { name: "IRS1", labels: ["Gene"], pathway_titles: ["Insulin signaling pathway"] },
      },
      { source: "IRS1", target: "PIK3CA", relation: "activation" },
      { count: 3 },
    ]);

    assert.deepEqual(fragment.nodes, [
      { id: "INSR", labels: ["Gene"], pathways: ["Insulin signaling pathway"] },
      { id: "IRS1", labels: ["Gene"], pathways: ["Insulin signaling pathway"] },
      { id: "PIK3CA", labels: [], pathways: [] },
    ]);
    assert.deepEqual(fragment.edges, [
      { source: "INSR", target: "IRS1", relation: "activation" },
      { source: "IRS1", target: "PIK3CA", relation: "activation" },
    ]);
  });

  it("reads flattened paths", () => {
    const fragment = fragmentFromRows([
      {
        p: {
          nodes: [{ name: "AKT1" }, { name: "GSK3B" }],
          edges: [{ source: "AKT1", target: "GSK3B", relation: "inhibition" }],
        },
      },
    ]);
    assert.deepEqual(
      fragment.nodes.map((node) => node.id),
      ["AKT1", "GSK3B"],
    );
    assert.equal(fragment.edges[0]?.relation, "inhibition");
  });

  it("takes endpoints from node-shaped source and target", () => {
    const fragment = fragmentFromRows([
      { source: { name: "TNF" }, target: { name: "NFKB1" }, type: "activation" },
    ]);
    assert.deepEqual(fragment.edges, [{ source: "TNF", target: "NFKB1", relation: "activation" }]);
  });

  it("yields nothing for scalar rows", () => {
    assert.deepEqual(fragmentFromRows([{ gene: "INSR", total: 4 }]), { nodes: [], edges: [] });
  });
});
