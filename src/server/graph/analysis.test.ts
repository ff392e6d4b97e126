import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  degreeCentrality,
  nodeImpact,
  resolveNode,
  resolvePathway,
  shortestPath,
  subgraph,
} from "@/server/graph/analysis";
import { insulinFragment, insulinPathway } from "@/test-support/pathway-fixtures";

describe("graph analysis", () => {
  const fragment = insulinFragment();

  it("resolves node and pathway names case-insensitively", () => {
    assert.equal(resolveNode(fragment, "insr"), "INSR");
    assert.equal(resolveNode(fragment, "EGFR"), null);
    assert.equal(resolvePathway(fragment, "insulin signaling pathway"), insulinPathway);
  });

  it("follows edge direction when a directed path exists", () => {
    assert.deepEqual(shortestPath(fragment, "INSR", "GSK3B"), {
      nodes: ["INSR", "IRS1", "PIK3CA", "AKT1", "GSK3B"],
      relations: ["activation", "activation", "activation", "inhibition"],
      hops: 4,
      directed: true,
    });
  });

  it("falls back to an undirected path", () => {
    const path = shortestPath(fragment, "MAPK1", "GSK3B");
    assert.equal(path?.directed, false);
    assert.deepEqual(path?.nodes, ["MAPK1", "INSR", "IRS1", "PIK3CA", "AKT1", "GSK3B"]);
    assert.equal(shortestPath(fragment, "TNF", "INSR"), null);
  });

  it("ranks nodes by degree with name as tie-break", () => {
    assert.deepEqual(degreeCentrality(fragment, 2), [
      { node: "AKT1", inDegree: 1, outDegree: 1, degree: 2, centrality: 0.3333 },
      { node: "INSR", inDegree: 0, outDegree: 2, degree: 2, centrality: 0.3333 },
    ]);
  });

  it("extracts a k-hop neighbourhood in both directions", () => {
    const local = subgraph(fragment, "PIK3CA", 1);
    assert.deepEqual(
      local.nodes.map((node) => node.id),
      ["IRS1", "PIK3CA", "AKT1"],
    );
    assert.deepEqual(local.edges, [
      { source: "IRS1", target: "PIK3CA", relation: "activation" },
      { source: "PIK3CA", target: "AKT1", relation: "activation" },
    ]);
  });

  it("measures the impact of a pathway root", () => {
    assert.deepEqual(nodeImpact(fragment, "INSR", insulinPathway), {
      node: "INSR",
      pathway: insulinPathway,
      pathwayNodeCount: 5,
      descendantCount: 5,
      forestSubareaRatio: 1,
      rootToNode: null,
      nodeToLeaf: { min: 4, max: 4 },
      rootToLeaf: { min: 4, max: 4 },
      directlyImpactedNodes: ["IRS1"],
    });
  });

  it("measures the impact of an inner node", () => {
    const impact = nodeImpact(fragment, "PIK3CA", insulinPathway);
    assert.equal(impact.forestSubareaRatio, 0.6);
    assert.deepEqual(impact.rootToNode, { min: 2, max: 2 });
    assert.deepEqual(impact.nodeToLeaf, { min: 2, max: 2 });
    assert.deepEqual(impact.directlyImpactedNodes, ["AKT1"]);
  });
});
