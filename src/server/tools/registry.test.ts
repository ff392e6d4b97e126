import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  createCapabilityRegistry,
  defaultCapabilities,
  rankCapabilities,
} from "@/server/tools/registry";

describe("createCapabilityRegistry", () => {
  it("looks capabilities up by name", () => {
    const registry = createCapabilityRegistry();
    assert.deepEqual(
      registry.list().map((capability) => capability.name),
      ["kegg_query", "gaf_query", "graph_analysis"],
    );
    assert.equal(registry.get("gaf_query")?.kind, "tabular_query");
    assert.equal(registry.get("kegg_lookup_v2"), undefined);
  });

  it("rejects duplicate names", () => {
    const [first] = defaultCapabilities;
    assert.ok(first);
    assert.throws(() => createCapabilityRegistry([first, first]), {
      message: 'Duplicate capability "kegg_query"',
    });
  });

  it("freezes its descriptors", () => {
    const registry = createCapabilityRegistry();
    assert.ok(Object.isFrozen(registry.list()));
    assert.ok(Object.isFrozen(registry.get("kegg_query")));
  });
});

describe("rankCapabilities", () => {
  it("follows the tie-break order", () => {
    assert.deepEqual(
      rankCapabilities(defaultCapabilities).map((capability) => capability.name),
      ["graph_analysis", "kegg_query", "gaf_query"],
    );
    assert.deepEqual(
      rankCapabilities(defaultCapabilities, ["tabular_query"]).map((capability) => capability.name),
      ["gaf_query", "graph_analysis", "kegg_query"],
    );
  });
});
