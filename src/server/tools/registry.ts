import {
  capabilityDescriptorSchema,
  type CapabilityDescriptor,
  type CapabilityKind,
} from "@/lib/contracts";

export const defaultCapabilities: readonly CapabilityDescriptor[] = [
  {
    name: "kegg_query",
    kind: "graph_query",
    description:
      "Queries the KEGG pathway graph (genes, compounds and their typed relations such as activation or inhibition, grouped into pathways). Use for questions about pathway membership, interactions, and what regulates what.",
    subQueryShape: "free_text",
    specificity: 2,
  },
  {
    name: "gaf_query",
    kind: "tabular_query",
    description:
      "Filters or aggregates the Gene Ontology annotation table (gene symbol, GO term, evidence code, aspect, taxon, ...). Use for GO terms, functions, processes or locations of genes and the evidence behind them.",
    subQueryShape: "free_text",
    specificity: 1,
  },
  {
    name: "graph_analysis",
    kind: "graph_analysis",
    description:
      "Analyses graph data fetched by an earlier kegg_query step: shortest path between two genes, degree centrality, k-hop neighbourhood, or the impact of a gene on a pathway. Must depend on a kegg_query step.",
    subQueryShape: "structured",
    specificity: 3,
  },
];

/** Preferred capability kind when several could answer the same sub-question. */
export const defaultTieBreak: readonly CapabilityKind[] = ["graph_analysis", "graph_query", "tabular_query"];

export type CapabilityRegistry = {
  list(): readonly CapabilityDescriptor[];
  get(name: string): CapabilityDescriptor | undefined;
};

/** Builds the registry once; descriptors are validated and frozen. */
export function createCapabilityRegistry(
  descriptors: readonly CapabilityDescriptor[] = defaultCapabilities,
): CapabilityRegistry {
  const byName = new Map<string, CapabilityDescriptor>();
  for (const descriptor of descriptors) {
    const parsed = capabilityDescriptorSchema.parse(descriptor);
    if (byName.has(parsed.name)) {
      throw new Error(`Duplicate capability "${parsed.name}"`);
    }
    byName.set(parsed.name, Object.freeze(parsed));
  }
  const list = Object.freeze([...byName.values()]);

  return Object.freeze({
    list: () => list,
    get: (name: string) => byName.get(name),
  });
}

/** Orders capabilities by tie-break kind first, then by descending specificity. */
export function rankCapabilities(
  capabilities: readonly CapabilityDescriptor[],
  tieBreak: readonly CapabilityKind[] = defaultTieBreak,
): CapabilityDescriptor[] {
  const rank = (kind: CapabilityKind) => {
    const index = tieBreak.indexOf(kind);
    return index === -1 ? tieBreak.length : index;
  };
  return [...capabilities].sort(
    (a, b) => rank(a.kind) - rank(b.kind) || b.specificity - a.specificity || a.name.localeCompare(b.name),
  );
}
