import type { GraphEdgeRef, GraphFragment, GraphNodeRef } from "@/lib/contracts";

export function makeEdgeKey(edge: GraphEdgeRef): string {
  return `${edge.source}→${edge.target}:${edge.relation}`;
}

export function clamp(value: number, min = 0, max = 1): number {
  return Math.max(min, Math.min(max, value));
}

export function compactText(value: string, max = 180): string {
  const normalized = value.replace(/\s+/g, " ").trim();
  if (normalized.length <= max) return normalized;
  return `${normalized.slice(0, max - 1)}…`;
}

export function dedupePreserveOrder(values: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    if (seen.has(value)) continue;
    seen.add(value);
    out.push(value);
  }
  return out;
}

export function emptyFragment(): GraphFragment {
  return { nodes: [], edges: [] };
}

export function mergeFragments(fragments: GraphFragment[]): GraphFragment {
  const nodes = new Map<string, GraphNodeRef>();
  const edges = new Map<string, GraphEdgeRef>();

  for (const fragment of fragments) {
    for (const node of fragment.nodes) {
      const existing = nodes.get(node.id);
      if (!existing) {
        nodes.set(node.id, {
          id: node.id,
          labels: [...node.labels],
          pathways: [...node.pathways],
        });
        continue;
      }
      existing.labels = dedupePreserveOrder([...existing.labels, ...node.labels]);
      existing.pathways = dedupePreserveOrder([...existing.pathways, ...node.pathways]);
    }
    for (const edge of fragment.edges) {
      const key = makeEdgeKey(edge);
      if (!edges.has(key)) edges.set(key, { ...edge });
    }
  }

  // edges may reference nodes that were only seen as relationship endpoints
  for (const edge of edges.values()) {
    for (const id of [edge.source, edge.target]) {
      if (!nodes.has(id)) nodes.set(id, { id, labels: [], pathways: [] });
    }
  }

  return { nodes: [...nodes.values()], edges: [...edges.values()] };
}

export function isFragmentEmpty(fragment: GraphFragment): boolean {
  return fragment.nodes.length === 0 && fragment.edges.length === 0;
}
