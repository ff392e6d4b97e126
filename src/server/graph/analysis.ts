import type { GraphEdgeRef, GraphFragment } from "@/lib/contracts";
import { makeEdgeKey } from "@/lib/graph";

type Neighbor = { nodeId: string; relation: string };
type Adjacency = Map<string, Neighbor[]>;

export type PathResult = {
  nodes: string[];
  relations: string[];
  hops: number;
  directed: boolean;
};

export type DegreeEntry = {
  node: string;
  inDegree: number;
  outDegree: number;
  degree: number;
  centrality: number;
};

export type DistanceRange = { min: number; max: number } | null;

export type NodeImpact = {
  node: string;
  pathway: string | null;
  pathwayNodeCount: number;
  descendantCount: number;
  forestSubareaRatio: number;
  rootToNode: DistanceRange;
  nodeToLeaf: DistanceRange;
  rootToLeaf: DistanceRange;
  directlyImpactedNodes: string[];
};

function round(value: number, digits = 4): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function pushNeighbor(adjacency: Adjacency, from: string, neighbor: Neighbor) {
  const list = adjacency.get(from);
  if (list) list.push(neighbor);
  else adjacency.set(from, [neighbor]);
}

function buildAdjacency(edges: GraphEdgeRef[], undirected: boolean): Adjacency {
  const adjacency: Adjacency = new Map();
  for (const edge of edges) {
    pushNeighbor(adjacency, edge.source, { nodeId: edge.target, relation: edge.relation });
    if (undirected) {
      pushNeighbor(adjacency, edge.target, { nodeId: edge.source, relation: edge.relation });
    }
  }
  return adjacency;
}

/** BFS hop counts from `start` to every reachable node, `start` itself at 0. */
function distancesFrom(start: string, adjacency: Adjacency, maxDepth = Infinity): Map<string, number> {
  const distances = new Map<string, number>([[start, 0]]);
  const queue = [start];
  for (let cursor = 0; cursor < queue.length; cursor += 1) {
    const current = queue[cursor];
    if (current === undefined) break;
    const depth = distances.get(current) ?? 0;
    if (depth >= maxDepth) continue;
    for (const neighbor of adjacency.get(current) ?? []) {
      if (distances.has(neighbor.nodeId)) continue;
      distances.set(neighbor.nodeId, depth + 1);
      queue.push(neighbor.nodeId);
    }
  }
  return distances;
}

function bfsPath(start: string, end: string, adjacency: Adjacency): Omit<PathResult, "directed"> | null {
  if (start === end) return { nodes: [start], relations: [], hops: 0 };

  const parents = new Map<string, Neighbor & { from: string }>();
  const visited = new Set<string>([start]);
  const queue = [start];
  for (let cursor = 0; cursor < queue.length; cursor += 1) {
    const current = queue[cursor];
    if (current === undefined) break;
    for (const neighbor of adjacency.get(current) ?? []) {
      if (visited.has(neighbor.nodeId)) continue;
      visited.add(neighbor.nodeId);
      parents.set(neighbor.nodeId, { ...neighbor, from: current });
      if (neighbor.nodeId === end) {
        const nodes = [end];
        const relations: string[] = [];
        let step = parents.get(end);
        while (step) {
          relations.unshift(step.relation);
          nodes.unshift(step.from);
          step = parents.get(step.from);
        }
        return { nodes, relations, hops: relations.length };
      }
      queue.push(neighbor.nodeId);
    }
  }
  return null;
}

function range(values: number[]): DistanceRange {
  if (values.length === 0) return null;
  return { min: Math.min(...values), max: Math.max(...values) };
}

function sameName(left: string, right: string): boolean {
  return left.trim().toLowerCase() === right.trim().toLowerCase();
}

/** Exact id first, then a case-insensitive match. */
export function resolveNode(fragment: GraphFragment, name: string): string | null {
  const exact = fragment.nodes.find((node) => node.id === name);
  if (exact) return exact.id;
  return fragment.nodes.find((node) => sameName(node.id, name))?.id ?? null;
}

export function resolvePathway(fragment: GraphFragment, title: string): string | null {
  for (const node of fragment.nodes) {
    const match = node.pathways.find((pathway) => sameName(pathway, title));
    if (match) return match;
  }
  return null;
}

/** Directed BFS; when the direction admits no path, retries ignoring direction. */
export function shortestPath(fragment: GraphFragment, from: string, to: string): PathResult | null {
  const directed = bfsPath(from, to, buildAdjacency(fragment.edges, false));
  if (directed) return { ...directed, directed: true };
  const undirected = bfsPath(from, to, buildAdjacency(fragment.edges, true));
  return undirected ? { ...undirected, directed: false } : null;
}

export function degreeCentrality(fragment: GraphFragment, limit: number): DegreeEntry[] {
  const inDegree = new Map<string, number>();
  const outDegree = new Map<string, number>();
  for (const edge of fragment.edges) {
    outDegree.set(edge.source, (outDegree.get(edge.source) ?? 0) + 1);
    inDegree.set(edge.target, (inDegree.get(edge.target) ?? 0) + 1);
  }
  const denominator = Math.max(1, fragment.nodes.length - 1);

  return fragment.nodes
    .map((node) => {
      const incoming = inDegree.get(node.id) ?? 0;
      const outgoing = outDegree.get(node.id) ?? 0;
      return {
        node: node.id,
        inDegree: incoming,
        outDegree: outgoing,
        degree: incoming + outgoing,
        centrality: fragment.nodes.length > 1 ? round((incoming + outgoing) / denominator) : 0,
      };
    })
    .sort((a, b) => b.degree - a.degree || a.node.localeCompare(b.node))
    .slice(0, Math.max(1, limit));
}

/** k-hop neighbourhood of `node`, following edges in both directions. */
export function subgraph(fragment: GraphFragment, node: string, depth: number): GraphFragment {
  const reached = distancesFrom(node, buildAdjacency(fragment.edges, true), Math.max(0, depth));
  const edges = new Map<string, GraphEdgeRef>();
  for (const edge of fragment.edges) {
    if (reached.has(edge.source) && reached.has(edge.target)) edges.set(makeEdgeKey(edge), edge);
  }
  return {
    nodes: fragment.nodes.filter((candidate) => reached.has(candidate.id)),
    edges: [...edges.values()],
  };
}

/**
 * Impact of a node on a pathway. Roots are pathway nodes with edges but no
 * incoming edge inside the pathway; leaves have no outgoing edge inside it.
 * Without a pathway the whole fragment is used.
 */
export function nodeImpact(fragment: GraphFragment, node: string, pathway: string | null): NodeImpact {
  const members = new Set(
    fragment.nodes
      .filter((candidate) => pathway === null || candidate.pathways.some((title) => sameName(title, pathway)))
      .map((candidate) => candidate.id),
  );
  const pathwayEdges = fragment.edges.filter(
    (edge) => members.has(edge.source) && members.has(edge.target),
  );
  const forward = buildAdjacency(pathwayEdges, false);

  const hasIncoming = new Set(pathwayEdges.map((edge) => edge.target));
  const hasOutgoing = new Set(pathwayEdges.map((edge) => edge.source));
  const roots = [...members].filter((id) => hasOutgoing.has(id) && !hasIncoming.has(id));
  const leaves = new Set([...members].filter((id) => hasIncoming.has(id) && !hasOutgoing.has(id)));

  const descendants = distancesFrom(node, buildAdjacency(fragment.edges, false));
  const descendantsInPathway = [...descendants.keys()].filter((id) => members.has(id));

  const rootToNode: number[] = [];
  const rootToLeaf: number[] = [];
  for (const root of roots) {
    const distances = distancesFrom(root, forward);
    const toNode = distances.get(node);
    if (root !== node && toNode !== undefined) rootToNode.push(toNode);
    for (const [id, distance] of distances) {
      if (leaves.has(id)) rootToLeaf.push(distance);
    }
  }

  const fromNode = members.has(node) ? distancesFrom(node, forward) : new Map<string, number>();
  const nodeToLeaf = [...fromNode]
    .filter(([id]) => id !== node && leaves.has(id))
    .map(([, distance]) => distance);

  const directlyImpactedNodes = [
    ...new Set(
      fragment.edges
        .filter((edge) => edge.source === node && members.has(edge.target))
        .map((edge) => edge.target),
    ),
  ].sort();

  return {
    node,
    pathway,
    pathwayNodeCount: members.size,
    descendantCount: descendantsInPathway.length,
    forestSubareaRatio: members.size > 0 ? round(descendantsInPathway.length / members.size) : 0,
    rootToNode: range(rootToNode),
    nodeToLeaf: range(nodeToLeaf),
    rootToLeaf: range(rootToLeaf),
    directlyImpactedNodes,
  };
}
