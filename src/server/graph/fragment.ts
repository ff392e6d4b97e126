import {
  graphFragmentSchema,
  type GraphEdgeRef,
  type GraphFragment,
  type GraphNodeRef,
  type JsonValue,
  type Row,
} from "@/lib/contracts";
import { emptyFragment, mergeFragments } from "@/lib/graph";

type JsonObject = { [key: string]: JsonValue };

const nodeIdKeys = ["name", "entry_name", "kegg_name"] as const;
const edgeEndpointKeys: Array<[string, string]> = [
  ["source", "target"],
  ["from", "to"],
];
const relationKeys = ["relation", "type", "subtype"] as const;

function isObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringList(value: JsonValue | undefined): string[] {
  if (typeof value === "string") return value ? [value] : [];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === "string" && item.length > 0);
}

function firstString(object: JsonObject, keys: readonly string[]): string | null {
  for (const key of keys) {
    const value = object[key];
    if (typeof value === "string" && value.trim()) return value.trim();
  }
  return null;
}

/** Node id in the pathway graph: the `name` property, then the KEGG names. */
export function nodeIdOf(properties: JsonObject): string | null {
  return firstString(properties, nodeIdKeys);
}

export function nodeRefOf(properties: JsonObject): GraphNodeRef | null {
  const id = nodeIdOf(properties);
  if (!id) return null;
  return {
    id,
    labels: stringList(properties.labels),
    pathways: stringList(properties.pathway_titles),
  };
}

function edgeRefOf(object: JsonObject): GraphEdgeRef | null {
  for (const [sourceKey, targetKey] of edgeEndpointKeys) {
    const source = object[sourceKey];
    const target = object[targetKey];
    const sourceId = typeof source === "string" ? source : isObject(source) ? nodeIdOf(source) : null;
    const targetId = typeof target === "string" ? target : isObject(target) ? nodeIdOf(target) : null;
    if (sourceId && targetId) {
      return {
        source: sourceId,
        target: targetId,
        relation: firstString(object, relationKeys) ?? "related_to",
      };
    }
  }
  return null;
}

function collect(value: JsonValue | undefined, nodes: GraphNodeRef[], edges: GraphEdgeRef[]) {
  if (Array.isArray(value)) {
    for (const item of value) collect(item, nodes, edges);
    return;
  }
  if (!isObject(value)) return;

  const edge = edgeRefOf(value);
  if (edge) {
    edges.push(edge);
  } else {
    const node = nodeRefOf(value);
    if (node) nodes.push(node);
  }
  for (const nested of Object.values(value)) {
    if (typeof nested === "object" && nested !== null) collect(nested, nodes, edges);
  }
}

/**
 * Materializes the graph part of query rows. Node-shaped values (objects with a
 * `name`) become nodes, objects or rows with source/target columns become edges;
 * scalar-only rows contribute nothing.
 */
export function fragmentFromRows(rows: Row[]): GraphFragment {
  if (rows.length === 0) return emptyFragment();
  const nodes: GraphNodeRef[] = [];
  const edges: GraphEdgeRef[] = [];
  for (const row of rows) collect(row, nodes, edges);
  return graphFragmentSchema.parse(mergeFragments([{ nodes, edges }]));
}
