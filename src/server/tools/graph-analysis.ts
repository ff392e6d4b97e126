import { z } from "zod";
import {
  graphAnalyses,
  type GraphAnalysisName,
  type GraphAnalysisParameters,
  type GraphAnalysisPayload,
  type GraphFragment,
  type JsonValue,
  type StepResult,
} from "@/lib/contracts";
import { clamp, dedupePreserveOrder, isFragmentEmpty, mergeFragments } from "@/lib/graph";
import { appConfig } from "@/server/config";
import { AnalysisParameterError } from "@/server/errors";
import {
  degreeCentrality,
  nodeImpact,
  resolveNode,
  resolvePathway,
  shortestPath,
  subgraph,
} from "@/server/graph/analysis";
import type { Oracle } from "@/server/openai/oracle";
import { completeStructured } from "@/server/openai/structured";
import { stepTurnLog } from "@/server/telemetry";
import type { StepContext, ToolOutcome } from "@/server/tools/adapters";
import { runQueryLoop, type GenerationRequest } from "@/server/tools/query-loop";

const analysisCatalogue: Record<GraphAnalysisName, string> = {
  shortest_path: "shortest_path(node, target): shortest chain of relations from node to target",
  degree_centrality: "degree_centrality(limit): the most connected nodes, with in/out degree",
  subgraph: "subgraph(node, depth): neighbourhood of node up to depth hops (1-4)",
  node_impact:
    "node_impact(node, pathway?): forest subarea ratio, root/leaf distances and directly impacted nodes of node within pathway",
};

const nullableString = { type: ["string", "null"] } as const;
const nullableInteger = { type: ["integer", "null"] } as const;

const analysisSelectionJsonSchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    analysis: { type: "string", enum: graphAnalyses },
    node: nullableString,
    target: nullableString,
    pathway: nullableString,
    depth: nullableInteger,
    limit: nullableInteger,
    explanation: { type: "string" },
  },
  required: ["analysis", "node", "target", "pathway", "depth", "limit", "explanation"],
} as const;

const analysisSelectionSchema = z.object({
  analysis: z.enum(graphAnalyses),
  node: z.string().nullable(),
  target: z.string().nullable(),
  pathway: z.string().nullable(),
  depth: z.number().int().nullable(),
  limit: z.number().int().nullable(),
  explanation: z.string(),
});

type AnalysisSelection = z.infer<typeof analysisSelectionSchema>;

const MAX_NODES_LISTED = 200;
const MAX_SUBGRAPH_DEPTH = 4;

/** Graph data from successful graph-query steps among `results`. */
export function fragmentFromResults(results: readonly StepResult[]): GraphFragment {
  const fragments: GraphFragment[] = [];
  for (const result of results) {
    if (result.status === "success" && result.payload.kind === "graph_query") {
      fragments.push(result.payload.fragment);
    }
  }
  return mergeFragments(fragments);
}

function requireNode(fragment: GraphFragment, name: string | null, role: string): string {
  if (!name) {
    throw new AnalysisParameterError(`The analysis needs a ${role} node`, { retryable: true });
  }
  const resolved = resolveNode(fragment, name);
  if (!resolved) {
    const sample = fragment.nodes.slice(0, 20).map((node) => node.id);
    throw new AnalysisParameterError(
      `Node "${name}" is not in the graph data; available nodes include ${sample.join(", ")}`,
      { retryable: true },
    );
  }
  return resolved;
}

export function runAnalysis(
  fragment: GraphFragment,
  selection: AnalysisSelection,
  defaultLimit: number,
): Record<string, JsonValue> {
  switch (selection.analysis) {
    case "shortest_path": {
      const from = requireNode(fragment, selection.node, "start");
      const to = requireNode(fragment, selection.target, "target");
      const path = shortestPath(fragment, from, to);
      return { from, to, connected: path !== null, path };
    }
    case "degree_centrality": {
      const limit = clamp(selection.limit ?? defaultLimit, 1, 50);
      return {
        nodeCount: fragment.nodes.length,
        edgeCount: fragment.edges.length,
        ranking: degreeCentrality(fragment, limit),
      };
    }
    case "subgraph": {
      const center = requireNode(fragment, selection.node, "centre");
      const depth = clamp(selection.depth ?? 1, 1, MAX_SUBGRAPH_DEPTH);
      const local = subgraph(fragment, center, depth);
      return {
        center,
        depth,
        nodes: local.nodes.map((node) => node.id),
        edges: local.edges,
      };
    }
    case "node_impact": {
      const node = requireNode(fragment, selection.node, "focus");
      let pathway: string | null = null;
      if (selection.pathway) {
        pathway = resolvePathway(fragment, selection.pathway);
        if (!pathway) {
          const known = dedupePreserveOrder(fragment.nodes.flatMap((candidate) => candidate.pathways));
          throw new AnalysisParameterError(
            `Pathway "${selection.pathway}" is not in the graph data; known pathways: ${known.slice(0, 20).join(", ") || "none"}`,
            { retryable: true },
          );
        }
      }
      return nodeImpact(fragment, node, pathway);
    }
  }
}

type GraphAnalysisToolOptions = {
  oracle: Oracle;
  maxAttempts?: number;
  defaultLimit?: number;
};

export class GraphAnalysisTool {
  private readonly oracle: Oracle;
  private readonly maxAttempts: number;
  private readonly defaultLimit: number;

  constructor(options: GraphAnalysisToolOptions) {
    this.oracle = options.oracle;
    this.maxAttempts = options.maxAttempts ?? appConfig.tools.graphMaxAttempts;
    this.defaultLimit = options.defaultLimit ?? appConfig.tools.defaultRowLimit;
  }

  async answer(subQuery: string, context: StepContext): Promise<ToolOutcome<GraphAnalysisPayload>> {
    const fragment = fragmentFromResults(context.dependencyResults);
    if (isFragmentEmpty(fragment)) {
      throw new AnalysisParameterError(
        `Step ${context.step.index} has no graph data from an earlier graph query step to analyse`,
        { retryable: false },
      );
    }

    return runQueryLoop<AnalysisSelection, GraphAnalysisPayload>({
      tool: context.step.tool,
      maxAttempts: this.maxAttempts,
      log: context.log,
      generate: (request) => this.select(subQuery, context, fragment, request),
      execute: async (selection) => {
        const result = runAnalysis(fragment, selection, this.defaultLimit);
        if (context.log) {
          stepTurnLog(context.log, "tool.graph_analysis", {
            step: context.step.index,
            analysis: selection.analysis,
          });
        }
        return {
          kind: "graph_analysis",
          analysis: selection.analysis,
          parameters: toParameters(selection),
          explanation: selection.explanation,
          result,
        };
      },
      describe: (selection) => JSON.stringify(toParameters(selection)),
    });
  }

  private select(
    subQuery: string,
    context: StepContext,
    fragment: GraphFragment,
    request: GenerationRequest,
  ): Promise<AnalysisSelection> {
    const nodes = fragment.nodes.slice(0, MAX_NODES_LISTED).map((node) => node.id);
    const pathways = dedupePreserveOrder(fragment.nodes.flatMap((node) => node.pathways));
    const lines = [
      `Available analyses:\n${graphAnalyses.map((name) => `- ${analysisCatalogue[name]}`).join("\n")}`,
      `Graph data: ${fragment.nodes.length} nodes, ${fragment.edges.length} edges.`,
      `Nodes: ${nodes.join(", ")}`,
      pathways.length > 0 ? `Pathways: ${pathways.map((title) => `"${title}"`).join(", ")}` : "",
      `Research objective: ${context.objective}`,
      request.reflection ? `Reflection on the previous attempt: ${request.reflection}` : "",
      `Choose the analysis and parameters for this instruction, using null for parameters it does not need: ${subQuery}`,
    ];

    return completeStructured(
      this.oracle,
      {
        operation: "generate_query",
        system:
          "You choose one graph analysis and its parameters. Node names must be taken from the listed nodes. Respond only with JSON.",
        prompt: lines.filter(Boolean).join("\n\n"),
        schema: { name: "graph_analysis_selection", schema: analysisSelectionJsonSchema },
      },
      analysisSelectionSchema,
    );
  }
}

function toParameters(selection: AnalysisSelection): GraphAnalysisParameters {
  return {
    node: selection.node,
    target: selection.target,
    pathway: selection.pathway,
    depth: selection.depth,
    limit: selection.limit,
  };
}
