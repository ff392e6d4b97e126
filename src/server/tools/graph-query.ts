import type { LRUCache } from "lru-cache";
import type { GraphQueryPayload } from "@/lib/contracts";
import { appConfig } from "@/server/config";
import { cachedLoader, createTTLCache } from "@/server/cache/lru";
import type { GraphStore } from "@/server/graph/store";
import { assertReadOnlyStatement } from "@/server/graph/store";
import type { Oracle } from "@/server/openai/oracle";
import { completeStructured } from "@/server/openai/structured";
import { stepTurnLog } from "@/server/telemetry";
import type { StepContext, ToolOutcome } from "@/server/tools/adapters";
import {
  generatedQueryJsonSchema,
  generatedQuerySchema,
  reviewResult,
  runQueryLoop,
  type GeneratedQuery,
  type GenerationRequest,
} from "@/server/tools/query-loop";

export const keggQueryTips = `- use the \`pathway_titles\` list property to filter by pathway or disease
- do not be overly specific with the query
- compare names in lower case, e.g. toLower(toString(n.name)) = 'insr'
- always use toString() in string comparisons and matching
- normalise names and terms in the instruction, and try synonyms (see \`gene_names\`)
- escape a single or double quote inside a search string with a backslash
- when a later analysis needs the graph, return the nodes and relationships (or source, relation and target columns)`;

const MAX_SCHEMA_CHARS = 6_000;
const MAX_PATHWAYS_LISTED = 400;

type GraphPromptContext = {
  schema: string;
  pathways: string[];
};

type GraphQueryToolOptions = {
  oracle: Oracle;
  store: GraphStore;
  maxAttempts?: number;
  reviewResults?: boolean;
  maxRows?: number;
  cache?: LRUCache<string, Promise<GraphPromptContext>>;
};

export class GraphQueryTool {
  private readonly oracle: Oracle;
  private readonly store: GraphStore;
  private readonly maxAttempts: number;
  private readonly reviewResults: boolean;
  private readonly maxRows: number;
  private readonly cache: LRUCache<string, Promise<GraphPromptContext>>;

  constructor(options: GraphQueryToolOptions) {
    this.oracle = options.oracle;
    this.store = options.store;
    this.maxAttempts = options.maxAttempts ?? appConfig.tools.graphMaxAttempts;
    this.reviewResults = options.reviewResults ?? appConfig.tools.reviewResults;
    this.maxRows = options.maxRows ?? appConfig.tools.maxResultRows;
    this.cache = options.cache ?? createTTLCache<string, Promise<GraphPromptContext>>();
  }

  async answer(subQuery: string, context: StepContext): Promise<ToolOutcome<GraphQueryPayload>> {
    return runQueryLoop<GeneratedQuery, GraphQueryPayload>({
      tool: context.step.tool,
      maxAttempts: this.maxAttempts,
      log: context.log,
      // a failed schema or pathway load uses up an attempt like a failed query
      generate: async (request) => this.generate(subQuery, context, await this.loadPromptContext(), request),
      execute: (generated) => this.execute(generated, context),
      describe: (generated) => generated.query,
      review: this.reviewResults
        ? (generated, payload) =>
            reviewResult(this.oracle, {
              subQuery,
              query: generated.query,
              result: JSON.stringify({ rowCount: payload.rowCount, rows: payload.rows.slice(0, 10) }),
              log: context.log,
            })
        : undefined,
    });
  }

  private loadPromptContext(): Promise<GraphPromptContext> {
    return cachedLoader(this.cache, "graph-prompt-context", async () => ({
      schema: await this.store.schema(),
      pathways: await this.store.listPathways(),
    }));
  }

  private generate(
    subQuery: string,
    context: StepContext,
    promptContext: GraphPromptContext,
    request: GenerationRequest,
  ): Promise<GeneratedQuery> {
    const pathways = promptContext.pathways.slice(0, MAX_PATHWAYS_LISTED);
    const lines = [
      `Neo4j schema:\n${promptContext.schema.slice(0, MAX_SCHEMA_CHARS)}`,
      pathways.length > 0 ? `Known pathways: ${pathways.map((title) => `"${title}"`).join(", ")}` : "",
      `Tips:\n${keggQueryTips}`,
      `Research objective: ${context.objective}`,
      context.step.goal ? `Expected output: ${context.step.goal}` : "",
      request.reflection ? `Reflection on the previous attempt: ${request.reflection}` : "",
      `Return at most ${this.maxRows} rows.`,
      `Write a read-only Cypher query that satisfies this instruction: ${subQuery}`,
    ];

    return completeStructured(
      this.oracle,
      {
        operation: "generate_query",
        system:
          "You write read-only Cypher queries for a Neo4j graph of KEGG pathways. Respond only with JSON {query, explanation}.",
        prompt: lines.filter(Boolean).join("\n\n"),
        schema: { name: "cypher_query", schema: generatedQueryJsonSchema },
      },
      generatedQuerySchema,
    );
  }

  private async execute(generated: GeneratedQuery, context: StepContext): Promise<GraphQueryPayload> {
    assertReadOnlyStatement(generated.query);
    const result = await this.store.run(generated.query, { maxRows: this.maxRows });
    if (context.log) {
      stepTurnLog(context.log, "tool.graph_query", {
        step: context.step.index,
        rowCount: result.rowCount,
        nodes: result.fragment.nodes.length,
        edges: result.fragment.edges.length,
      });
    }
    return {
      kind: "graph_query",
      statement: generated.query,
      explanation: generated.explanation,
      rows: result.rows,
      rowCount: result.rowCount,
      truncated: result.truncated,
      fragment: result.fragment,
    };
  }
}
