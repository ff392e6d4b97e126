import type { Row, TabularQueryPayload } from "@/lib/contracts";
import { appConfig } from "@/server/config";
import type { AnnotationDataset } from "@/server/annotations/dataset";
import { describeGafSchema, evidenceCodes } from "@/server/annotations/gaf";
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

type AnnotationQueryToolOptions = {
  oracle: Oracle;
  dataset: () => Promise<AnnotationDataset>;
  maxAttempts?: number;
  reviewResults?: boolean;
  maxRows?: number;
  defaultRowLimit?: number;
};

/** Descriptions for the evidence codes that appear in an `Evidence` column. */
export function evidenceLegendFor(rows: Row[]): Record<string, string> {
  const legend: Record<string, string> = {};
  for (const row of rows) {
    for (const [column, value] of Object.entries(row)) {
      if (column.toLowerCase() !== "evidence" || typeof value !== "string") continue;
      const description = evidenceCodes[value];
      if (description) legend[value] = description;
    }
  }
  return legend;
}

export class AnnotationQueryTool {
  private readonly oracle: Oracle;
  private readonly dataset: () => Promise<AnnotationDataset>;
  private readonly maxAttempts: number;
  private readonly reviewResults: boolean;
  private readonly maxRows: number;
  private readonly defaultRowLimit: number;

  constructor(options: AnnotationQueryToolOptions) {
    this.oracle = options.oracle;
    this.dataset = options.dataset;
    this.maxAttempts = options.maxAttempts ?? appConfig.tools.maxAttempts;
    this.reviewResults = options.reviewResults ?? appConfig.tools.reviewResults;
    this.maxRows = options.maxRows ?? appConfig.tools.maxResultRows;
    this.defaultRowLimit = options.defaultRowLimit ?? appConfig.tools.defaultRowLimit;
  }

  async answer(subQuery: string, context: StepContext): Promise<ToolOutcome<TabularQueryPayload>> {
    const dataset = await this.dataset();

    return runQueryLoop<GeneratedQuery, TabularQueryPayload>({
      tool: context.step.tool,
      maxAttempts: this.maxAttempts,
      log: context.log,
      generate: (request) => this.generate(subQuery, context, dataset, request),
      execute: async (generated) => this.execute(generated, context, dataset),
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

  private generate(
    subQuery: string,
    context: StepContext,
    dataset: AnnotationDataset,
    request: GenerationRequest,
  ): Promise<GeneratedQuery> {
    const lines = [
      `Table \`${dataset.table}\` (${dataset.size} rows), one Gene Ontology annotation per row. Columns:\n${describeGafSchema()}`,
      [
        "Tips:",
        "- filter genes on DB_Object_Symbol using the official upper-case symbol",
        "- GO_ID values look like GO:0006281; Aspect is P, F or C",
        `- add LIMIT ${this.defaultRowLimit} unless the instruction asks for counts or a complete list`,
        "- write exactly one SQLite SELECT statement",
      ].join("\n"),
      `Research objective: ${context.objective}`,
      context.step.goal ? `Expected output: ${context.step.goal}` : "",
      request.reflection ? `Reflection on the previous attempt: ${request.reflection}` : "",
      `Write an SQL query that satisfies this instruction: ${subQuery}`,
    ];

    return completeStructured(
      this.oracle,
      {
        operation: "generate_query",
        system:
          "You write SQLite queries over a Gene Ontology annotation table. Respond only with JSON {query, explanation}.",
        prompt: lines.filter(Boolean).join("\n\n"),
        schema: { name: "annotation_query", schema: generatedQueryJsonSchema },
      },
      generatedQuerySchema,
    );
  }

  private execute(
    generated: GeneratedQuery,
    context: StepContext,
    dataset: AnnotationDataset,
  ): TabularQueryPayload {
    const result = dataset.query(generated.query, this.maxRows);
    if (context.log) {
      stepTurnLog(context.log, "tool.tabular_query", {
        step: context.step.index,
        rowCount: result.rowCount,
      });
    }
    return {
      kind: "tabular_query",
      query: generated.query,
      explanation: generated.explanation,
      columns: result.columns,
      rows: result.rows,
      rowCount: result.rowCount,
      truncated: result.truncated,
      evidenceLegend: evidenceLegendFor(result.rows),
    };
  }
}
