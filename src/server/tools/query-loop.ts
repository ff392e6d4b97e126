import { z } from "zod";
import { resultReviewSchema, type ResultReview } from "@/lib/contracts";
import { compactText } from "@/lib/graph";
import { AgentError, ToolRunError, isRetryable } from "@/server/errors";
import type { Oracle } from "@/server/openai/oracle";
import { completeStructured, reviewJsonSchema, reviewOutputSchema } from "@/server/openai/structured";
import { toErrorMessage, warnEvent, warnTurnLog, type TurnLogContext } from "@/server/telemetry";
import type { ToolOutcome } from "@/server/tools/adapters";

export const generatedQueryJsonSchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    query: { type: "string" },
    explanation: { type: "string" },
  },
  required: ["query", "explanation"],
} as const;

export const generatedQuerySchema = z.object({
  query: z.string().trim().min(1),
  explanation: z.string(),
});

export type GeneratedQuery = z.infer<typeof generatedQuerySchema>;

export type GenerationRequest = {
  attempt: number;
  /** Feedback on the previous attempt; null on the first one. */
  reflection: string | null;
};

export type QueryLoopOptions<Q, P> = {
  tool: string;
  maxAttempts: number;
  generate(request: GenerationRequest): Promise<Q>;
  execute(query: Q): Promise<P>;
  describe(query: Q): string;
  review?: (query: Q, payload: P) => Promise<ResultReview>;
  log?: TurnLogContext;
};

function warn(log: TurnLogContext | undefined, event: string, fields: Record<string, unknown>) {
  if (log) warnTurnLog(log, event, fields);
  else warnEvent(event, fields);
}

function failureKind(error: unknown): string {
  return error instanceof AgentError ? error.kind : "Error";
}

/**
 * Generate, execute, optionally review; retryable failures and rejected
 * results are fed back as a reflection. Never more than `maxAttempts`
 * generations and never fewer than one. Throws `ToolRunError` wrapping the
 * last error when no attempt produced a payload.
 */
export async function runQueryLoop<Q, P>(options: QueryLoopOptions<Q, P>): Promise<ToolOutcome<P>> {
  const bound = Math.max(1, Math.floor(options.maxAttempts));
  let reflection: string | null = null;
  let lastError: unknown = null;
  let rejected: { payload: P; review: ResultReview } | null = null;

  for (let attempt = 1; attempt <= bound; attempt += 1) {
    let query: Q | null = null;
    try {
      query = await options.generate({ attempt, reflection });
      const payload = await options.execute(query);
      if (!options.review) return { payload, attempts: attempt };

      const review = await options.review(query, payload);
      if (review.accepted) return { payload, attempts: attempt, review };

      rejected = { payload, review };
      reflection = `The query ${options.describe(query)} ran but its result was judged insufficient: ${review.reflection}`;
      warn(options.log, "tool.result_rejected", {
        tool: options.tool,
        attempt,
        reflection: compactText(review.reflection, 160),
      });
    } catch (error) {
      if (!isRetryable(error)) throw new ToolRunError(error, attempt);
      lastError = error;
      const tried = query === null ? "" : ` (${compactText(options.describe(query), 400)})`;
      reflection = `The previous attempt${tried} failed with ${failureKind(error)}: ${toErrorMessage(error)}`;
      warn(options.log, "tool.attempt_failed", {
        tool: options.tool,
        attempt,
        kind: failureKind(error),
        message: toErrorMessage(error),
      });
    }
  }

  if (rejected) {
    return { payload: rejected.payload, attempts: bound, review: rejected.review };
  }
  throw new ToolRunError(lastError, bound);
}

type ReviewInput = {
  subQuery: string;
  query: string;
  result: string;
  log?: TurnLogContext;
};

/**
 * Asks the model whether a result answers the sub-query. A malformed or
 * unavailable review counts as acceptance.
 */
export async function reviewResult(oracle: Oracle, input: ReviewInput): Promise<ResultReview> {
  try {
    const verdict = await completeStructured(
      oracle,
      {
        operation: "review_result",
        system:
          "You check whether a database result answers an instruction. Respond with JSON {acceptance, reflection}. Accept results that are relevant even if partial; reject empty or off-topic results and say how the query should change.",
        prompt: [
          `Instruction: ${input.subQuery}`,
          `Query: ${input.query}`,
          `Result: ${compactText(input.result, 2_000)}`,
        ].join("\n"),
        schema: { name: "result_review", schema: reviewJsonSchema },
      },
      reviewOutputSchema,
    );
    return resultReviewSchema.parse({ accepted: verdict.acceptance, reflection: verdict.reflection });
  } catch (error) {
    warn(input.log, "tool.review_skipped", { message: toErrorMessage(error) });
    return { accepted: true, reflection: "" };
  }
}
