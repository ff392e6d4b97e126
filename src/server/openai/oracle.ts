import type OpenAI from "openai";
import type { ChatMessage } from "@/lib/contracts";
import { OracleOutputError, OracleUnavailableError } from "@/server/errors";
import { createOpenAIClient } from "@/server/openai/client";
import { chooseOracleModel, type OracleOperation } from "@/server/openai/model-router";
import { createRateLimitGate, type RateLimitGate } from "@/server/openai/rate-limit";
import { toErrorMessage, warnEvent } from "@/server/telemetry";

export type { OracleOperation } from "@/server/openai/model-router";

export type SchemaHint = {
  name: string;
  schema: Record<string, unknown>;
};

export type OracleRequest = {
  operation: OracleOperation;
  system: string;
  prompt: string;
  history?: ChatMessage[];
  schema?: SchemaHint;
};

/**
 * The language model seen as a black box: prompt plus optional schema hint in,
 * text out. Callers must treat the text as untrusted; see `completeStructured`.
 */
export interface Oracle {
  complete(request: OracleRequest): Promise<string>;
}

type OpenAiOracleOptions = {
  client?: OpenAI | null;
  rateLimitGate?: RateLimitGate;
};

export class OpenAiOracle implements Oracle {
  private readonly client: OpenAI | null;
  private readonly gate: RateLimitGate;

  constructor(options: OpenAiOracleOptions = {}) {
    this.client = options.client === undefined ? createOpenAIClient() : options.client;
    this.gate = options.rateLimitGate ?? createRateLimitGate();
  }

  async complete(request: OracleRequest): Promise<string> {
    const openai = this.client;
    if (!openai) {
      throw new OracleUnavailableError("OPENAI_API_KEY is not configured");
    }
    if (this.gate.isLimited()) {
      throw new OracleUnavailableError("OpenAI rate limit back-off in effect");
    }

    const { model } = chooseOracleModel(request.operation);
    let text: string;
    try {
      text = await this.viaResponses(openai, model, request);
    } catch (error) {
      if (this.gate.handle(error)) {
        throw new OracleUnavailableError(`OpenAI rate limited: ${toErrorMessage(error)}`);
      }
      warnEvent("oracle.responses_fallback", {
        operation: request.operation,
        message: toErrorMessage(error),
      });
      try {
        text = await this.viaChatCompletions(openai, model, request);
      } catch (fallbackError) {
        this.gate.handle(fallbackError);
        throw new OracleUnavailableError(
          `OpenAI ${request.operation} call failed: ${toErrorMessage(fallbackError)}`,
        );
      }
    }

    if (!text.trim()) {
      throw new OracleOutputError(`OpenAI returned empty content for ${request.operation}`);
    }
    return text;
  }

  private async viaResponses(
    openai: OpenAI,
    model: string,
    request: OracleRequest,
  ): Promise<string> {
    const response = await openai.responses.create(
      {
        model,
        input: [
          {
            role: "system",
            content: [{ type: "input_text", text: request.system }],
          },
          ...(request.history ?? []).map((message) => ({
            role: message.role,
            content: message.content,
          })),
          {
            role: "user",
            content: [{ type: "input_text", text: request.prompt }],
          },
        ],
        text: request.schema
          ? {
              format: {
                type: "json_schema",
                name: request.schema.name,
                schema: request.schema.schema,
                strict: true,
              },
            }
          : undefined,
      },
    );
    return response.output_text;
  }

  private async viaChatCompletions(
    openai: OpenAI,
    model: string,
    request: OracleRequest,
  ): Promise<string> {
    const response = await openai.chat.completions.create(
      {
        model,
        messages: [
          { role: "system", content: request.system },
          ...(request.history ?? []).map((message) =>
            message.role === "user"
              ? { role: "user" as const, content: message.content }
              : { role: "assistant" as const, content: message.content },
          ),
          { role: "user", content: request.prompt },
        ],
        response_format: request.schema
          ? {
              type: "json_schema",
              json_schema: {
                name: request.schema.name,
                strict: true,
                schema: request.schema.schema,
              },
            }
          : undefined,
      },
    );

    return response.choices[0]?.message?.content ?? "";
  }
}
