import { z } from "zod";
import { OracleOutputError } from "@/server/errors";
import type { Oracle, OracleRequest, SchemaHint } from "@/server/openai/oracle";

export function cleanMarkdownResponse(text: string): string {
  return text.replace(/```[a-z0-9]*/gi, "").trim();
}

export function parsePossibleJson(raw: string): unknown {
  const trimmed = cleanMarkdownResponse(raw);
  if (!trimmed) {
    throw new OracleOutputError("Model returned an empty payload");
  }

  try {
    return JSON.parse(trimmed) as unknown;
  } catch {
    const objectMatch = trimmed.match(/\{[\s\S]*\}/);
    if (objectMatch) {
      try {
        return JSON.parse(objectMatch[0]) as unknown;
      } catch {
        // fall through to the array form
      }
    }

    const arrayMatch = trimmed.match(/\[[\s\S]*\]/);
    if (arrayMatch) {
      try {
        return JSON.parse(arrayMatch[0]) as unknown;
      } catch {
        // reported below
      }
    }

    throw new OracleOutputError("Model returned text that is not JSON", trimmed);
  }
}

export function parseStructured<S extends z.ZodTypeAny>(
  raw: string,
  validator: S,
  label: string,
): z.infer<S> {
  const parsed = validator.safeParse(parsePossibleJson(raw));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new OracleOutputError(
      `Model output for ${label} failed validation${where}: ${issue?.message ?? "invalid"}`,
      raw,
    );
  }
  return parsed.data;
}

/**
 * Single entry point for structured model calls: the schema hint is sent to the
 * model and the reply is checked against `validator`. Any deviation throws
 * `OracleOutputError`.
 */
export async function completeStructured<S extends z.ZodTypeAny>(
  oracle: Oracle,
  request: Omit<OracleRequest, "schema"> & { schema: SchemaHint },
  validator: S,
): Promise<z.infer<S>> {
  const raw = await oracle.complete(request);
  return parseStructured(raw, validator, request.schema.name);
}

export const reviewJsonSchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    acceptance: { type: "boolean" },
    reflection: { type: "string" },
  },
  required: ["acceptance", "reflection"],
} as const;

export const reviewOutputSchema = z.object({
  acceptance: z.boolean(),
  reflection: z.string(),
});

export type ReviewOutput = z.infer<typeof reviewOutputSchema>;
