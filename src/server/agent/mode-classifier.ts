import { z } from "zod";
import { modeSchema, modes, type Mode } from "@/lib/contracts";
import { ClassificationAmbiguousError } from "@/server/errors";
import type { Oracle } from "@/server/openai/oracle";
import { completeStructured } from "@/server/openai/structured";
import { toErrorMessage, warnEvent, warnTurnLog, type TurnLogContext } from "@/server/telemetry";
import { renderTranscript, type Session } from "@/server/agent/session";

const modeJsonSchema = {
  type: "object",
  additionalProperties: false,
  properties: { mode: { type: "string", enum: modes } },
  required: ["mode"],
} as const;

const modeOutputSchema = z.object({ mode: modeSchema });

const systemPrompt = `You label the latest user message of a biomedical research assistant conversation.
- "research": the message asks something that needs data about genes, proteins, pathways, Gene Ontology annotations or their relationships.
- "conversational": greetings, thanks, questions about the assistant, clarifications, or anything answerable without looking up data.
Respond only with JSON {"mode": "research" | "conversational"}.`;

type ClassifyOptions = {
  log?: TurnLogContext;
};

export class ModeClassifier {
  private readonly oracle: Oracle;
  private readonly historyTurns: number;

  constructor(options: { oracle: Oracle; historyTurns?: number }) {
    this.oracle = options.oracle;
    this.historyTurns = options.historyTurns ?? 6;
  }

  /** Never throws: anything but a clean label falls back to conversational. */
  async classify(session: Session, utterance: string, options: ClassifyOptions = {}): Promise<Mode> {
    if (!utterance.trim()) return "conversational";
    try {
      return await this.label(session, utterance);
    } catch (error) {
      const ambiguous =
        error instanceof ClassificationAmbiguousError
          ? error
          : new ClassificationAmbiguousError(`Could not classify utterance: ${toErrorMessage(error)}`);
      const fields = { kind: ambiguous.kind, message: ambiguous.message, fallback: "conversational" };
      if (options.log) warnTurnLog(options.log, "classifier.ambiguous", fields);
      else warnEvent("classifier.ambiguous", fields);
      return "conversational";
    }
  }

  private async label(session: Session, utterance: string): Promise<Mode> {
    const transcript = renderTranscript(session.recent(this.historyTurns));
    const output = await completeStructured(
      this.oracle,
      {
        operation: "classify",
        system: systemPrompt,
        prompt: [transcript ? `Conversation so far:\n${transcript}` : "", `Latest message: ${utterance}`]
          .filter(Boolean)
          .join("\n\n"),
        schema: { name: "mode_label", schema: modeJsonSchema },
      },
      modeOutputSchema,
    );
    return output.mode;
  }
}
