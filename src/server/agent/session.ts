import { randomUUID } from "node:crypto";
import type { ChatMessage, Mode, Turn } from "@/lib/contracts";
import { compactText } from "@/lib/graph";
import { appConfig } from "@/server/config";

export type TurnInput = Omit<Turn, "at"> & { at?: string };

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const item of Object.values(value)) deepFreeze(item);
    Object.freeze(value);
  }
  return value;
}

/**
 * Conversation state for one user. Turns are frozen on append and kept in a
 * sliding window; only the orchestrator mutates a session.
 */
export class Session {
  readonly id: string;
  mode: Mode = "conversational";
  fatalFailures = 0;
  private readonly maxTurns: number;
  private window: Turn[] = [];

  constructor(options: { id?: string; maxTurns?: number } = {}) {
    this.id = options.id ?? randomUUID();
    this.maxTurns = Math.max(2, options.maxTurns ?? appConfig.session.maxTurns);
  }

  get turns(): readonly Turn[] {
    return this.window;
  }

  /** Stores a deep-frozen copy; later changes to `input` do not reach the history. */
  append(input: TurnInput): Turn {
    const turn: Turn = deepFreeze(structuredClone({ ...input, at: input.at ?? new Date().toISOString() }));
    this.window = [...this.window, turn].slice(-this.maxTurns);
    return turn;
  }

  recent(count: number): readonly Turn[] {
    return count <= 0 ? [] : this.window.slice(-count);
  }

  reset(): void {
    this.window = [];
    this.mode = "conversational";
    this.fatalFailures = 0;
  }
}

export function toChatHistory(turns: readonly Turn[]): ChatMessage[] {
  return turns.map((turn): ChatMessage => ({
    role: turn.speaker === "user" ? "user" : "assistant",
    content: turn.text,
  }));
}

/** Plain-text transcript for prompts; long system turns are shortened. */
export function renderTranscript(turns: readonly Turn[], maxCharsPerTurn = 600): string {
  return turns
    .map((turn) => `${turn.speaker === "user" ? "User" : "Assistant"}: ${compactText(turn.text, maxCharsPerTurn)}`)
    .join("\n");
}
