import { randomUUID } from "node:crypto";
import { appConfig, type LogLevel } from "@/server/config";
import { compactText } from "@/lib/graph";

type EmitLevel = Exclude<LogLevel, "silent">;

export type TurnLogContext = {
  turnId: string;
  sessionId: string;
  startedAt: number;
};

const levelRank: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
};

function nowIso() {
  return new Date().toISOString();
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return compactText(error.message, 240);
  if (typeof error === "string") return compactText(error, 240);
  return "unknown error";
}

function emit(level: EmitLevel, event: string, fields: Record<string, unknown>) {
  if (levelRank[level] > levelRank[appConfig.logLevel]) return;
  const payload = {
    ts: nowIso(),
    level,
    event,
    ...fields,
  };
  const line = JSON.stringify(payload);
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  console.log(line);
}

export function logEvent(event: string, fields: Record<string, unknown> = {}) {
  emit("info", event, fields);
}

export function warnEvent(event: string, fields: Record<string, unknown> = {}) {
  emit("warn", event, fields);
}

export function errorEvent(event: string, error: unknown, fields: Record<string, unknown> = {}) {
  emit("error", event, { message: toErrorMessage(error), ...fields });
}

export function startTurnLog(
  sessionId: string,
  fields: Record<string, unknown> = {},
): TurnLogContext {
  const context: TurnLogContext = {
    turnId: randomUUID().slice(0, 8),
    sessionId,
    startedAt: Date.now(),
  };

  emit("info", "turn.start", {
    turnId: context.turnId,
    sessionId,
    ...fields,
  });
  return context;
}

export function stepTurnLog(
  context: TurnLogContext,
  event: string,
  fields: Record<string, unknown> = {},
) {
  emit("info", event, {
    turnId: context.turnId,
    sessionId: context.sessionId,
    elapsedMs: Date.now() - context.startedAt,
    ...fields,
  });
}

export function warnTurnLog(
  context: TurnLogContext,
  event: string,
  fields: Record<string, unknown> = {},
) {
  emit("warn", event, {
    turnId: context.turnId,
    sessionId: context.sessionId,
    elapsedMs: Date.now() - context.startedAt,
    ...fields,
  });
}

export function errorTurnLog(
  context: TurnLogContext,
  event: string,
  error: unknown,
  fields: Record<string, unknown> = {},
) {
  emit("error", event, {
    turnId: context.turnId,
    sessionId: context.sessionId,
    elapsedMs: Date.now() - context.startedAt,
    message: toErrorMessage(error),
    ...fields,
  });
}

export function endTurnLog(
  context: TurnLogContext,
  fields: Record<string, unknown> = {},
) {
  emit("info", "turn.end", {
    turnId: context.turnId,
    sessionId: context.sessionId,
    elapsedMs: Date.now() - context.startedAt,
    ...fields,
  });
}
