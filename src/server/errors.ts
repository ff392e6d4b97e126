import { stepFailureSchema, type StepFailure, type StepFailureKind } from "@/lib/contracts";
import { compactText } from "@/lib/graph";

export type AgentErrorKind =
  | StepFailureKind
  | "ClassificationAmbiguous"
  | "PlanGenerationError"
  | "UnknownToolError"
  | "PlanAbortedError";

type AgentErrorInput = {
  kind: AgentErrorKind;
  message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
};

export class AgentError extends Error {
  readonly kind: AgentErrorKind;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor({ kind, message, retryable, details }: AgentErrorInput) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.retryable = retryable;
    this.details = details;
  }
}

export class ClassificationAmbiguousError extends AgentError {
  constructor(message: string) {
    super({ kind: "ClassificationAmbiguous", message, retryable: false });
  }
}

export class PlanGenerationError extends AgentError {
  constructor(message: string, kind: "PlanGenerationError" | "UnknownToolError" = "PlanGenerationError") {
    super({ kind, message, retryable: false });
  }
}

export class UnknownToolError extends PlanGenerationError {
  readonly tool: string;

  constructor(tool: string, step: number) {
    super(`Step ${step} names unknown tool "${tool}"`, "UnknownToolError");
    this.tool = tool;
  }
}

export class PlanAbortedError extends AgentError {
  constructor(completedSteps: number) {
    super({
      kind: "PlanAbortedError",
      message: `Plan abandoned after ${completedSteps} completed step(s)`,
      retryable: false,
    });
  }
}

export class QuerySyntaxError extends AgentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ kind: "QuerySyntaxError", message, retryable: true, details });
  }
}

export class FilterSyntaxError extends AgentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ kind: "FilterSyntaxError", message, retryable: true, details });
  }
}

export class QueryTimeoutError extends AgentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ kind: "QueryTimeoutError", message, retryable: true, details });
  }
}

export class ConnectionError extends AgentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ kind: "ConnectionError", message, retryable: false, details });
  }
}

export class DatasetUnavailableError extends AgentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ kind: "DatasetUnavailableError", message, retryable: false, details });
  }
}

export class AnalysisParameterError extends AgentError {
  constructor(message: string, options: { retryable: boolean }) {
    super({ kind: "AnalysisParameterError", message, retryable: options.retryable });
  }
}

export class DependencyFailedError extends AgentError {
  constructor(step: number, failedDependencies: number[]) {
    super({
      kind: "DependencyFailedError",
      message: `Step ${step} depends on failed step(s) ${failedDependencies.join(", ")}`,
      retryable: false,
      details: { failedDependencies },
    });
  }
}

export class OracleOutputError extends AgentError {
  constructor(message: string, excerpt?: string) {
    super({
      kind: "OracleOutputError",
      message: excerpt ? `${message}: ${compactText(excerpt, 160)}` : message,
      retryable: true,
    });
  }
}

export class OracleUnavailableError extends AgentError {
  constructor(message: string) {
    super({ kind: "OracleUnavailableError", message, retryable: false });
  }
}

const fatalBackendKinds = new Set<AgentErrorKind>(["ConnectionError", "DatasetUnavailableError"]);

export function isFatalBackendFailure(failure: Pick<StepFailure, "kind">): boolean {
  return fatalBackendKinds.has(failure.kind);
}

function isStepFailureKind(kind: AgentErrorKind): kind is StepFailureKind {
  return (
    kind !== "ClassificationAmbiguous" &&
    kind !== "PlanGenerationError" &&
    kind !== "UnknownToolError" &&
    kind !== "PlanAbortedError"
  );
}

export function toStepFailure(error: unknown): StepFailure {
  if (error instanceof AgentError && isStepFailureKind(error.kind)) {
    return stepFailureSchema.parse({
      kind: error.kind,
      message: compactText(error.message, 400),
      retryable: error.retryable,
    });
  }
  return stepFailureSchema.parse({
    kind: "UnexpectedError",
    message: compactText(error instanceof Error ? error.message : String(error), 400),
    retryable: false,
  });
}

/** Raised by a tool that gave up; `cause` is the last underlying error. */
export class ToolRunError extends Error {
  readonly attempts: number;

  constructor(cause: unknown, attempts: number) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = "ToolRunError";
    this.attempts = attempts;
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof AgentError && error.retryable;
}
