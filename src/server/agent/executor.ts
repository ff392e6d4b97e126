import type { CapabilityDescriptor, Plan, PlanStep, StepPayload, StepResult } from "@/lib/contracts";
import {
  AnalysisParameterError,
  DependencyFailedError,
  PlanAbortedError,
  ToolRunError,
  UnknownToolError,
  toStepFailure,
} from "@/server/errors";
import { stepTurnLog, warnTurnLog, type TurnLogContext } from "@/server/telemetry";
import type { StepContext, ToolAdapters, ToolOutcome } from "@/server/tools/adapters";
import type { CapabilityRegistry } from "@/server/tools/registry";

export type ExecuteOptions = {
  signal?: AbortSignal;
  log?: TurnLogContext;
  onStepComplete?: (result: StepResult) => void;
};

function assertNever(value: never): never {
  throw new Error(`Unhandled capability kind: ${String(value)}`);
}

/**
 * Runs a plan step by step. Step N is dispatched only after step N-1's result
 * is recorded; results align with `plan.steps` by position. Adapter failures
 * become failure records; only an unknown tool (before any dispatch) and an
 * abort between steps escape.
 */
export class Executor {
  constructor(
    private readonly registry: CapabilityRegistry,
    private readonly adapters: ToolAdapters,
  ) {}

  async execute(plan: Plan, options: ExecuteOptions = {}): Promise<StepResult[]> {
    const descriptors = plan.steps.map((step) => {
      const descriptor = this.registry.get(step.tool);
      if (!descriptor) throw new UnknownToolError(step.tool, step.index);
      return descriptor;
    });

    const results: StepResult[] = [];
    for (const [position, step] of plan.steps.entries()) {
      if (options.signal?.aborted) {
        throw new PlanAbortedError(results.length);
      }
      const descriptor = descriptors[position];
      if (!descriptor) throw new UnknownToolError(step.tool, step.index);

      const result = await this.runStep(plan, step, descriptor, results, options);
      results.push(result);
      if (options.log) {
        const fields = {
          step: step.index,
          tool: step.tool,
          status: result.status,
          attempts: result.attempts,
          ...(result.status === "failure" ? { kind: result.error.kind } : {}),
        };
        if (result.status === "success") stepTurnLog(options.log, "executor.step", fields);
        else warnTurnLog(options.log, "executor.step", fields);
      }
      options.onStepComplete?.(result);
    }
    return results;
  }

  private async runStep(
    plan: Plan,
    step: PlanStep,
    descriptor: CapabilityDescriptor,
    results: readonly StepResult[],
    options: ExecuteOptions,
  ): Promise<StepResult> {
    const failedDependencies = step.dependsOn.filter(
      (dependency) => results[dependency - 1]?.status !== "success",
    );
    if (failedDependencies.length > 0) {
      const error =
        descriptor.kind === "graph_analysis"
          ? new AnalysisParameterError(
              `Step ${step.index} needs graph data from step(s) ${failedDependencies.join(", ")}, which did not succeed`,
              { retryable: false },
            )
          : new DependencyFailedError(step.index, failedDependencies);
      return { step: step.index, tool: step.tool, status: "failure", attempts: 0, error: toStepFailure(error) };
    }

    const context: StepContext = {
      question: plan.question,
      objective: plan.objective,
      step,
      priorResults: [...results],
      dependencyResults:
        step.dependsOn.length > 0
          ? step.dependsOn.flatMap((dependency) => {
              const result = results[dependency - 1];
              return result ? [result] : [];
            })
          : [...results],
      log: options.log,
    };

    try {
      const outcome = await this.dispatch(descriptor, step.subQuery, context);
      return {
        step: step.index,
        tool: step.tool,
        status: "success",
        attempts: outcome.attempts,
        payload: outcome.payload,
        ...(outcome.review ? { review: outcome.review } : {}),
      };
    } catch (error) {
      const attempts = error instanceof ToolRunError ? error.attempts : 0;
      const cause = error instanceof ToolRunError ? error.cause : error;
      return { step: step.index, tool: step.tool, status: "failure", attempts, error: toStepFailure(cause) };
    }
  }

  private dispatch(
    descriptor: CapabilityDescriptor,
    subQuery: string,
    context: StepContext,
  ): Promise<ToolOutcome<StepPayload>> {
    switch (descriptor.kind) {
      case "graph_query":
        return this.adapters.graphQuery(subQuery, context);
      case "tabular_query":
        return this.adapters.tabularQuery(subQuery, context);
      case "graph_analysis":
        return this.adapters.graphAnalysis(subQuery, context);
      default:
        return assertNever(descriptor.kind);
    }
  }
}
