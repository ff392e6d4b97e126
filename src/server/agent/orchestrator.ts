import type { Hypothesis, Mode, Plan, StepResult, Turn, TurnReply } from "@/lib/contracts";
import { appConfig } from "@/server/config";
import { PlanAbortedError, PlanGenerationError, isFatalBackendFailure } from "@/server/errors";
import type { Oracle } from "@/server/openai/oracle";
import {
  endTurnLog,
  errorTurnLog,
  startTurnLog,
  stepTurnLog,
  toErrorMessage,
  warnTurnLog,
  type TurnLogContext,
} from "@/server/telemetry";
import type { CapabilityRegistry } from "@/server/tools/registry";
import type { Executor } from "@/server/agent/executor";
import type { ModeClassifier } from "@/server/agent/mode-classifier";
import type { Planner } from "@/server/agent/planner";
import { Session, renderTranscript, toChatHistory } from "@/server/agent/session";
import type { HypothesisSynthesizer } from "@/server/agent/synthesizer";

export type OrchestratorState = "idle" | "classifying" | "conversational_reply" | "research_pipeline";

export type HandleOptions = {
  signal?: AbortSignal;
};

export type OrchestratorDependencies = {
  oracle: Oracle;
  registry: CapabilityRegistry;
  classifier: ModeClassifier;
  planner: Planner;
  executor: Executor;
  synthesizer: HypothesisSynthesizer;
  session?: Session;
  degradedFailureThreshold?: number;
  historyTurns?: number;
};

export const unavailableReply =
  "I'm sorry, I can't respond right now. Please try again in a moment.";
export const cancelledReply = "The research was cancelled before it finished, so there is no answer this time.";
export const degradedNotice =
  "Note: the pathway graph or the annotation data has failed repeatedly in this session, so answers may be incomplete.";

const conversationalPrompt = `You are a biomedical research assistant that can look up KEGG pathways and Gene Ontology annotations.
Reply briefly and helpfully. When the user seems to want a biomedical answer but the request is underspecified, ask one follow-up question that would let you research it (for example which gene, pathway or organism they mean).`;

type PipelineOutcome = {
  mode: Mode;
  text: string;
  followUps: string[];
  plan?: Plan;
  results?: StepResult[];
  hypothesis?: Hypothesis;
};

function apologyFor(error: unknown): string {
  const reason = error instanceof PlanGenerationError ? error.message : toErrorMessage(error);
  return `I'm sorry, I couldn't put together a research plan for that (${reason}). Could you rephrase the question, or name the genes or pathways you are interested in?`;
}

/**
 * Runs one session turn by turn: classify, then either reply conversationally
 * or plan, execute and synthesize. A turn always ends with a reply; only the
 * state machine returns to idle between turns.
 */
export class ConversationOrchestrator {
  readonly session: Session;
  private readonly deps: OrchestratorDependencies;
  private readonly degradedThreshold: number;
  private readonly historyTurns: number;
  private currentState: OrchestratorState = "idle";
  private tail: Promise<unknown> = Promise.resolve();

  constructor(deps: OrchestratorDependencies) {
    this.deps = deps;
    this.session = deps.session ?? new Session();
    this.degradedThreshold = Math.max(
      1,
      deps.degradedFailureThreshold ?? appConfig.session.degradedFailureThreshold,
    );
    this.historyTurns = deps.historyTurns ?? 8;
  }

  get state(): OrchestratorState {
    return this.currentState;
  }

  get degraded(): boolean {
    return this.session.fatalFailures >= this.degradedThreshold;
  }

  /** Turns are serialized: a second call waits for the first to finish. */
  handle(utterance: string, options: HandleOptions = {}): Promise<TurnReply> {
    const turn = this.tail.then(() => this.runTurn(utterance, options));
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  reset(): void {
    this.session.reset();
    this.currentState = "idle";
  }

  private async runTurn(utterance: string, options: HandleOptions): Promise<TurnReply> {
    const log = startTurnLog(this.session.id, { chars: utterance.length });
    try {
      this.currentState = "classifying";
      const mode = await this.deps.classifier.classify(this.session, utterance, { log });
      stepTurnLog(log, "turn.classified", { mode });

      const history = this.session.recent(this.historyTurns);
      this.session.append({ speaker: "user", text: utterance, mode });

      const outcome =
        mode === "research"
          ? await this.research(utterance, history, options, log)
          : await this.converse(utterance, history, log);

      const degraded = this.degraded;
      const text = degraded ? `${outcome.text}\n\n${degradedNotice}` : outcome.text;
      this.session.mode = outcome.mode;
      this.session.append({
        speaker: "system",
        text,
        mode: outcome.mode,
        plan: outcome.plan,
        results: outcome.results,
        hypothesis: outcome.hypothesis,
      });

      endTurnLog(log, {
        mode: outcome.mode,
        steps: outcome.plan?.steps.length ?? 0,
        degraded,
      });
      return {
        mode: outcome.mode,
        text,
        followUps: outcome.followUps,
        plan: outcome.plan,
        results: outcome.results,
        degraded,
      };
    } catch (error) {
      errorTurnLog(log, "turn.failed", error);
      throw error;
    } finally {
      this.currentState = "idle";
    }
  }

  private async converse(
    utterance: string,
    history: readonly Turn[],
    log: TurnLogContext,
  ): Promise<PipelineOutcome> {
    this.currentState = "conversational_reply";
    try {
      const text = await this.deps.oracle.complete({
        operation: "converse",
        system: conversationalPrompt,
        prompt: utterance,
        history: toChatHistory(history),
      });
      return { mode: "conversational", text: text.trim(), followUps: [] };
    } catch (error) {
      warnTurnLog(log, "turn.converse_unavailable", { message: toErrorMessage(error) });
      return { mode: "conversational", text: unavailableReply, followUps: [] };
    }
  }

  private async research(
    utterance: string,
    history: readonly Turn[],
    options: HandleOptions,
    log: TurnLogContext,
  ): Promise<PipelineOutcome> {
    let plan: Plan;
    try {
      plan = await this.deps.planner.plan(utterance, this.deps.registry.list(), renderTranscript(history), {
        log,
      });
    } catch (error) {
      warnTurnLog(log, "turn.plan_failed", { message: toErrorMessage(error) });
      this.currentState = "conversational_reply";
      return { mode: "conversational", text: apologyFor(error), followUps: [] };
    }

    // in-flight model and database calls finish; cancellation takes effect between stages
    if (options.signal?.aborted) return this.cancelled(plan, log, "planning");

    this.currentState = "research_pipeline";
    let results: StepResult[];
    try {
      results = await this.deps.executor.execute(plan, { signal: options.signal, log });
    } catch (error) {
      if (error instanceof PlanAbortedError) return this.cancelled(plan, log, error.message);
      if (error instanceof PlanGenerationError) {
        warnTurnLog(log, "turn.plan_rejected", { message: error.message });
        this.currentState = "conversational_reply";
        return { mode: "conversational", text: apologyFor(error), followUps: [] };
      }
      throw error;
    }

    const fatal = results.filter(
      (result) => result.status === "failure" && isFatalBackendFailure(result.error),
    ).length;
    if (fatal > 0) {
      this.session.fatalFailures += fatal;
      warnTurnLog(log, "turn.backend_failures", {
        fatal,
        total: this.session.fatalFailures,
      });
    }

    if (options.signal?.aborted) return this.cancelled(plan, log, "execution");

    const hypothesis = await this.deps.synthesizer.synthesize(utterance, plan, results, { log });
    return {
      mode: "research",
      text: hypothesis.text,
      followUps: hypothesis.followUps,
      plan,
      results,
      hypothesis,
    };
  }

  private cancelled(plan: Plan, log: TurnLogContext, after: string): PipelineOutcome {
    warnTurnLog(log, "turn.cancelled", { after });
    return { mode: "research", text: cancelledReply, followUps: [], plan };
  }
}
