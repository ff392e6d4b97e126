import type {
  GraphAnalysisPayload,
  GraphQueryPayload,
  PlanStep,
  ResultReview,
  StepResult,
  TabularQueryPayload,
} from "@/lib/contracts";
import type { TurnLogContext } from "@/server/telemetry";

export type StepContext = {
  question: string;
  objective: string;
  step: PlanStep;
  /** Every result recorded before this step, in plan order. */
  priorResults: readonly StepResult[];
  /** Results of the declared dependencies, or all prior results when none are declared. */
  dependencyResults: readonly StepResult[];
  log?: TurnLogContext;
};

export type ToolOutcome<P> = {
  payload: P;
  attempts: number;
  review?: ResultReview;
};

/** One method per capability kind; the executor dispatches on the descriptor kind. */
export interface ToolAdapters {
  graphQuery(subQuery: string, context: StepContext): Promise<ToolOutcome<GraphQueryPayload>>;
  tabularQuery(subQuery: string, context: StepContext): Promise<ToolOutcome<TabularQueryPayload>>;
  graphAnalysis(subQuery: string, context: StepContext): Promise<ToolOutcome<GraphAnalysisPayload>>;
}

type Answering<P> = {
  answer(subQuery: string, context: StepContext): Promise<ToolOutcome<P>>;
};

export function createToolAdapters(tools: {
  graphQuery: Answering<GraphQueryPayload>;
  tabularQuery: Answering<TabularQueryPayload>;
  graphAnalysis: Answering<GraphAnalysisPayload>;
}): ToolAdapters {
  return {
    graphQuery: (subQuery, context) => tools.graphQuery.answer(subQuery, context),
    tabularQuery: (subQuery, context) => tools.tabularQuery.answer(subQuery, context),
    graphAnalysis: (subQuery, context) => tools.graphAnalysis.answer(subQuery, context),
  };
}
