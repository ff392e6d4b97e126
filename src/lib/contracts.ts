import { z } from "zod";

export const modes = ["conversational", "research"] as const;

export const capabilityKinds = [
  "graph_query",
  "tabular_query",
  "graph_analysis",
] as const;

export const graphAnalyses = [
  "shortest_path",
  "degree_centrality",
  "subgraph",
  "node_impact",
] as const;

export const stepFailureKinds = [
  "QuerySyntaxError",
  "FilterSyntaxError",
  "QueryTimeoutError",
  "ConnectionError",
  "DatasetUnavailableError",
  "AnalysisParameterError",
  "DependencyFailedError",
  "OracleOutputError",
  "OracleUnavailableError",
  "UnexpectedError",
] as const;

export type Mode = (typeof modes)[number];
export type CapabilityKind = (typeof capabilityKinds)[number];
export type GraphAnalysisName = (typeof graphAnalyses)[number];
export type StepFailureKind = (typeof stepFailureKinds)[number];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type Row = Record<string, JsonValue>;

export const modeSchema = z.enum(modes);

export const capabilityDescriptorSchema = z.object({
  name: z.string().min(1),
  kind: z.enum(capabilityKinds),
  description: z.string(),
  subQueryShape: z.enum(["free_text", "structured"]),
  specificity: z.number().int().nonnegative(),
});

export const planStepSchema = z.object({
  index: z.number().int().positive(),
  tool: z.string().min(1),
  subQuery: z.string().min(1),
  goal: z.string(),
  dependsOn: z.array(z.number().int().positive()),
});

export const planSchema = z.object({
  question: z.string(),
  objective: z.string(),
  steps: z.array(planStepSchema),
});

export const graphNodeRefSchema = z.object({
  id: z.string(),
  labels: z.array(z.string()),
  pathways: z.array(z.string()),
});

export const graphEdgeRefSchema = z.object({
  source: z.string(),
  target: z.string(),
  relation: z.string(),
});

export const graphFragmentSchema = z.object({
  nodes: z.array(graphNodeRefSchema),
  edges: z.array(graphEdgeRefSchema),
});

export const stepFailureSchema = z.object({
  kind: z.enum(stepFailureKinds),
  message: z.string(),
  retryable: z.boolean(),
});

export const resultReviewSchema = z.object({
  accepted: z.boolean(),
  reflection: z.string(),
});

export const hypothesisSchema = z.object({
  text: z.string().min(1),
  followUps: z.array(z.string()),
  unresolved: z.array(z.string()),
});

export type CapabilityDescriptor = z.infer<typeof capabilityDescriptorSchema>;
export type PlanStep = z.infer<typeof planStepSchema>;
export type Plan = z.infer<typeof planSchema>;
export type GraphNodeRef = z.infer<typeof graphNodeRefSchema>;
export type GraphEdgeRef = z.infer<typeof graphEdgeRefSchema>;
export type GraphFragment = z.infer<typeof graphFragmentSchema>;
export type StepFailure = z.infer<typeof stepFailureSchema>;
export type ResultReview = z.infer<typeof resultReviewSchema>;
export type Hypothesis = z.infer<typeof hypothesisSchema>;

export type GraphQueryPayload = {
  kind: "graph_query";
  statement: string;
  explanation: string;
  rows: Row[];
  rowCount: number;
  truncated: boolean;
  fragment: GraphFragment;
};

export type TabularQueryPayload = {
  kind: "tabular_query";
  query: string;
  explanation: string;
  columns: string[];
  rows: Row[];
  rowCount: number;
  truncated: boolean;
  evidenceLegend: Record<string, string>;
};

export type GraphAnalysisParameters = {
  node: string | null;
  target: string | null;
  pathway: string | null;
  depth: number | null;
  limit: number | null;
};

export type GraphAnalysisPayload = {
  kind: "graph_analysis";
  analysis: GraphAnalysisName;
  parameters: GraphAnalysisParameters;
  explanation: string;
  result: Record<string, JsonValue>;
};

export type StepPayload =
  | GraphQueryPayload
  | TabularQueryPayload
  | GraphAnalysisPayload;

export type StepResult =
  | {
      step: number;
      tool: string;
      status: "success";
      attempts: number;
      payload: StepPayload;
      review?: ResultReview;
    }
  | {
      step: number;
      tool: string;
      status: "failure";
      attempts: number;
      error: StepFailure;
    };

export type Speaker = "user" | "system";

export type Turn = {
  speaker: Speaker;
  text: string;
  mode: Mode;
  at: string;
  plan?: Plan;
  results?: readonly StepResult[];
  hypothesis?: Hypothesis;
};

export type TurnReply = {
  mode: Mode;
  text: string;
  followUps: string[];
  plan?: Plan;
  results?: readonly StepResult[];
  degraded: boolean;
};

export type ChatMessage = {
  role: "user" | "assistant";
  content: string;
};
