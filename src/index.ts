export * from "@/lib/contracts";
export { mergeFragments } from "@/lib/graph";
export { appConfig, type AppConfig } from "@/server/config";
export * from "@/server/errors";
export {
  SqliteAnnotationDataset,
  createGafDatasetProvider,
  type AnnotationDataset,
  type TabularResult,
} from "@/server/annotations/dataset";
export { evidenceCodes, gafColumnNames } from "@/server/annotations/gaf";
export { Neo4jGraphStore } from "@/server/graph/neo4j-store";
export type { GraphQueryResult, GraphRunOptions, GraphStore } from "@/server/graph/store";
export { OpenAiOracle, type Oracle, type OracleRequest } from "@/server/openai/oracle";
export { completeStructured } from "@/server/openai/structured";
export type { StepContext, ToolAdapters, ToolOutcome } from "@/server/tools/adapters";
export { createToolAdapters } from "@/server/tools/adapters";
export { AnnotationQueryTool } from "@/server/tools/annotation-query";
export { GraphAnalysisTool } from "@/server/tools/graph-analysis";
export { GraphQueryTool } from "@/server/tools/graph-query";
export {
  createCapabilityRegistry,
  defaultCapabilities,
  defaultTieBreak,
  type CapabilityRegistry,
} from "@/server/tools/registry";
export { createResearchAgent, type ResearchAgentWiring } from "@/server/agent/create-agent";
export { Executor, type ExecuteOptions } from "@/server/agent/executor";
export { ModeClassifier } from "@/server/agent/mode-classifier";
export { ConversationOrchestrator, type OrchestratorState } from "@/server/agent/orchestrator";
export { Planner, validatePlan } from "@/server/agent/planner";
export { Session } from "@/server/agent/session";
export { HypothesisSynthesizer } from "@/server/agent/synthesizer";
