import type { CapabilityDescriptor } from "@/lib/contracts";
import { appConfig } from "@/server/config";
import type { AnnotationDataset } from "@/server/annotations/dataset";
import type { GraphStore } from "@/server/graph/store";
import type { Oracle } from "@/server/openai/oracle";
import { createToolAdapters } from "@/server/tools/adapters";
import { AnnotationQueryTool } from "@/server/tools/annotation-query";
import { GraphAnalysisTool } from "@/server/tools/graph-analysis";
import { GraphQueryTool } from "@/server/tools/graph-query";
import { createCapabilityRegistry, type CapabilityRegistry } from "@/server/tools/registry";
import { Executor } from "@/server/agent/executor";
import { ModeClassifier } from "@/server/agent/mode-classifier";
import { ConversationOrchestrator } from "@/server/agent/orchestrator";
import { Planner } from "@/server/agent/planner";
import { Session } from "@/server/agent/session";
import { HypothesisSynthesizer } from "@/server/agent/synthesizer";

export type ResearchAgentWiring = {
  oracle: Oracle;
  graphStore: GraphStore;
  annotations: () => Promise<AnnotationDataset>;
  registry?: CapabilityRegistry;
  capabilities?: readonly CapabilityDescriptor[];
  session?: Session;
};

/** Assembles one orchestrator over shared backends; settings come from appConfig. */
export function createResearchAgent(wiring: ResearchAgentWiring): ConversationOrchestrator {
  const { oracle } = wiring;
  const registry = wiring.registry ?? createCapabilityRegistry(wiring.capabilities);
  const adapters = createToolAdapters({
    graphQuery: new GraphQueryTool({ oracle, store: wiring.graphStore }),
    tabularQuery: new AnnotationQueryTool({ oracle, dataset: wiring.annotations }),
    graphAnalysis: new GraphAnalysisTool({ oracle }),
  });

  return new ConversationOrchestrator({
    oracle,
    registry,
    classifier: new ModeClassifier({ oracle }),
    planner: new Planner({
      oracle,
      maxSteps: appConfig.planner.maxSteps,
      review: appConfig.planner.review,
      maxAttempts: appConfig.planner.maxAttempts,
    }),
    executor: new Executor(registry, adapters),
    synthesizer: new HypothesisSynthesizer({ oracle }),
    session: wiring.session ?? new Session({ maxTurns: appConfig.session.maxTurns }),
    degradedFailureThreshold: appConfig.session.degradedFailureThreshold,
  });
}
