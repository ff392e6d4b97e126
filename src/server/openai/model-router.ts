import { appConfig } from "@/server/config";

export type OracleOperation =
  | "classify"
  | "converse"
  | "plan"
  | "plan_review"
  | "generate_query"
  | "review_result"
  | "synthesize";

type ModelDecision = {
  model: string;
  tier: "mini" | "full";
};

export function chooseOracleModel(operation: OracleOperation): ModelDecision {
  // one-label decisions do not need the large model
  if (operation === "classify") {
    return { model: appConfig.openai.smallModel, tier: "mini" };
  }
  return { model: appConfig.openai.model, tier: "full" };
}
