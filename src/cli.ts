import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import type { TurnReply } from "@/lib/contracts";
import { appConfig, assertRuntimeConfig } from "@/server/config";
import { createGafDatasetProvider } from "@/server/annotations/dataset";
import { createResearchAgent } from "@/server/agent/create-agent";
import { Neo4jGraphStore } from "@/server/graph/neo4j-store";
import { OpenAiOracle } from "@/server/openai/oracle";
import { errorEvent, logEvent } from "@/server/telemetry";

const greeting =
  "Hi! Ask me about genes, KEGG pathways or Gene Ontology annotations. Type 'clear' to start over or 'exit' to quit.";

function formatReply(reply: TurnReply): string {
  const lines: string[] = [];
  if (reply.mode === "research" && reply.plan) {
    lines.push("Plan:");
    for (const step of reply.plan.steps) {
      const after = step.dependsOn.length > 0 ? ` (after ${step.dependsOn.join(", ")})` : "";
      lines.push(`  ${step.index}. [${step.tool}] ${step.subQuery}${after}`);
    }
    lines.push("");
  }
  lines.push(reply.text);
  if (reply.followUps.length > 0) {
    lines.push("", "Follow-up questions:");
    reply.followUps.forEach((followUp, index) => lines.push(`  ${index + 1}. ${followUp}`));
  }
  return lines.join("\n");
}

async function main(): Promise<void> {
  assertRuntimeConfig();
  const graphStore = new Neo4jGraphStore();
  const agent = createResearchAgent({
    oracle: new OpenAiOracle(),
    graphStore,
    annotations: createGafDatasetProvider(appConfig.gaf.filePath),
  });
  const rl = readline.createInterface({ input, output });
  logEvent("cli.start", { sessionId: agent.session.id });

  try {
    output.write(`${greeting}\n`);
    for (;;) {
      const line = (await rl.question("you: ")).trim();
      if (!line) continue;
      if (line.toLowerCase() === "exit") break;
      if (line.toLowerCase() === "clear") {
        agent.reset();
        output.write("Conversation cleared.\n");
        continue;
      }
      try {
        const reply = await agent.handle(line);
        output.write(`\nassistant: ${formatReply(reply)}\n\n`);
      } catch (error) {
        errorEvent("cli.turn_failed", error, { sessionId: agent.session.id });
        output.write("assistant: Something went wrong with that request; please try again.\n");
      }
    }
  } finally {
    rl.close();
    await graphStore.close();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
