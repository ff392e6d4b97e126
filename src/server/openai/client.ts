import OpenAI from "openai";
import { appConfig } from "@/server/config";

const clientCache = new Map<string, OpenAI>();

export function createOpenAIClient(apiKey: string | undefined = appConfig.openAiApiKey): OpenAI | null {
  if (!apiKey) return null;
  const cached = clientCache.get(apiKey);
  if (cached) return cached;

  const client = new OpenAI({
    apiKey,
    timeout: appConfig.openai.timeoutMs,
    maxRetries: appConfig.openai.maxRetries,
  });
  clientCache.set(apiKey, client);
  return client;
}
