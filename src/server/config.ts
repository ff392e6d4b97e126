import fs from "node:fs";
import path from "node:path";
import { config as loadDotenv } from "dotenv";

const envCandidates = [
  path.resolve(process.cwd(), ".env.local"),
  path.resolve(process.cwd(), ".env"),
];

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    loadDotenv({ path: envPath, override: false, quiet: true });
  }
}

export type LogLevel = "silent" | "error" | "warn" | "info";

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) return fallback;
  return parsed;
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") return true;
  if (normalized === "0" || normalized === "false" || normalized === "no") return false;
  return fallback;
};

const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  if (
    normalized === "silent" ||
    normalized === "error" ||
    normalized === "warn" ||
    normalized === "info"
  ) {
    return normalized;
  }
  return "info";
};

// attempt bounds are never zero
const parseAttempts = (value: string | undefined, fallback: number): number =>
  Math.max(1, Math.floor(parseNumber(value, fallback)));

export const appConfig = {
  openAiApiKey: process.env.OPENAI_API_KEY,
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  openai: {
    model: process.env.OPENAI_MODEL ?? "gpt-4o",
    smallModel: process.env.OPENAI_SMALL_MODEL ?? "gpt-4o-mini",
    timeoutMs: parseNumber(process.env.OPENAI_TIMEOUT_MS, 60_000),
    maxRetries: Math.max(0, Math.floor(parseNumber(process.env.OPENAI_MAX_RETRIES, 1))),
  },
  neo4j: {
    uri: process.env.NEO4J_URI ?? "bolt://localhost:7687",
    user: process.env.NEO4J_USER ?? "neo4j",
    password: process.env.NEO4J_PASSWORD,
    database: process.env.NEO4J_DATABASE || undefined,
    queryTimeoutMs: parseNumber(process.env.GRAPH_QUERY_TIMEOUT_MS, 20_000),
  },
  gaf: {
    filePath: path.resolve(
      process.cwd(),
      process.env.GAF_FILE ?? path.join("data", "gaf", "goa_human.gaf"),
    ),
  },
  tools: {
    maxAttempts: parseAttempts(process.env.QUERY_MAX_ATTEMPTS, 3),
    graphMaxAttempts: parseAttempts(process.env.GRAPH_QUERY_MAX_ATTEMPTS, 5),
    reviewResults: parseBoolean(process.env.QUERY_RESULT_REVIEW, true),
    maxResultRows: Math.max(1, parseNumber(process.env.MAX_RESULT_ROWS, 50)),
    defaultRowLimit: Math.max(1, parseNumber(process.env.DEFAULT_ROW_LIMIT, 10)),
  },
  planner: {
    review: parseBoolean(process.env.PLAN_REVIEW, true),
    maxAttempts: parseAttempts(process.env.PLAN_MAX_ATTEMPTS, 2),
    maxSteps: Math.max(1, Math.floor(parseNumber(process.env.MAX_PLAN_STEPS, 6))),
  },
  session: {
    maxTurns: Math.max(2, Math.floor(parseNumber(process.env.SESSION_MAX_TURNS, 20))),
    degradedFailureThreshold: Math.max(
      1,
      Math.floor(parseNumber(process.env.DEGRADED_FAILURE_THRESHOLD, 3)),
    ),
  },
  cache: {
    ttlMs: parseNumber(process.env.CACHE_TTL_MS, 5 * 60 * 1000),
    maxEntries: parseNumber(process.env.CACHE_MAX_ENTRIES, 100),
  },
};

export type AppConfig = typeof appConfig;

export function assertRuntimeConfig(): void {
  if (!appConfig.openAiApiKey) {
    console.warn("OPENAI_API_KEY missing: research mode will degrade to apologies.");
  }
  if (!appConfig.neo4j.password) {
    console.warn("NEO4J_PASSWORD missing: pathway graph queries will fail to authenticate.");
  }
}
