const DEFAULT_RATE_LIMIT_BACKOFF_MS = 25_000;
const MIN_RATE_LIMIT_BACKOFF_MS = 5_000;
const MAX_RATE_LIMIT_BACKOFF_MS = 90_000;

type HeaderBag = Record<string, unknown> | { get: (key: string) => unknown };

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return typeof value === "object" && value !== null
    ? (value as Record<string, unknown>)
    : undefined;
}

function parseRetryAfterValue(value: unknown, assumeSeconds: boolean): number | null {
  if (value == null) return null;
  if (typeof value === "number" && Number.isFinite(value)) {
    return assumeSeconds ? value * 1000 : value;
  }

  if (typeof value === "string") {
    const trimmed = value.trim();
    const numeric = Number(trimmed);
    if (trimmed && !Number.isNaN(numeric)) {
      return assumeSeconds ? numeric * 1000 : numeric;
    }

    const parsed = Date.parse(trimmed);
    if (!Number.isNaN(parsed)) {
      const delta = parsed - Date.now();
      return delta > 0 ? delta : null;
    }
  }

  return null;
}

function readHeaderValue(headers: HeaderBag, key: string): unknown {
  if ("get" in headers && typeof headers.get === "function") {
    return headers.get(key);
  }
  return (headers as Record<string, unknown>)[key];
}

function resolveRetryAfter(error: unknown): number | null {
  const info = asRecord(error) ?? {};
  const headers = asRecord(info.headers);
  if (!headers) return null;

  const candidates: Array<{ key: string; assumeSeconds: boolean }> = [
    { key: "retry-after-ms", assumeSeconds: false },
    { key: "retry-after", assumeSeconds: true },
    { key: "x-ratelimit-reset-requests", assumeSeconds: true },
  ];

  for (const candidate of candidates) {
    const headerValue = readHeaderValue(headers, candidate.key);
    if (headerValue != null) {
      return parseRetryAfterValue(headerValue, candidate.assumeSeconds);
    }
  }
  return null;
}

export function isOpenAiRateLimitError(error: unknown): boolean {
  const info = asRecord(error);
  if (info) {
    if (info.status === 429) return true;
    if (info.code === "rate_limit_exceeded") return true;
  }
  const message = error instanceof Error ? error.message : "";
  return /\b429\b|rate limit|too many requests/i.test(message);
}

export function getOpenAiRateLimitBackoffMs(error: unknown): number {
  const retryAfter = resolveRetryAfter(error);
  return retryAfter != null
    ? Math.max(MIN_RATE_LIMIT_BACKOFF_MS, Math.min(retryAfter, MAX_RATE_LIMIT_BACKOFF_MS))
    : DEFAULT_RATE_LIMIT_BACKOFF_MS;
}

export type RateLimitGate = {
  isLimited(): boolean;
  /** Opens a back-off window when the error is a rate limit. Returns whether it was one. */
  handle(error: unknown): boolean;
};

export function createRateLimitGate(now: () => number = Date.now): RateLimitGate {
  let limitedUntilMs = 0;
  return {
    isLimited: () => now() < limitedUntilMs,
    handle(error) {
      if (!isOpenAiRateLimitError(error)) return false;
      limitedUntilMs = Math.max(limitedUntilMs, now() + getOpenAiRateLimitBackoffMs(error));
      return true;
    },
  };
}
