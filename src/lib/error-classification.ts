/**
 * Error Classification
 *
 * Classifies pipeline errors to determine if they represent provider-level
 * failures (search/LLM/index outages, quota exhaustion) vs. input issues or timeouts.
 * The orchestrator records the classification next to the error message.
 *
 * @module error-classification
 */

import { EmptyClaimError, ModelInvocationError, ProviderError, type ProviderKind } from "./errors";

export type ErrorCategory = "provider_outage" | "rate_limit" | "input_error" | "timeout" | "unknown";

export type ClassifiedError = {
  category: ErrorCategory;
  provider: ProviderKind | null;
  message: string;
  retriable: boolean;
};

/** Patterns indicating LLM provider rate limiting or outage */
const RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /status\s*(?:code\s*)?529/i,
  /status\s*(?:code\s*)?503/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /overloaded/i,
  /quota/i,
];

const AUTH_PATTERNS = [
  /api\s*key/i,
  /authentication/i,
  /unauthorized/i,
  /status\s*(?:code\s*)?401/i,
  /status\s*(?:code\s*)?403/i,
];

const TIMEOUT_PATTERNS = [/timeout/i, /timed?\s*out/i, /AbortError/i, /ETIMEDOUT/i, /ECONNRESET/i];

function statusOf(error: unknown): number | undefined {
  if (!error || typeof error !== "object") return undefined;
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  return undefined;
}

function classifyMessage(msg: string, name: string, provider: ProviderKind | null): ClassifiedError | null {
  if (name === "TimeoutError" || name === "AbortError" || TIMEOUT_PATTERNS.some((p) => p.test(msg))) {
    return { category: "timeout", provider, message: msg, retriable: true };
  }
  if (AUTH_PATTERNS.some((p) => p.test(msg))) {
    return { category: "provider_outage", provider, message: msg, retriable: false };
  }
  if (RATE_LIMIT_PATTERNS.some((p) => p.test(msg))) {
    return { category: "rate_limit", provider, message: msg, retriable: true };
  }
  return null;
}

function classifyStatus(status: number | undefined, msg: string, provider: ProviderKind | null): ClassifiedError | null {
  if (status === 429 || status === 529 || status === 503) {
    return { category: "rate_limit", provider, message: msg, retriable: true };
  }
  if (status === 401 || status === 403) {
    return { category: "provider_outage", provider, message: msg, retriable: false };
  }
  return null;
}

/**
 * Classify an error to determine its category and the collaborator it came from.
 */
export function classifyError(error: unknown): ClassifiedError {
  const msg = error instanceof Error ? error.message : String(error);

  if (error instanceof EmptyClaimError) {
    return { category: "input_error", provider: null, message: msg, retriable: false };
  }

  // Already classified by the search / index layer
  if (error instanceof ProviderError) {
    const byStatus = classifyStatus(error.status, msg, error.kind);
    if (byStatus) return byStatus;
    const byMessage = classifyMessage(msg, "", error.kind);
    if (byMessage) return byMessage;
    return { category: "provider_outage", provider: error.kind, message: msg, retriable: !error.fatal };
  }

  // Model failures carry the SDK error as cause
  if (error instanceof ModelInvocationError) {
    const cause = error.cause;
    const causeName = cause instanceof Error ? cause.name : "";
    const causeMsg = cause instanceof Error ? cause.message : msg;
    return (
      classifyStatus(statusOf(cause), msg, "llm") ??
      classifyMessage(causeMsg, causeName, "llm") ??
      classifyMessage(msg, "", "llm") ?? { category: "provider_outage", provider: "llm", message: msg, retriable: false }
    );
  }

  const name = error instanceof Error ? error.name : "";
  return (
    classifyMessage(msg, name, null) ??
    classifyStatus(statusOf(error), msg, null) ?? { category: "unknown", provider: null, message: msg, retriable: false }
  );
}
