/**
 * Error Types
 *
 * Errors raised by the verification pipeline and its collaborators.
 * Parse failures of language-model output are never represented here: they
 * are resolved to documented defaults at the stage that detects them.
 *
 * @module errors
 */

export type ProviderKind = "search" | "index" | "llm";

/**
 * A vector index or web search call failed.
 * `fatal` marks failures that will not go away on their own (quota, auth).
 */
export class ProviderError extends Error {
  constructor(
    public readonly provider: string,
    public readonly kind: ProviderKind,
    message: string,
    public readonly status?: number,
    public readonly fatal: boolean = false,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ProviderError";
  }
}

export type ModelTask = "evaluate" | "synthesize" | "review" | "extract";

/** A language-model invocation failed (network, auth, timeout, empty response). */
export class ModelInvocationError extends Error {
  constructor(
    public readonly task: ModelTask,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ModelInvocationError";
  }
}

export class EmptyClaimError extends Error {
  constructor() {
    super("Claim is empty");
    this.name = "EmptyClaimError";
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
