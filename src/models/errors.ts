/**
 * Error types for the deep research agent.
 *
 * Structured-reply parse failures are NOT errors — each step recovers
 * with its own fallback. Everything here is a run-level failure that
 * reaches the caller of `runResearch()`.
 */

/** Which external collaborator a failure came from. */
export type CollaboratorName = "text-generation" | "web-search";

/**
 * Raised when a collaborator call (LLM or web search) fails after all
 * retries have been used up.
 */
export class CollaboratorError extends Error {
  readonly collaborator: CollaboratorName;
  readonly retryable: boolean;

  constructor(
    collaborator: CollaboratorName,
    message: string,
    options?: { retryable?: boolean; cause?: unknown },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "CollaboratorError";
    this.collaborator = collaborator;
    this.retryable = options?.retryable ?? true;
  }
}

/**
 * Raised when a single collaborator call exceeds its time budget.
 * Retryable by definition.
 */
export class CollaboratorTimeoutError extends CollaboratorError {
  readonly timeoutMs: number;

  constructor(collaborator: CollaboratorName, timeoutMs: number) {
    super(collaborator, `${collaborator} call timed out after ${timeoutMs}ms`, {
      retryable: true,
    });
    this.name = "CollaboratorTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Raised before any run starts when required settings or credentials
 * are missing.
 */
export class ConfigurationError extends Error {
  readonly missingKeys: string[];

  constructor(message: string, missingKeys: string[] = []) {
    super(message);
    this.name = "ConfigurationError";
    this.missingKeys = missingKeys;
  }
}

/** Raised for input a run cannot start from (e.g. an empty query). */
export class ResearchInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResearchInputError";
  }
}

/**
 * Raised when a session already holds research for a different query.
 */
export class SessionConflictError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string, message: string) {
    super(message);
    this.name = "SessionConflictError";
    this.sessionId = sessionId;
  }
}

/**
 * Render any thrown value as a log-safe message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
