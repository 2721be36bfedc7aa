// Interview Dialogue Engine - Error taxonomy
//
// Usage errors (unknown session, completed session, no pending question) are
// reported to the caller and leave the session untouched. Judge errors are
// recoverable: the turn boundary converts them into an unevaluated turn.
// An invariant violation is fatal to the affected session only.

export type InterviewErrorCode =
  | "CONFIG_INVALID"
  | "SESSION_NOT_FOUND"
  | "SESSION_ALREADY_COMPLETED"
  | "NO_PENDING_QUESTION"
  | "SESSION_LIMIT_REACHED"
  | "JUDGE_UNAVAILABLE"
  | "JUDGE_TIMEOUT"
  | "JUDGE_MALFORMED_RESPONSE"
  | "INTERNAL_INVARIANT_VIOLATION";

/**
 * Validation detail for a configuration field.
 */
export interface ValidationDetail {
  /** Field path that failed validation, e.g. `questions[2].id`. */
  readonly field: string;
  readonly message: string;
}

/**
 * Base class for every error the engine raises on purpose.
 * Callers branch on `code` rather than on the concrete class.
 */
export class InterviewError extends Error {
  public readonly code: InterviewErrorCode;

  constructor(message: string, code: InterviewErrorCode, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "InterviewError";
    this.code = code;
  }
}

export class ConfigInvalidError extends InterviewError {
  public readonly details: readonly ValidationDetail[];

  constructor(message: string, details: readonly ValidationDetail[] = [], options?: { cause?: unknown }) {
    super(message, "CONFIG_INVALID", options);
    this.name = "ConfigInvalidError";
    this.details = details;
  }
}

export class SessionNotFoundError extends InterviewError {
  constructor(public readonly sessionId: string) {
    super(`Session not found: ${sessionId}`, "SESSION_NOT_FOUND");
    this.name = "SessionNotFoundError";
  }
}

export class SessionAlreadyCompletedError extends InterviewError {
  constructor(
    public readonly sessionId: string,
    public readonly phase: string,
  ) {
    super(`Session ${sessionId} is already finished (phase "${phase}")`, "SESSION_ALREADY_COMPLETED");
    this.name = "SessionAlreadyCompletedError";
  }
}

export class NoPendingQuestionError extends InterviewError {
  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} is not waiting for an answer`, "NO_PENDING_QUESTION");
    this.name = "NoPendingQuestionError";
  }
}

export class SessionLimitReachedError extends InterviewError {
  constructor(public readonly limit: number) {
    super(`Maximum number of concurrent sessions reached (${limit})`, "SESSION_LIMIT_REACHED");
    this.name = "SessionLimitReachedError";
  }
}

// ─── Judge errors ───────────────────────────────────────────────────────────────

export type JudgeErrorCode = "JUDGE_UNAVAILABLE" | "JUDGE_TIMEOUT" | "JUDGE_MALFORMED_RESPONSE";

export class JudgeError extends InterviewError {
  declare readonly code: JudgeErrorCode;

  constructor(message: string, code: JudgeErrorCode, options?: { cause?: unknown }) {
    super(message, code, options);
    this.name = "JudgeError";
  }
}

export class JudgeUnavailableError extends JudgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "JUDGE_UNAVAILABLE", options);
    this.name = "JudgeUnavailableError";
  }
}

export class JudgeTimeoutError extends JudgeError {
  constructor(public readonly timeoutMs: number) {
    super(`Judge did not respond within ${timeoutMs}ms`, "JUDGE_TIMEOUT");
    this.name = "JudgeTimeoutError";
  }
}

export class JudgeMalformedResponseError extends JudgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "JUDGE_MALFORMED_RESPONSE", options);
    this.name = "JudgeMalformedResponseError";
  }
}

export function isJudgeError(err: unknown): err is JudgeError {
  return err instanceof JudgeError;
}

// ─── Invariant violations ───────────────────────────────────────────────────────

export class InternalInvariantViolationError extends InterviewError {
  /** Full state at the point of detection, for diagnosis. */
  public readonly snapshot: unknown;

  constructor(message: string, snapshot: unknown) {
    super(message, "INTERNAL_INVARIANT_VIOLATION");
    this.name = "InternalInvariantViolationError";
    this.snapshot = snapshot;
  }
}

/**
 * Usage errors leave the session as it was, so transports may report them as
 * recoverable.
 */
export function isRecoverable(err: unknown): boolean {
  if (!(err instanceof InterviewError)) return false;
  return err.code !== "CONFIG_INVALID" && err.code !== "INTERNAL_INVARIANT_VIOLATION";
}
