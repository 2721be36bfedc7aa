// Interview Dialogue Engine - Shared TypeScript interfaces and types
// State records are immutable by convention: every transition returns a new object.

// ─── Interview Configuration ────────────────────────────────────────────────────

export interface Question {
  id: string;
  text: string;
  requiredKeywords: readonly string[];
  guidance: string;
}

/**
 * How the follow-up budget is scoped.
 *
 * - `per_question`: one counter per question; exhausting it advances past every
 *   remaining gap of that question.
 * - `per_keyword`: one counter per required point; the question advances once no
 *   missing point has budget left and no follow-up is pending.
 */
export type FollowUpPolicy = "per_question" | "per_keyword";

export type EvaluatorStrategy = "keyword" | "judge";

export interface InterviewConfig {
  jobDescription: string;
  questions: readonly Question[];
  maxFollowUpChances: number;
  followUpPolicy?: FollowUpPolicy;
  evaluatorStrategy?: EvaluatorStrategy;
}

// ─── Verdicts ───────────────────────────────────────────────────────────────────

export type PointStatus = "present" | "explained" | "missing";

export interface Verdict {
  readonly perPointStatus: Readonly<Record<string, PointStatus>>;
  readonly overallScore: number; // 0..1
  readonly followUp: string | null;
}

// ─── Turn State Machine ─────────────────────────────────────────────────────────

export enum TurnState {
  AWAITING_PROMPT = "awaiting_prompt",
  AWAITING_ANSWER = "awaiting_answer",
  EVALUATING = "evaluating",
  REVIEWING = "reviewing",
}

export enum SessionPhase {
  INTERVIEWING = "interviewing",
  REVIEWING = "reviewing",
  REPORTING = "reporting",
  DONE = "done",
  CANCELLED = "cancelled",
  FAILED = "failed",
}

export const TERMINAL_PHASES: ReadonlySet<SessionPhase> = new Set([
  SessionPhase.DONE,
  SessionPhase.CANCELLED,
  SessionPhase.FAILED,
]);

export interface PendingFollowUp {
  readonly point: string; // the gap this prompt probes
  readonly prompt: string;
}

export interface FollowUpState {
  readonly followUpCount: number;
  readonly pointCounts: Readonly<Record<string, number>>; // per_keyword budget usage
  readonly history: readonly Verdict[];
  readonly answers: readonly string[]; // every answer given to this question, in order
}

export type AnswerStatus = "complete" | "gaps_remaining" | "unevaluated";

export interface AnsweredRecord {
  readonly questionId: string;
  readonly questionText: string;
  readonly answerText: string; // final resolving answer
  readonly notes: string; // interviewer guidance for the question
  readonly status: AnswerStatus;
  readonly missing: readonly string[];
  readonly followUpsAsked: number;
  readonly evaluationNote: string | null;
}

/** Outcome of one evaluation, as seen by the state machine. */
export type TurnEvaluation =
  | {
      readonly kind: "evaluated";
      readonly missing: readonly string[];
      readonly verdict: Verdict;
      readonly followUps: readonly PendingFollowUp[];
    }
  | {
      readonly kind: "unevaluated";
      readonly code: string;
      readonly message: string;
    };

// ─── Review / Report ────────────────────────────────────────────────────────────

export interface QuestionCoverage {
  readonly questionId: string;
  readonly status: AnswerStatus;
  readonly missing: readonly string[];
}

export interface ReviewSummary {
  readonly text: string;
  readonly source: "judge" | "coverage";
  readonly coverage: readonly QuestionCoverage[];
  readonly coverageScore: number; // share of questions answered completely, 0..1
}

export interface ReviewOutcome {
  readonly summary: ReviewSummary;
  readonly report: string | null;
  readonly error: StageError | null;
}

export interface StageError {
  readonly code: string;
  readonly message: string;
}

// ─── Session ────────────────────────────────────────────────────────────────────

export interface SessionState {
  readonly sessionId: string;
  readonly questionIndex: number;
  readonly pendingFollowUps: readonly PendingFollowUp[];
  readonly currentPrompt: string | null;
  readonly currentPromptIsFollowUp: boolean;
  readonly pendingAnswer: string | null; // set between AWAITING_ANSWER and EVALUATING
  readonly answers: readonly AnsweredRecord[];
  readonly followUpTracking: Readonly<Record<number, FollowUpState>>;
  readonly phase: SessionPhase;
  readonly turnState: TurnState;
  readonly awaitingAnswer: boolean;
  readonly promptsIssued: number;
  readonly review: ReviewOutcome | null;
  readonly error: StageError | null;
}

export type TurnOutcomeKind = "prompt" | "completed" | "cancelled" | "failed";

/** What a caller of createSession / submitAnswer gets back. */
export interface TurnResult {
  sessionId: string;
  outcome: TurnOutcomeKind;
  prompt: string | null;
  isFollowUp: boolean;
  done: boolean;
  phase: SessionPhase;
  questionIndex: number;
}

export interface SessionListener {
  onPrompt?(sessionId: string, prompt: string, isFollowUp: boolean): void;
  onComplete?(sessionId: string, review: ReviewOutcome | null): void;
  onCancelled?(sessionId: string): void;
  onFailed?(sessionId: string, error: StageError): void;
}

// ─── Async primitives ───────────────────────────────────────────────────────────

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

export type ClientMessage =
  | { type: "start_interview" }
  | { type: "submit_answer"; text: string }
  | { type: "cancel_interview" };

export type ServerMessage =
  | { type: "session_started"; sessionId: string }
  | { type: "prompt"; prompt: string; isFollowUp: boolean; questionIndex: number }
  | { type: "interview_complete"; report: string | null; summary: string | null }
  | { type: "interview_cancelled" }
  | { type: "interview_failed"; message: string }
  | { type: "error"; code: string; message: string; recoverable: boolean };
