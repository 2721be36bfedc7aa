// Interview Dialogue Engine - Turn State Machine
// Question and follow-up sequencing for one interview.
//
// Pure transition functions over an immutable SessionState:
//
//   AWAITING_PROMPT ──advancePrompt──▶ AWAITING_ANSWER ──receiveAnswer──▶ EVALUATING
//         ▲                     │                                              │
//         └─────────────────────┼──────────────applyEvaluation─────────────────┘
//                               └──▶ REVIEWING (no follow-up and no question left)
//
// evaluateTurn() is the judge boundary: judge failures become an
// "unevaluated" outcome here and never reach the caller.

import {
  SessionPhase,
  TurnState,
  type AnsweredRecord,
  type AnswerStatus,
  type FollowUpPolicy,
  type FollowUpState,
  type PendingFollowUp,
  type Question,
  type SessionState,
  type TurnEvaluation,
} from "./types.js";
import type { AnswerEvaluator } from "./answer-evaluator.js";
import { followUpPromptFor } from "./answer-evaluator.js";
import { InternalInvariantViolationError, isJudgeError, type JudgeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { errorMessage, withTimeout } from "./utils.js";

export interface TurnPolicy {
  maxFollowUpChances: number;
  followUpPolicy: FollowUpPolicy;
}

const EMPTY_TRACKING: FollowUpState = {
  followUpCount: 0,
  pointCounts: {},
  history: [],
  answers: [],
};

// ─── Construction ───────────────────────────────────────────────────────────────

export function createInitialState(sessionId: string): SessionState {
  return {
    sessionId,
    questionIndex: 0,
    pendingFollowUps: [],
    currentPrompt: null,
    currentPromptIsFollowUp: false,
    pendingAnswer: null,
    answers: [],
    followUpTracking: {},
    phase: SessionPhase.INTERVIEWING,
    turnState: TurnState.AWAITING_PROMPT,
    awaitingAnswer: false,
    promptsIssued: 0,
    review: null,
    error: null,
  };
}

function assertTurnState(state: SessionState, expected: TurnState, operation: string): void {
  if (state.turnState !== expected) {
    throw new InternalInvariantViolationError(
      `${operation}() called in turn state "${state.turnState}", expected "${expected}"`,
      state,
    );
  }
}

// ─── AWAITING_PROMPT ────────────────────────────────────────────────────────────

/**
 * Decides the next action: the oldest pending follow-up, else the current main
 * question, else hand-off to review.
 */
export function advancePrompt(state: SessionState, questions: readonly Question[]): SessionState {
  assertTurnState(state, TurnState.AWAITING_PROMPT, "advancePrompt");

  if (state.pendingFollowUps.length > 0) {
    const [head, ...rest] = state.pendingFollowUps;
    return {
      ...state,
      pendingFollowUps: rest,
      currentPrompt: head.prompt,
      currentPromptIsFollowUp: true,
      turnState: TurnState.AWAITING_ANSWER,
      awaitingAnswer: true,
      promptsIssued: state.promptsIssued + 1,
    };
  }

  if (state.questionIndex < questions.length) {
    return {
      ...state,
      currentPrompt: questions[state.questionIndex].text,
      currentPromptIsFollowUp: false,
      turnState: TurnState.AWAITING_ANSWER,
      awaitingAnswer: true,
      promptsIssued: state.promptsIssued + 1,
    };
  }

  return {
    ...state,
    currentPrompt: null,
    currentPromptIsFollowUp: false,
    turnState: TurnState.REVIEWING,
    phase: SessionPhase.REVIEWING,
    awaitingAnswer: false,
  };
}

// ─── AWAITING_ANSWER ────────────────────────────────────────────────────────────

/** Accepts an answer. An empty string is a valid, recordable non-answer. */
export function receiveAnswer(state: SessionState, text: string): SessionState {
  assertTurnState(state, TurnState.AWAITING_ANSWER, "receiveAnswer");
  return {
    ...state,
    pendingAnswer: text,
    turnState: TurnState.EVALUATING,
    awaitingAnswer: false,
  };
}

/**
 * Text the evaluator sees for the current question: every answer given to it so
 * far, oldest first, including the one being evaluated. Follow-up answers add to
 * earlier ones; they are still checked against the question's full point set.
 */
export function answerForEvaluation(state: SessionState): string {
  const previous = state.followUpTracking[state.questionIndex]?.answers ?? [];
  return [...previous, state.pendingAnswer ?? ""].join("\n");
}

// ─── EVALUATING ─────────────────────────────────────────────────────────────────

/**
 * Applies the outcome of evaluating the pending answer and returns to
 * AWAITING_PROMPT, either staying on the current question with new follow-ups
 * or resolving it (recording exactly one AnsweredRecord) and advancing.
 */
export function applyEvaluation(
  state: SessionState,
  questions: readonly Question[],
  evaluation: TurnEvaluation,
  policy: TurnPolicy,
): SessionState {
  assertTurnState(state, TurnState.EVALUATING, "applyEvaluation");

  const index = state.questionIndex;
  const question = questions[index];
  if (!question || state.pendingAnswer === null) {
    throw new InternalInvariantViolationError(
      `Evaluating without a current question or answer (questionIndex=${index}, questions=${questions.length})`,
      state,
    );
  }

  const previous = state.followUpTracking[index] ?? EMPTY_TRACKING;
  const answers = [...previous.answers, state.pendingAnswer];

  if (evaluation.kind === "unevaluated") {
    return resolveQuestion(state, question, { ...previous, answers }, "unevaluated", [],
      `Evaluation unavailable (${evaluation.code}): ${evaluation.message}`);
  }

  const tracking: FollowUpState = {
    ...previous,
    history: [...previous.history, evaluation.verdict],
    answers,
  };

  if (evaluation.missing.length === 0) {
    return resolveQuestion(state, question, tracking, "complete", [], null);
  }

  if (policy.followUpPolicy === "per_keyword") {
    return applyPerKeywordBudget(state, question, tracking, evaluation, policy.maxFollowUpChances);
  }

  if (previous.followUpCount >= policy.maxFollowUpChances) {
    // Budget spent: move past every remaining gap of this question.
    return resolveQuestion(state, question, tracking, "gaps_remaining", evaluation.missing, null);
  }

  const queue = enqueueNew(state.pendingFollowUps, evaluation.followUps);
  return stayOnQuestion(state, { ...tracking, followUpCount: previous.followUpCount + 1 }, queue);
}

function applyPerKeywordBudget(
  state: SessionState,
  question: Question,
  tracking: FollowUpState,
  evaluation: Extract<TurnEvaluation, { kind: "evaluated" }>,
  maxFollowUpChances: number,
): SessionState {
  const pointCounts: Record<string, number> = { ...tracking.pointCounts };
  const pending = new Set(state.pendingFollowUps.map((f) => f.point));
  const additions: PendingFollowUp[] = [];

  for (const point of evaluation.missing) {
    if (pending.has(point)) continue;
    const used = pointCounts[point] ?? 0;
    if (used >= maxFollowUpChances) continue;
    pointCounts[point] = used + 1;
    pending.add(point);
    additions.push(
      evaluation.followUps.find((f) => f.point === point) ?? { point, prompt: followUpPromptFor(point) },
    );
  }

  const queue = [...state.pendingFollowUps, ...additions];
  if (queue.length === 0) {
    return resolveQuestion(state, question, { ...tracking, pointCounts }, "gaps_remaining", evaluation.missing, null);
  }

  return stayOnQuestion(
    state,
    {
      ...tracking,
      pointCounts,
      followUpCount: tracking.followUpCount + (additions.length > 0 ? 1 : 0),
    },
    queue,
  );
}

/** Appends follow-ups whose point is not already queued, keeping generation order. */
function enqueueNew(
  queue: readonly PendingFollowUp[],
  followUps: readonly PendingFollowUp[],
): PendingFollowUp[] {
  const points = new Set(queue.map((f) => f.point));
  const result = [...queue];
  for (const followUp of followUps) {
    if (points.has(followUp.point)) continue;
    points.add(followUp.point);
    result.push(followUp);
  }
  return result;
}

function stayOnQuestion(
  state: SessionState,
  tracking: FollowUpState,
  queue: readonly PendingFollowUp[],
): SessionState {
  return {
    ...state,
    pendingFollowUps: queue,
    followUpTracking: { ...state.followUpTracking, [state.questionIndex]: tracking },
    currentPrompt: null,
    currentPromptIsFollowUp: false,
    pendingAnswer: null,
    turnState: TurnState.AWAITING_PROMPT,
  };
}

function resolveQuestion(
  state: SessionState,
  question: Question,
  tracking: FollowUpState,
  status: AnswerStatus,
  missing: readonly string[],
  evaluationNote: string | null,
): SessionState {
  const record: AnsweredRecord = {
    questionId: question.id,
    questionText: question.text,
    answerText: (state.pendingAnswer ?? "").trim(),
    notes: question.guidance,
    status,
    missing: [...missing],
    followUpsAsked: tracking.answers.length - 1,
    evaluationNote,
  };

  return {
    ...state,
    questionIndex: state.questionIndex + 1,
    // Cleared, not starved: stale follow-ups never carry over to the next question.
    pendingFollowUps: [],
    answers: [...state.answers, record],
    followUpTracking: { ...state.followUpTracking, [state.questionIndex]: tracking },
    currentPrompt: null,
    currentPromptIsFollowUp: false,
    pendingAnswer: null,
    turnState: TurnState.AWAITING_PROMPT,
  };
}

// ─── Judge boundary ─────────────────────────────────────────────────────────────

export interface EvaluateTurnOptions {
  timeoutMs: number;
  maxAttempts: number;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Runs the evaluator for one turn. Judge failures (unavailable, timeout,
 * malformed response) are retried up to `maxAttempts` and then reported as an
 * unevaluated outcome. Anything else, including a cancellation of `signal`,
 * propagates.
 */
export async function evaluateTurn(
  evaluator: AnswerEvaluator,
  question: Question,
  answer: string,
  options: EvaluateTurnOptions,
): Promise<TurnEvaluation> {
  const logger = options.logger ?? silentLogger;
  const attempts = Math.max(1, options.maxAttempts);
  let lastError: JudgeError | undefined;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const assessment = await withTimeout(
        (signal) => evaluator.evaluate(question, answer, { signal }),
        options.timeoutMs,
        options.signal,
      );
      return {
        kind: "evaluated",
        missing: assessment.missing,
        verdict: assessment.verdict,
        followUps: assessment.followUps,
      };
    } catch (err) {
      if (!isJudgeError(err)) throw err;
      lastError = err;
      logger.warn(
        `Evaluation attempt ${attempt}/${attempts} for question "${question.id}" failed (${err.code}): ${errorMessage(err)}`,
      );
    }
  }

  return {
    kind: "unevaluated",
    code: lastError?.code ?? "JUDGE_UNAVAILABLE",
    message: lastError ? errorMessage(lastError) : "evaluation failed",
  };
}

// ─── Invariants ─────────────────────────────────────────────────────────────────

/**
 * Verifies the session invariants across one evaluation step.
 * @throws InternalInvariantViolationError carrying `next` as the snapshot.
 */
export function checkInvariants(
  previous: SessionState,
  next: SessionState,
  questions: readonly Question[],
  policy: TurnPolicy,
): void {
  const violations: string[] = [];

  if (next.questionIndex < previous.questionIndex) {
    violations.push(`questionIndex moved backwards (${previous.questionIndex} → ${next.questionIndex})`);
  }
  if (next.questionIndex > questions.length) {
    violations.push(`questionIndex ${next.questionIndex} is past the last question`);
  }
  if (next.pendingFollowUps.length > 0) {
    if (next.phase !== SessionPhase.INTERVIEWING) {
      violations.push(`follow-ups pending in phase "${next.phase}"`);
    }
    if (next.questionIndex >= questions.length) {
      violations.push("follow-ups pending after the last question was resolved");
    }
  }

  for (const [index, tracking] of Object.entries(next.followUpTracking)) {
    if (policy.followUpPolicy === "per_question" && tracking.followUpCount > policy.maxFollowUpChances) {
      violations.push(`question ${index} used ${tracking.followUpCount} follow-ups (max ${policy.maxFollowUpChances})`);
    }
    if (policy.followUpPolicy === "per_keyword") {
      for (const [point, used] of Object.entries(tracking.pointCounts)) {
        if (used > policy.maxFollowUpChances) {
          violations.push(`question ${index} point "${point}" used ${used} follow-ups (max ${policy.maxFollowUpChances})`);
        }
      }
    }
  }

  if (next.answers.length !== next.questionIndex) {
    violations.push(`${next.answers.length} answers recorded for ${next.questionIndex} resolved questions`);
  }
  const ids = new Set(next.answers.map((a) => a.questionId));
  if (ids.size !== next.answers.length) {
    violations.push("a question was recorded more than once");
  }

  if (violations.length > 0) {
    throw new InternalInvariantViolationError(`Session invariant violated: ${violations.join("; ")}`, next);
  }
}
