// Interview Dialogue Engine - Session Manager
// Session registry and per-session driver tasks.
//
// Each session runs one driver (an async loop) that owns its SessionState:
//
//   advancePrompt → publish prompt → wait for answer → evaluateTurn → applyEvaluation
//        ▲                                                                  │
//        └──────────────────────────────────────────────────────────────────┘
//   … until no question is left, then review → report → done.
//
// Waiting for an answer is the only indefinite suspension point. submitAnswer()
// resolves the driver's answer waiter; cancelSession() resolves it with a cancel
// signal instead and bumps runId so a stale driver discards whatever it was doing.

import { v4 as uuidv4 } from "uuid";
import { SessionPhase, TERMINAL_PHASES, TurnState } from "./types.js";
import type {
  Deferred,
  EvaluatorStrategy,
  InterviewConfig,
  SessionListener,
  SessionState,
  StageError,
  TurnOutcomeKind,
  TurnResult,
} from "./types.js";
import { KeywordEvaluator, type AnswerEvaluator } from "./answer-evaluator.js";
import {
  advancePrompt,
  answerForEvaluation,
  applyEvaluation,
  checkInvariants,
  createInitialState,
  evaluateTurn,
  receiveAnswer,
  type TurnPolicy,
} from "./turn-state-machine.js";
import { ReviewStage } from "./review-stage.js";
import { validateInterviewConfig } from "./job-config.js";
import {
  ConfigInvalidError,
  InternalInvariantViolationError,
  InterviewError,
  NoPendingQuestionError,
  SessionAlreadyCompletedError,
  SessionLimitReachedError,
  SessionNotFoundError,
} from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { createDeferred } from "./utils/deferred.js";
import { errorMessage } from "./utils.js";

export const DEFAULT_MAX_SESSIONS = 100;
export const DEFAULT_IDLE_TIMEOUT_MS = 30 * 60 * 1000;
export const DEFAULT_JUDGE_TIMEOUT_MS = 20_000;
export const DEFAULT_JUDGE_MAX_ATTEMPTS = 2;

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionManagerDeps {
  /** Evaluators by strategy. A KeywordEvaluator is supplied when "keyword" is absent. */
  evaluators?: Partial<Record<EvaluatorStrategy, AnswerEvaluator>>;
  reviewStage?: ReviewStage;
  logger?: Logger;
  /** Clock in epoch milliseconds. */
  now?: () => number;
}

export interface SessionManagerOptions {
  maxSessions?: number;
  idleTimeoutMs?: number;
  judgeTimeoutMs?: number;
  judgeMaxAttempts?: number;
}

type AnswerSignal = { kind: "answer"; text: string } | { kind: "cancel" };

interface ActiveSession {
  readonly id: string;
  readonly config: InterviewConfig;
  readonly policy: TurnPolicy;
  readonly evaluator: AnswerEvaluator;
  readonly listener: SessionListener;
  state: SessionState;
  /** Bumped on cancellation; a driver holding an older value stops committing. */
  runId: number;
  answerWaiter: Deferred<AnswerSignal> | null;
  /** Callers of createSession / submitAnswer waiting for the next checkpoint, oldest first. */
  resultWaiters: Deferred<TurnResult>[];
  /** A single answer submitted before the first prompt was produced. */
  earlyAnswer: string | null;
  controller: AbortController;
  lastActivityAt: number;
}

export class SessionManager {
  private readonly sessions: Map<string, ActiveSession> = new Map();
  private readonly evaluators: Partial<Record<EvaluatorStrategy, AnswerEvaluator>>;
  private readonly reviewStage: ReviewStage;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly maxSessions: number;
  private readonly idleTimeoutMs: number;
  private readonly judgeTimeoutMs: number;
  private readonly judgeMaxAttempts: number;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(deps: SessionManagerDeps = {}, options: SessionManagerOptions = {}) {
    this.logger = deps.logger ?? createConsoleLogger("SessionManager");
    this.evaluators = { keyword: new KeywordEvaluator(), ...deps.evaluators };
    this.reviewStage = deps.reviewStage ?? new ReviewStage({ logger: this.logger });
    this.now = deps.now ?? Date.now;
    this.maxSessions = options.maxSessions ?? DEFAULT_MAX_SESSIONS;
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    this.judgeTimeoutMs = options.judgeTimeoutMs ?? DEFAULT_JUDGE_TIMEOUT_MS;
    this.judgeMaxAttempts = options.judgeMaxAttempts ?? DEFAULT_JUDGE_MAX_ATTEMPTS;

    const strategies = Object.keys(this.evaluators).join(", ");
    this.logger.info(`Evaluators: ${strategies}; max sessions ${this.maxSessions}`);
  }

  // ─── Session lifecycle ──────────────────────────────────────────────────────

  /**
   * Validates `input`, registers a new session on a copy of it and starts its driver.
   * Resolves with the first prompt.
   *
   * @throws ConfigInvalidError, SessionLimitReachedError
   */
  async createSession(input: InterviewConfig, listener: SessionListener = {}): Promise<TurnResult> {
    validateInterviewConfig(input);
    // The session owns its questions; later changes to the caller's object do not reach it.
    const config = structuredClone(input);

    const strategy = config.evaluatorStrategy ?? "keyword";
    const evaluator = this.evaluators[strategy];
    if (!evaluator) {
      throw new ConfigInvalidError(`Evaluator strategy "${strategy}" is not available`, [
        { field: "evaluatorStrategy", message: `no "${strategy}" evaluator is configured` },
      ]);
    }

    if (this.activeSessionCount >= this.maxSessions) {
      throw new SessionLimitReachedError(this.maxSessions);
    }

    const id = uuidv4();
    const first = createDeferred<TurnResult>();
    const session: ActiveSession = {
      id,
      config,
      policy: {
        maxFollowUpChances: config.maxFollowUpChances,
        followUpPolicy: config.followUpPolicy ?? "per_question",
      },
      evaluator,
      listener,
      state: createInitialState(id),
      runId: 0,
      answerWaiter: null,
      resultWaiters: [first],
      earlyAnswer: null,
      controller: new AbortController(),
      lastActivityAt: this.now(),
    };
    this.sessions.set(id, session);
    this.logger.info(
      `Session ${id} created: ${config.questions.length} questions, evaluator ${strategy}, ` +
        `${session.policy.followUpPolicy} budget ${config.maxFollowUpChances}`,
    );

    // Started on the next microtask: the id is registered before the first prompt exists.
    Promise.resolve()
      .then(() => this.drive(session))
      .catch((err: unknown) => {
        this.logger.error(`Session ${id} driver crashed: ${errorMessage(err)}`);
      });
    return first.promise;
  }

  /**
   * Delivers an answer to the session's pending prompt and resolves with the
   * next prompt or the terminal outcome.
   *
   * @throws SessionNotFoundError, SessionAlreadyCompletedError, NoPendingQuestionError
   */
  async submitAnswer(sessionId: string, text: string): Promise<TurnResult> {
    const session = this.getSession(sessionId);
    if (TERMINAL_PHASES.has(session.state.phase)) {
      throw new SessionAlreadyCompletedError(sessionId, session.state.phase);
    }

    if (session.state.awaitingAnswer && session.answerWaiter) {
      const waiter = this.queueResultWaiter(session);
      const answerWaiter = session.answerWaiter;
      session.answerWaiter = null;
      answerWaiter.resolve({ kind: "answer", text });
      return waiter.promise;
    }

    const { phase, promptsIssued } = session.state;
    if (phase === SessionPhase.INTERVIEWING && promptsIssued === 0 && session.earlyAnswer === null) {
      this.logger.info(`Session ${sessionId}: answer received before the first prompt, buffering`);
      session.earlyAnswer = text;
      return this.queueResultWaiter(session).promise;
    }

    throw new NoPendingQuestionError(sessionId);
  }

  /**
   * Cancels a live session: releases a pending answer wait, aborts an in-flight
   * judge call and moves the session to CANCELLED.
   *
   * @throws SessionNotFoundError, SessionAlreadyCompletedError
   */
  cancelSession(sessionId: string): SessionState {
    const session = this.getSession(sessionId);
    if (TERMINAL_PHASES.has(session.state.phase)) {
      throw new SessionAlreadyCompletedError(sessionId, session.state.phase);
    }
    this.cancel(session, "cancelled by caller");
    return structuredClone(session.state);
  }

  /** Deep copy of the session's current state. */
  getState(sessionId: string): SessionState {
    return structuredClone(this.getSession(sessionId).state);
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  listSessions(): string[] {
    return [...this.sessions.keys()];
  }

  /** Sessions that have not reached a terminal phase. */
  get activeSessionCount(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (!TERMINAL_PHASES.has(session.state.phase)) count++;
    }
    return count;
  }

  // ─── Idle eviction ──────────────────────────────────────────────────────────

  /**
   * Removes sessions idle for longer than the idle timeout, cancelling live
   * ones first. Returns the evicted ids.
   */
  evictIdleSessions(now: number = this.now()): string[] {
    const evicted: string[] = [];
    for (const session of this.sessions.values()) {
      if (now - session.lastActivityAt <= this.idleTimeoutMs) continue;
      if (!TERMINAL_PHASES.has(session.state.phase)) {
        this.cancel(session, "idle timeout");
      }
      this.sessions.delete(session.id);
      evicted.push(session.id);
    }
    if (evicted.length > 0) {
      this.logger.info(`Evicted ${evicted.length} idle session(s): ${evicted.join(", ")}`);
    }
    return evicted;
  }

  startIdleSweep(intervalMs: number): void {
    this.stopIdleSweep();
    this.sweepTimer = setInterval(() => {
      this.evictIdleSessions();
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopIdleSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /** Stops the sweep, cancels every live session and empties the registry. */
  shutdown(): void {
    this.stopIdleSweep();
    for (const session of this.sessions.values()) {
      if (!TERMINAL_PHASES.has(session.state.phase)) {
        this.cancel(session, "shutdown");
      }
    }
    this.sessions.clear();
    this.logger.info("Session manager shut down");
  }

  // ─── Driver ─────────────────────────────────────────────────────────────────

  private async drive(session: ActiveSession): Promise<void> {
    const runId = session.runId;
    try {
      await this.runInterview(session, runId);
    } catch (err) {
      if (session.runId !== runId) return;
      this.failSession(session, err);
    }
  }

  private async runInterview(session: ActiveSession, runId: number): Promise<void> {
    const { config, policy } = session;
    const questions = config.questions;
    const signal = session.controller.signal;

    for (;;) {
      session.state = advancePrompt(session.state, questions);
      if (session.state.turnState === TurnState.REVIEWING) break;

      const early = session.earlyAnswer;
      session.earlyAnswer = null;
      if (early === null) {
        session.answerWaiter = createDeferred<AnswerSignal>();
      }
      this.publishPrompt(session);

      const answer: AnswerSignal =
        early !== null ? { kind: "answer", text: early } : await this.waitForAnswer(session);
      if (session.runId !== runId || answer.kind === "cancel") return;
      session.lastActivityAt = this.now();

      session.state = receiveAnswer(session.state, answer.text);
      const question = questions[session.state.questionIndex];
      const evaluation = await evaluateTurn(session.evaluator, question, answerForEvaluation(session.state), {
        timeoutMs: this.judgeTimeoutMs,
        maxAttempts: this.judgeMaxAttempts,
        signal,
        logger: this.logger,
      });
      if (session.runId !== runId) return;

      if (evaluation.kind === "unevaluated") {
        this.logger.warn(`Session ${session.id}: question "${question.id}" left unevaluated (${evaluation.code})`);
      }

      const previous = session.state;
      const next = applyEvaluation(previous, questions, evaluation, policy);
      checkInvariants(previous, next, questions, policy);
      session.state = next;
    }

    this.logger.info(`Session ${session.id}: ${session.state.answers.length} questions answered, starting review`);
    const outcome = await this.reviewStage.run(
      { sessionId: session.id, jobDescription: config.jobDescription, answers: session.state.answers },
      {
        timeoutMs: this.judgeTimeoutMs,
        signal,
        generatedAt: () => new Date(this.now()),
        onReportStart: () => {
          if (session.runId !== runId) return;
          session.state = { ...session.state, phase: SessionPhase.REPORTING };
        },
      },
    );
    if (session.runId !== runId) return;

    session.state = { ...session.state, phase: SessionPhase.DONE, review: outcome, error: outcome.error };
    session.lastActivityAt = this.now();
    this.logger.info(`Session ${session.id} complete (summary from ${outcome.summary.source})`);

    this.settleAll(session, "completed");
    this.notify(session, "onComplete", (l) => l.onComplete?.(session.id, outcome));
  }

  private waitForAnswer(session: ActiveSession): Promise<AnswerSignal> {
    if (!session.answerWaiter) {
      throw new InternalInvariantViolationError("Waiting for an answer without a waiter", session.state);
    }
    return session.answerWaiter.promise;
  }

  private cancel(session: ActiveSession, reason: string): void {
    session.runId++;
    session.controller.abort(new Error(`Session ${session.id} ${reason}`));

    session.state = {
      ...session.state,
      phase: SessionPhase.CANCELLED,
      pendingFollowUps: [],
      currentPrompt: null,
      currentPromptIsFollowUp: false,
      awaitingAnswer: false,
    };
    session.earlyAnswer = null;

    const answerWaiter = session.answerWaiter;
    session.answerWaiter = null;
    answerWaiter?.resolve({ kind: "cancel" });

    this.logger.info(`Session ${session.id} ${reason}`);
    this.settleAll(session, "cancelled");
    this.notify(session, "onCancelled", (l) => l.onCancelled?.(session.id));
  }

  private failSession(session: ActiveSession, err: unknown): void {
    const code = err instanceof InterviewError ? err.code : "INTERNAL_ERROR";
    const error: StageError = { code, message: errorMessage(err) };

    if (err instanceof InternalInvariantViolationError) {
      this.logger.error(
        `Session ${session.id} failed: ${err.message}. State snapshot: ${JSON.stringify(err.snapshot)}`,
      );
    } else {
      this.logger.error(`Session ${session.id} failed (${code}): ${error.message}`, err);
    }

    session.runId++;
    session.state = {
      ...session.state,
      phase: SessionPhase.FAILED,
      pendingFollowUps: [],
      awaitingAnswer: false,
      error,
    };
    session.answerWaiter = null;
    this.settleAll(session, "failed");
    this.notify(session, "onFailed", (l) => l.onFailed?.(session.id, error));
  }

  // ─── Publishing ─────────────────────────────────────────────────────────────

  private queueResultWaiter(session: ActiveSession): Deferred<TurnResult> {
    session.lastActivityAt = this.now();
    const waiter = createDeferred<TurnResult>();
    session.resultWaiters.push(waiter);
    return waiter;
  }

  private publishPrompt(session: ActiveSession): void {
    const { state } = session;
    const prompt = state.currentPrompt ?? "";
    session.lastActivityAt = this.now();
    session.resultWaiters.shift()?.resolve(this.toResult(session, "prompt"));
    this.notify(session, "onPrompt", (l) => l.onPrompt?.(session.id, prompt, state.currentPromptIsFollowUp));
  }

  private settleAll(session: ActiveSession, outcome: TurnOutcomeKind): void {
    const waiters = session.resultWaiters;
    session.resultWaiters = [];
    const result = this.toResult(session, outcome);
    for (const waiter of waiters) {
      waiter.resolve(result);
    }
  }

  private toResult(session: ActiveSession, outcome: TurnOutcomeKind): TurnResult {
    const { state } = session;
    return {
      sessionId: session.id,
      outcome,
      prompt: outcome === "prompt" ? state.currentPrompt : null,
      isFollowUp: outcome === "prompt" && state.currentPromptIsFollowUp,
      done: outcome !== "prompt",
      phase: state.phase,
      questionIndex: state.questionIndex,
    };
  }

  /** Listener errors are logged and never reach the driver. */
  private notify(session: ActiveSession, event: string, call: (listener: SessionListener) => void): void {
    try {
      call(session.listener);
    } catch (err) {
      this.logger.warn(`Session ${session.id}: ${event} listener threw: ${errorMessage(err)}`);
    }
  }

  private getSession(sessionId: string): ActiveSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }
}
