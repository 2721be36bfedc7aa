// Interview Dialogue Engine - Engine wiring
// Builds the judge, evaluators, review stage and session manager from an
// AppConfig. Shared by the server entry point (main.ts) and the terminal CLI.

import OpenAI from "openai";
import type { AppConfig } from "./config.js";
import { OpenAIJudge, fromOpenAI, type Judge } from "./judge.js";
import { JudgeEvaluator, KeywordEvaluator } from "./answer-evaluator.js";
import { ReviewStage } from "./review-stage.js";
import { SessionManager } from "./session-manager.js";
import { createConsoleLogger, type Logger } from "./logger.js";

export interface Engine {
  sessionManager: SessionManager;
  /** Null when no OpenAI API key is configured. */
  judge: Judge | null;
}

export interface CreateEngineOptions {
  /** Injected client (tests). Otherwise one is built from `config.openaiApiKey`. */
  openaiClient?: OpenAI;
  loggerFor?: (component: string) => Logger;
}

export function createEngine(config: AppConfig, options: CreateEngineOptions = {}): Engine {
  const loggerFor = options.loggerFor ?? ((component: string) => createConsoleLogger(component));
  const log = loggerFor("Engine");

  let judge: Judge | null = null;
  const openai =
    options.openaiClient ??
    // Retries are handled per turn by the session manager.
    (config.openaiApiKey ? new OpenAI({ apiKey: config.openaiApiKey, maxRetries: 0 }) : null);
  if (openai) {
    judge = new OpenAIJudge(fromOpenAI(openai), config.judgeModel);
    log.info(`Judge enabled (model ${config.judgeModel})`);
  } else {
    log.warn("OPENAI_API_KEY is not set: judge evaluation disabled, reviews use the coverage summary");
  }

  const sessionManager = new SessionManager(
    {
      evaluators: judge
        ? { keyword: new KeywordEvaluator(), judge: new JudgeEvaluator(judge) }
        : { keyword: new KeywordEvaluator() },
      reviewStage: new ReviewStage({ summarizer: judge, logger: loggerFor("ReviewStage") }),
      logger: loggerFor("SessionManager"),
    },
    {
      maxSessions: config.maxSessions,
      idleTimeoutMs: config.sessionIdleTimeoutMs,
      judgeTimeoutMs: config.judgeTimeoutMs,
      judgeMaxAttempts: config.judgeMaxAttempts,
    },
  );

  return { sessionManager, judge };
}
