// Interview Dialogue Engine - Public API

export const APP_NAME = "Interview Dialogue Engine";
export const APP_VERSION = "0.1.0";

export * from "./types.js";
export * from "./errors.js";
export { missingKeywords, buildKeywordPattern, keywordTokens } from "./gap-evaluator.js";
export {
  OpenAIJudge,
  fromOpenAI,
  parseVerdict,
  parseSummary,
  DEFAULT_JUDGE_MODEL,
  type Judge,
  type OpenAIClient,
  type JudgeEvaluationInput,
  type JudgeSummaryInput,
  type JudgeCallOptions,
} from "./judge.js";
export {
  KeywordEvaluator,
  JudgeEvaluator,
  assessKeywords,
  followUpPromptFor,
  type AnswerEvaluator,
  type GapAssessment,
} from "./answer-evaluator.js";
export {
  advancePrompt,
  receiveAnswer,
  applyEvaluation,
  answerForEvaluation,
  evaluateTurn,
  checkInvariants,
  createInitialState,
  type TurnPolicy,
} from "./turn-state-machine.js";
export { SessionManager, type SessionManagerDeps, type SessionManagerOptions } from "./session-manager.js";
export { ReviewStage, buildCoverageSummary, computeCoverage, coverageScore } from "./review-stage.js";
export { PlainTextReportFormatter, formatReport, type ReportFormatter, type ReportDocument } from "./report-formatter.js";
export { validateInterviewConfig, parseJobConfig, loadInterviewConfig } from "./job-config.js";
export { loadAppConfig, type AppConfig } from "./config.js";
export { createConsoleLogger, silentLogger, type Logger } from "./logger.js";
export { createEngine, type Engine } from "./bootstrap.js";
export { createAppServer, type AppServer, type CreateServerOptions } from "./server.js";
export { runTerminalInterview } from "./terminal-interview.js";
