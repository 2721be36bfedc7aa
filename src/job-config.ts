// Interview Dialogue Engine - Job configuration
// Validates interview configurations and loads them from JSON job files:
//
// {
//   "job_description": "Backend engineer ...",
//   "max_followup_chances": 2,
//   "followup_policy": "per_question",      (optional)
//   "evaluator": "keyword",                 (optional: "keyword" | "judge")
//   "questions": [
//     { "id": "q1", "text": "...", "required_keywords": ["redis", "ttl"], "guidance": "..." }
//   ]
// }

import { readFile } from "node:fs/promises";
import type { EvaluatorStrategy, FollowUpPolicy, InterviewConfig, Question } from "./types.js";
import { ConfigInvalidError, type ValidationDetail } from "./errors.js";
import { errorMessage } from "./utils.js";

export const DEFAULT_MAX_FOLLOWUP_CHANCES = 2;

const FOLLOW_UP_POLICIES: readonly FollowUpPolicy[] = ["per_question", "per_keyword"];
const EVALUATOR_STRATEGIES: readonly EvaluatorStrategy[] = ["keyword", "judge"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFollowUpPolicy(value: unknown): value is FollowUpPolicy {
  return FOLLOW_UP_POLICIES.some((policy) => policy === value);
}

function isEvaluatorStrategy(value: unknown): value is EvaluatorStrategy {
  return EVALUATOR_STRATEGIES.some((strategy) => strategy === value);
}

// ─── Validation ─────────────────────────────────────────────────────────────────

/**
 * Checks an interview configuration before a session is created.
 *
 * @throws ConfigInvalidError listing every problem found.
 */
export function validateInterviewConfig(config: InterviewConfig): InterviewConfig {
  const details: ValidationDetail[] = [];

  if (typeof config.jobDescription !== "string") {
    details.push({ field: "jobDescription", message: "must be a string" });
  }
  if (!Number.isInteger(config.maxFollowUpChances) || config.maxFollowUpChances < 0) {
    details.push({ field: "maxFollowUpChances", message: "must be an integer >= 0" });
  }
  if (config.followUpPolicy !== undefined && !isFollowUpPolicy(config.followUpPolicy)) {
    details.push({ field: "followUpPolicy", message: `must be one of ${FOLLOW_UP_POLICIES.join(", ")}` });
  }
  if (config.evaluatorStrategy !== undefined && !isEvaluatorStrategy(config.evaluatorStrategy)) {
    details.push({ field: "evaluatorStrategy", message: `must be one of ${EVALUATOR_STRATEGIES.join(", ")}` });
  }

  if (!Array.isArray(config.questions) || config.questions.length === 0) {
    details.push({ field: "questions", message: "must contain at least one question" });
  } else {
    const seen = new Set<string>();
    config.questions.forEach((q, i) => {
      const at = `questions[${i}]`;
      if (typeof q.id !== "string" || q.id.trim().length === 0) {
        details.push({ field: `${at}.id`, message: "must be a non-empty string" });
      } else if (seen.has(q.id)) {
        details.push({ field: `${at}.id`, message: `duplicate question id "${q.id}"` });
      } else {
        seen.add(q.id);
      }
      if (typeof q.text !== "string" || q.text.trim().length === 0) {
        details.push({ field: `${at}.text`, message: "must be a non-empty string" });
      }
      if (typeof q.guidance !== "string") {
        details.push({ field: `${at}.guidance`, message: "must be a string" });
      }
      if (!Array.isArray(q.requiredKeywords)) {
        details.push({ field: `${at}.requiredKeywords`, message: "must be an array of strings" });
      } else {
        q.requiredKeywords.forEach((kw: string, k: number) => {
          if (typeof kw !== "string" || kw.trim().length === 0) {
            details.push({ field: `${at}.requiredKeywords[${k}]`, message: "must be a non-empty string" });
          }
        });
      }
    });
  }

  if (details.length > 0) {
    throw new ConfigInvalidError(
      `Invalid interview configuration: ${details.map((d) => `${d.field} ${d.message}`).join("; ")}`,
      details,
    );
  }
  return config;
}

// ─── JSON job files ─────────────────────────────────────────────────────────────

function readString(source: Record<string, unknown>, key: string, field: string, details: ValidationDetail[]): string {
  const value = source[key];
  if (typeof value !== "string") {
    details.push({ field, message: "must be a string" });
    return "";
  }
  return value;
}

function parseQuestion(raw: unknown, index: number, details: ValidationDetail[]): Question {
  const at = `questions[${index}]`;
  if (!isRecord(raw)) {
    details.push({ field: at, message: "must be an object" });
    return { id: "", text: "", requiredKeywords: [], guidance: "" };
  }

  const keywordsRaw = raw.required_keywords ?? [];
  let requiredKeywords: string[] = [];
  if (!Array.isArray(keywordsRaw) || keywordsRaw.some((kw) => typeof kw !== "string")) {
    details.push({ field: `${at}.required_keywords`, message: "must be an array of strings" });
  } else {
    requiredKeywords = keywordsRaw.filter((kw): kw is string => typeof kw === "string");
  }

  return {
    id: readString(raw, "id", `${at}.id`, details),
    text: readString(raw, "text", `${at}.text`, details),
    requiredKeywords,
    guidance: raw.guidance === undefined ? "" : readString(raw, "guidance", `${at}.guidance`, details),
  };
}

/**
 * Converts a parsed job file into an InterviewConfig and validates it.
 * `max_followup_chances` defaults to DEFAULT_MAX_FOLLOWUP_CHANCES.
 *
 * @throws ConfigInvalidError
 */
export function parseJobConfig(raw: unknown): InterviewConfig {
  if (!isRecord(raw)) {
    throw new ConfigInvalidError("Job configuration must be a JSON object", [
      { field: "(root)", message: "must be an object" },
    ]);
  }

  const details: ValidationDetail[] = [];
  const jobDescription = readString(raw, "job_description", "job_description", details);

  const questionsRaw = raw.questions;
  let questions: Question[] = [];
  if (!Array.isArray(questionsRaw)) {
    details.push({ field: "questions", message: "must be an array" });
  } else {
    questions = questionsRaw.map((q, i) => parseQuestion(q, i, details));
  }

  const maxRaw = raw.max_followup_chances ?? DEFAULT_MAX_FOLLOWUP_CHANCES;
  let maxFollowUpChances = DEFAULT_MAX_FOLLOWUP_CHANCES;
  if (typeof maxRaw !== "number" || !Number.isInteger(maxRaw) || maxRaw < 0) {
    details.push({ field: "max_followup_chances", message: "must be an integer >= 0" });
  } else {
    maxFollowUpChances = maxRaw;
  }

  const config: InterviewConfig = { jobDescription, questions, maxFollowUpChances };

  if (raw.followup_policy !== undefined) {
    if (isFollowUpPolicy(raw.followup_policy)) {
      config.followUpPolicy = raw.followup_policy;
    } else {
      details.push({ field: "followup_policy", message: `must be one of ${FOLLOW_UP_POLICIES.join(", ")}` });
    }
  }
  if (raw.evaluator !== undefined) {
    if (isEvaluatorStrategy(raw.evaluator)) {
      config.evaluatorStrategy = raw.evaluator;
    } else {
      details.push({ field: "evaluator", message: `must be one of ${EVALUATOR_STRATEGIES.join(", ")}` });
    }
  }

  if (details.length > 0) {
    throw new ConfigInvalidError(
      `Invalid job configuration: ${details.map((d) => `${d.field} ${d.message}`).join("; ")}`,
      details,
    );
  }
  return validateInterviewConfig(config);
}

/**
 * Reads and validates a JSON job file.
 *
 * @throws ConfigInvalidError if the file cannot be read, is not JSON, or is invalid.
 */
export async function loadInterviewConfig(path: string): Promise<InterviewConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigInvalidError(`Cannot read job configuration ${path}: ${errorMessage(err)}`, [], { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigInvalidError(`Job configuration ${path} is not valid JSON: ${errorMessage(err)}`, [], {
      cause: err,
    });
  }
  return parseJobConfig(parsed);
}
