// Judge Adapter: semantic verdicts and interview summaries via OpenAI chat
// completions in JSON mode.
//
// The engine treats the judge as a black box with a fixed contract:
//   evaluate(question, answer, expected points) → Verdict
//   summarize(job description, answers)         → summary text
// Transport failures surface as JudgeUnavailableError, responses that do not
// parse into the expected schema as JudgeMalformedResponseError.

import type OpenAI from "openai";
import type { AnsweredRecord, PointStatus, Verdict } from "./types.js";
import { JudgeMalformedResponseError, JudgeUnavailableError } from "./errors.js";
import { errorMessage } from "./utils.js";

// ─── OpenAI client interface (for testability / dependency injection) ────────────

/**
 * Minimal interface for the OpenAI chat completions API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIClient {
  chat: {
    completions: {
      create(
        params: {
          model: string;
          messages: Array<{ role: "system" | "user"; content: string }>;
          response_format?: { type: "json_object" };
          temperature?: number;
          max_tokens?: number;
        },
        options?: { signal?: AbortSignal },
      ): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

/**
 * Narrows the SDK client to the non-streaming surface above.
 */
export function fromOpenAI(openai: OpenAI): OpenAIClient {
  return {
    chat: {
      completions: {
        create: (params, options) =>
          openai.chat.completions.create({ ...params, messages: [...params.messages], stream: false }, options),
      },
    },
  };
}

// ─── Judge contract ─────────────────────────────────────────────────────────────

export interface JudgeEvaluationInput {
  question: string;
  answer: string;
  expectedPoints: readonly string[];
  guidance?: string;
}

export interface JudgeSummaryInput {
  jobDescription: string;
  answers: readonly AnsweredRecord[];
}

export interface JudgeCallOptions {
  signal?: AbortSignal;
}

export interface Judge {
  evaluate(input: JudgeEvaluationInput, options?: JudgeCallOptions): Promise<Verdict>;
  summarize(input: JudgeSummaryInput, options?: JudgeCallOptions): Promise<string>;
}

const POINT_STATUSES: ReadonlySet<string> = new Set<PointStatus>(["present", "explained", "missing"]);

export const DEFAULT_JUDGE_MODEL = "gpt-4o-mini";

// ─── Parsing ────────────────────────────────────────────────────────────────────

function parseJsonObject(raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new JudgeMalformedResponseError(`Failed to parse judge response as JSON: ${raw.slice(0, 200)}`, {
      cause: err,
    });
  }
  if (!isRecord(parsed)) {
    throw new JudgeMalformedResponseError("Judge response is not a JSON object");
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a raw judge response into a Verdict.
 *
 * Expected shape:
 * `{ "per_point_status": { "<point>": "present" | "explained" | "missing" },
 *    "overall_score": number 0..1, "follow_up": string | null }`
 *
 * Statuses are matched case-insensitively. Points the judge did not mention are
 * recorded as missing. The score is clamped into [0, 1].
 */
export function parseVerdict(raw: string, expectedPoints: readonly string[]): Verdict {
  const obj = parseJsonObject(raw);

  const statuses = obj.per_point_status;
  if (!isRecord(statuses)) {
    throw new JudgeMalformedResponseError("Judge response missing or invalid 'per_point_status' object");
  }

  const perPointStatus: Record<string, PointStatus> = {};
  for (const [point, value] of Object.entries(statuses)) {
    const status = typeof value === "string" ? value.trim().toLowerCase() : "";
    if (!isPointStatus(status)) {
      throw new JudgeMalformedResponseError(`Judge returned invalid status for point "${point}": ${String(value)}`);
    }
    perPointStatus[point] = status;
  }
  for (const point of expectedPoints) {
    if (!(point in perPointStatus)) {
      perPointStatus[point] = "missing";
    }
  }

  const score = obj.overall_score;
  if (typeof score !== "number" || Number.isNaN(score)) {
    throw new JudgeMalformedResponseError("Judge response missing or invalid 'overall_score' number");
  }

  const followUpRaw = obj.follow_up;
  if (followUpRaw !== undefined && followUpRaw !== null && typeof followUpRaw !== "string") {
    throw new JudgeMalformedResponseError("Judge response has a non-string 'follow_up'");
  }
  const followUp = typeof followUpRaw === "string" && followUpRaw.trim().length > 0 ? followUpRaw.trim() : null;

  return {
    perPointStatus,
    overallScore: Math.min(1, Math.max(0, score)),
    followUp,
  };
}

function isPointStatus(value: string): value is PointStatus {
  return POINT_STATUSES.has(value);
}

/**
 * Parse a raw summary response: `{ "summary": string }`.
 */
export function parseSummary(raw: string): string {
  const obj = parseJsonObject(raw);
  if (typeof obj.summary !== "string" || obj.summary.trim().length === 0) {
    throw new JudgeMalformedResponseError("Judge response missing or empty 'summary' field");
  }
  return obj.summary.trim();
}

// ─── OpenAIJudge ────────────────────────────────────────────────────────────────

export class OpenAIJudge implements Judge {
  private readonly openai: OpenAIClient;
  private readonly model: string;

  constructor(openaiClient: OpenAIClient, model: string = DEFAULT_JUDGE_MODEL) {
    this.openai = openaiClient;
    this.model = model;
  }

  async evaluate(input: JudgeEvaluationInput, options: JudgeCallOptions = {}): Promise<Verdict> {
    const raw = await this.callLLM(
      { system: buildEvaluationSystemPrompt(), user: buildEvaluationUserPrompt(input) },
      options.signal,
    );
    return parseVerdict(raw, input.expectedPoints);
  }

  async summarize(input: JudgeSummaryInput, options: JudgeCallOptions = {}): Promise<string> {
    const raw = await this.callLLM(
      { system: buildSummarySystemPrompt(), user: buildSummaryUserPrompt(input) },
      options.signal,
    );
    return parseSummary(raw);
  }

  private async callLLM(prompt: { system: string; user: string }, signal?: AbortSignal): Promise<string> {
    let response: Awaited<ReturnType<OpenAIClient["chat"]["completions"]["create"]>>;
    try {
      response = await this.openai.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: prompt.system },
            { role: "user", content: prompt.user },
          ],
          response_format: { type: "json_object" },
          temperature: 0.2,
          max_tokens: 512,
        },
        signal ? { signal } : undefined,
      );
    } catch (err) {
      throw new JudgeUnavailableError(`Judge request failed: ${errorMessage(err)}`, { cause: err });
    }

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new JudgeMalformedResponseError("Judge returned empty response");
    }
    return content;
  }
}

// ─── Prompt construction ────────────────────────────────────────────────────────

export function buildEvaluationSystemPrompt(): string {
  return `You are an experienced technical interviewer checking whether a candidate's answer covers a set of expected points.

## Output Format
Respond with a valid JSON object matching this exact structure:
{
  "per_point_status": { "<expected point>": "present" | "explained" | "missing" },
  "overall_score": number between 0 and 1,
  "follow_up": "string (one short question probing the most important missing point) or null"
}

## Rules
- Include every expected point as a key of per_point_status, spelled exactly as given.
- "present": the point is mentioned. "explained": the point is mentioned and explained with substance. "missing": not covered.
- follow_up must be null when no point is missing.
- Judge only what the candidate actually wrote. Do not infer knowledge that is not stated.`;
}

export function buildEvaluationUserPrompt(input: JudgeEvaluationInput): string {
  const lines = [
    `## Question`,
    input.question,
    ``,
    `## Expected points`,
    ...input.expectedPoints.map((point) => `- ${point}`),
  ];
  if (input.guidance) {
    lines.push(``, `## Interviewer guidance`, input.guidance);
  }
  lines.push(``, `## Candidate answer`, input.answer.trim().length > 0 ? input.answer : "(no answer)");
  return lines.join("\n");
}

export function buildSummarySystemPrompt(): string {
  return `You are reviewing a completed job interview for a hiring panel.

## Output Format
Respond with a valid JSON object: { "summary": "string" }

## Rules
- Write 4-8 sentences assessing the candidate against the job description.
- Mention strengths backed by the answers and the points the candidate never covered.
- Stay factual. Do not invent experience the candidate did not describe.`;
}

export function buildSummaryUserPrompt(input: JudgeSummaryInput): string {
  const lines = [`## Job description`, input.jobDescription, ``, `## Interview`];
  for (const record of input.answers) {
    lines.push(``, `Q (${record.questionId}): ${record.questionText}`);
    lines.push(`A: ${record.answerText.trim().length > 0 ? record.answerText : "(no answer)"}`);
    if (record.missing.length > 0) {
      lines.push(`Uncovered points: ${record.missing.join(", ")}`);
    }
    if (record.status === "unevaluated") {
      lines.push(`Note: this answer could not be evaluated automatically.`);
    }
  }
  return lines.join("\n");
}
