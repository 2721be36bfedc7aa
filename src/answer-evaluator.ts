// Answer Evaluator: one gap-detection capability, two strategies.
//
//   keyword: deterministic whole-token keyword search (gap-evaluator.ts)
//   judge:   semantic verdict from the Judge Adapter
//
// Both return the same GapAssessment so the turn state machine never needs to
// know which strategy produced it.

import type { EvaluatorStrategy, PendingFollowUp, PointStatus, Question, Verdict } from "./types.js";
import type { Judge } from "./judge.js";
import { missingKeywords } from "./gap-evaluator.js";

export interface GapAssessment {
  missing: string[];
  verdict: Verdict;
  followUps: PendingFollowUp[];
}

export interface EvaluateOptions {
  signal?: AbortSignal;
}

export interface AnswerEvaluator {
  readonly strategy: EvaluatorStrategy;
  evaluate(question: Question, answer: string, options?: EvaluateOptions): Promise<GapAssessment>;
}

/** Default follow-up prompt for a missing point. */
export function followUpPromptFor(point: string): string {
  return `You didn't mention "${point}". Could you add details regarding ${point}?`;
}

// ─── Keyword strategy ───────────────────────────────────────────────────────────

export class KeywordEvaluator implements AnswerEvaluator {
  readonly strategy = "keyword" as const;

  async evaluate(question: Question, answer: string): Promise<GapAssessment> {
    return assessKeywords(question, answer);
  }
}

/**
 * Synchronous core of the keyword strategy. The verdict is synthesized:
 * each keyword is present or missing and the score is the share present.
 */
export function assessKeywords(question: Question, answer: string): GapAssessment {
  const required = question.requiredKeywords;
  const missing = missingKeywords(answer, required);
  const missingSet = new Set(missing);

  const perPointStatus: Record<string, PointStatus> = {};
  for (const keyword of required) {
    perPointStatus[keyword] = missingSet.has(keyword) ? "missing" : "present";
  }

  const followUps = missing.map((point) => ({ point, prompt: followUpPromptFor(point) }));

  return {
    missing,
    verdict: {
      perPointStatus,
      overallScore: required.length === 0 ? 1 : (required.length - missing.length) / required.length,
      followUp: followUps[0]?.prompt ?? null,
    },
    followUps,
  };
}

// ─── Judge strategy ─────────────────────────────────────────────────────────────

export class JudgeEvaluator implements AnswerEvaluator {
  readonly strategy = "judge" as const;
  private readonly judge: Judge;

  constructor(judge: Judge) {
    this.judge = judge;
  }

  /**
   * Missing points are the question's required points the verdict marks as
   * missing, in the question's order. A follow-up suggested by the judge
   * replaces the per-point template prompts and probes the first gap.
   */
  async evaluate(question: Question, answer: string, options: EvaluateOptions = {}): Promise<GapAssessment> {
    const verdict = await this.judge.evaluate(
      {
        question: question.text,
        answer,
        expectedPoints: question.requiredKeywords,
        guidance: question.guidance || undefined,
      },
      { signal: options.signal },
    );

    const missing = question.requiredKeywords.filter(
      (point) => (verdict.perPointStatus[point] ?? "missing") === "missing",
    );

    let followUps: PendingFollowUp[];
    if (missing.length === 0) {
      followUps = [];
    } else if (verdict.followUp) {
      followUps = [{ point: missing[0], prompt: verdict.followUp }];
    } else {
      followUps = missing.map((point) => ({ point, prompt: followUpPromptFor(point) }));
    }

    return { missing, verdict, followUps };
  }
}
