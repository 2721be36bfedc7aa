// Review Stage: post-interview summary and report.
//
//   review(): one judge summarize() call over the full answer set
//   report(): hand the summary to the ReportFormatter
//   run():    review() then report(), combined into a ReviewOutcome
//
// Neither step may corrupt the recorded answers. A judge failure falls back to
// the deterministic coverage summary; a formatter failure leaves the report
// empty. Both are recorded as the outcome's error.

import type { AnsweredRecord, QuestionCoverage, ReviewOutcome, ReviewSummary, StageError } from "./types.js";
import type { Judge } from "./judge.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { PlainTextReportFormatter, formatPercent, type ReportFormatter } from "./report-formatter.js";
import { InterviewError } from "./errors.js";
import { errorMessage, withTimeout } from "./utils.js";

// ─── Coverage ───────────────────────────────────────────────────────────────────

export function computeCoverage(answers: readonly AnsweredRecord[]): QuestionCoverage[] {
  return answers.map((a) => ({ questionId: a.questionId, status: a.status, missing: [...a.missing] }));
}

/** Share of recorded questions answered completely; 0 when nothing was recorded. */
export function coverageScore(coverage: readonly QuestionCoverage[]): number {
  if (coverage.length === 0) return 0;
  return coverage.filter((c) => c.status === "complete").length / coverage.length;
}

/**
 * Deterministic summary used when no judge is configured or the judge fails, e.g.
 * "1 of 2 questions answered completely (50%). Gaps remaining: q2 (ttl)."
 */
export function buildCoverageSummary(answers: readonly AnsweredRecord[]): string {
  if (answers.length === 0) {
    return "No questions were answered.";
  }
  const coverage = computeCoverage(answers);
  const complete = coverage.filter((c) => c.status === "complete").length;
  const parts = [
    `${complete} of ${coverage.length} questions answered completely (${formatPercent(coverageScore(coverage))}).`,
  ];

  const gaps = coverage.filter((c) => c.status === "gaps_remaining");
  if (gaps.length > 0) {
    parts.push(`Gaps remaining: ${gaps.map((c) => `${c.questionId} (${c.missing.join(", ")})`).join("; ")}.`);
  }
  const unevaluated = coverage.filter((c) => c.status === "unevaluated");
  if (unevaluated.length > 0) {
    parts.push(`Not evaluated: ${unevaluated.map((c) => c.questionId).join(", ")}.`);
  }
  return parts.join(" ");
}

// ─── ReviewStage ────────────────────────────────────────────────────────────────

export interface ReviewStageDeps {
  /** Judge used for the summary. Without one, the coverage summary is used. */
  summarizer?: Pick<Judge, "summarize"> | null;
  formatter?: ReportFormatter;
  logger?: Logger;
}

export interface ReviewRunInput {
  sessionId: string;
  jobDescription: string;
  answers: readonly AnsweredRecord[];
}

export interface ReviewRunOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface ReviewPipelineOptions extends ReviewRunOptions {
  /** Report timestamp. Defaults to the current time. */
  generatedAt?: () => Date;
  /** Called once the summary is ready, just before formatting starts. */
  onReportStart?: () => void;
}

export class ReviewStage {
  private readonly summarizer: Pick<Judge, "summarize"> | null;
  private readonly formatter: ReportFormatter;
  private readonly logger: Logger;

  constructor(deps: ReviewStageDeps = {}) {
    this.summarizer = deps.summarizer ?? null;
    this.formatter = deps.formatter ?? new PlainTextReportFormatter();
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Summarizes the whole interview with a single judge call.
   * Rethrows only when `options.signal` was aborted (session cancelled).
   */
  async review(
    jobDescription: string,
    answers: readonly AnsweredRecord[],
    options: ReviewRunOptions,
  ): Promise<{ summary: ReviewSummary; error: StageError | null }> {
    const coverage = computeCoverage(answers);
    const score = coverageScore(coverage);
    const fallback: ReviewSummary = {
      text: buildCoverageSummary(answers),
      source: "coverage",
      coverage,
      coverageScore: score,
    };

    const summarizer = this.summarizer;
    if (!summarizer) {
      return { summary: fallback, error: null };
    }

    try {
      const text = await withTimeout(
        (signal) => summarizer.summarize({ jobDescription, answers }, { signal }),
        options.timeoutMs,
        options.signal,
      );
      return { summary: { text, source: "judge", coverage, coverageScore: score }, error: null };
    } catch (err) {
      if (options.signal?.aborted) throw err;
      const code = err instanceof InterviewError ? err.code : "REVIEW_FAILED";
      this.logger.warn(`Review summary failed (${code}): ${errorMessage(err)}. Using coverage summary.`);
      return { summary: fallback, error: { code, message: errorMessage(err) } };
    }
  }

  /**
   * Summarizes, then formats. The review error takes precedence over a formatter
   * error in the outcome. Rethrows only on cancellation, like review().
   */
  async run(input: ReviewRunInput, options: ReviewPipelineOptions): Promise<ReviewOutcome> {
    const reviewed = await this.review(input.jobDescription, input.answers, options);
    options.onReportStart?.();
    const formatted = this.report(reviewed.summary, input, options.generatedAt?.() ?? new Date());
    return {
      summary: reviewed.summary,
      report: formatted.report,
      error: reviewed.error ?? formatted.error,
    };
  }

  /** Formats the report. Formatter failures are returned, not thrown. */
  report(
    summary: ReviewSummary,
    input: ReviewRunInput,
    generatedAt: Date,
  ): { report: string | null; error: StageError | null } {
    try {
      const report = this.formatter.format({
        sessionId: input.sessionId,
        jobDescription: input.jobDescription,
        answers: input.answers,
        summary,
        generatedAt,
      });
      return { report, error: null };
    } catch (err) {
      this.logger.error(`Report formatting failed for session ${input.sessionId}: ${errorMessage(err)}`);
      return { report: null, error: { code: "REPORT_FAILED", message: errorMessage(err) } };
    }
  }
}
