// Interview Dialogue Engine - Report Formatter
// Renders a finished interview into a plain-text report. The engine treats the
// output as an opaque string; transports display it or hand it to the caller.

import type { AnsweredRecord, AnswerStatus, ReviewSummary } from "./types.js";

export interface ReportDocument {
  sessionId: string;
  jobDescription: string;
  answers: readonly AnsweredRecord[];
  summary: ReviewSummary;
  generatedAt: Date;
}

export interface ReportFormatter {
  format(document: ReportDocument): string;
}

const STATUS_LABELS: Record<AnswerStatus, string> = {
  complete: "Complete",
  gaps_remaining: "Gaps remaining",
  unevaluated: "Not evaluated",
};

/**
 * Formats a 0..1 share as a whole percentage, e.g. `0.666` → `"67%"`.
 */
export function formatPercent(share: number): string {
  return `${Math.round(share * 100)}%`;
}

/**
 * Renders one answered question:
 *   Q2 (q-caching): Describe your caching experience
 *   A: I used Redis with a TTL
 *   Status: Complete
 * followed by missing points, follow-up count, guidance and evaluation note
 * when present.
 */
export function formatAnswerSection(record: AnsweredRecord, position: number): string {
  const lines: string[] = [];
  lines.push(`Q${position} (${record.questionId}): ${record.questionText}`);
  lines.push(`A: ${record.answerText.trim().length > 0 ? record.answerText : "(no answer)"}`);
  lines.push(`Status: ${STATUS_LABELS[record.status]}`);
  if (record.missing.length > 0) {
    lines.push(`Missing: ${record.missing.join(", ")}`);
  }
  if (record.followUpsAsked > 0) {
    lines.push(`Follow-ups asked: ${record.followUpsAsked}`);
  }
  if (record.notes) {
    lines.push(`Notes: ${record.notes}`);
  }
  if (record.evaluationNote) {
    lines.push(`Evaluation: ${record.evaluationNote}`);
  }
  return lines.join("\n");
}

/**
 * Renders the full report: metadata header, job description, one section per
 * answered question, then the review summary.
 */
export function formatReport(document: ReportDocument): string {
  const { answers, summary } = document;
  const count = (status: AnswerStatus) => answers.filter((a) => a.status === status).length;

  const lines: string[] = [];
  lines.push("=== Interview Report ===");
  lines.push("");
  lines.push(`Date: ${document.generatedAt.toISOString().split("T")[0]}`);
  lines.push(`Session ID: ${document.sessionId}`);
  lines.push(
    `Questions: ${answers.length} (complete: ${count("complete")}, gaps remaining: ${count("gaps_remaining")}, not evaluated: ${count("unevaluated")})`,
  );
  lines.push(`Coverage: ${formatPercent(summary.coverageScore)}`);
  lines.push("");
  lines.push("--- Job Description ---");
  lines.push(document.jobDescription);
  lines.push("");
  lines.push("--- Answers ---");

  answers.forEach((record, i) => {
    lines.push("");
    lines.push(formatAnswerSection(record, i + 1));
  });

  lines.push("");
  lines.push(summary.source === "judge" ? "--- Summary ---" : "--- Summary (coverage only) ---");
  lines.push(summary.text);

  return lines.join("\n");
}

export class PlainTextReportFormatter implements ReportFormatter {
  format(document: ReportDocument): string {
    return formatReport(document);
  }
}
