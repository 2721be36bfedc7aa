import { describe, it, expect, vi } from "vitest";
import { JudgeEvaluator, KeywordEvaluator, assessKeywords, followUpPromptFor } from "./answer-evaluator.js";
import type { Judge } from "./judge.js";
import type { Question, Verdict } from "./types.js";

const QUESTION: Question = {
  id: "q1",
  text: "Describe your caching experience",
  requiredKeywords: ["redis", "ttl"],
  guidance: "Look for an expiry strategy",
};

function judgeReturning(verdict: Verdict): Judge {
  return {
    evaluate: vi.fn().mockResolvedValue(verdict),
    summarize: vi.fn().mockResolvedValue("summary"),
  };
}

describe("followUpPromptFor()", () => {
  it("names the missing point", () => {
    expect(followUpPromptFor("ttl")).toBe(`You didn't mention "ttl". Could you add details regarding ttl?`);
  });
});

describe("KeywordEvaluator", () => {
  it("reports missing keywords with one follow-up each", async () => {
    const assessment = await new KeywordEvaluator().evaluate(QUESTION, "I used Redis");

    expect(assessment.missing).toEqual(["ttl"]);
    expect(assessment.followUps).toEqual([{ point: "ttl", prompt: followUpPromptFor("ttl") }]);
    expect(assessment.verdict).toEqual({
      perPointStatus: { redis: "present", ttl: "missing" },
      overallScore: 0.5,
      followUp: followUpPromptFor("ttl"),
    });
  });

  it("scores a complete answer as 1 with no follow-up", () => {
    const assessment = assessKeywords(QUESTION, "Redis with a TTL");

    expect(assessment.missing).toEqual([]);
    expect(assessment.followUps).toEqual([]);
    expect(assessment.verdict.overallScore).toBe(1);
    expect(assessment.verdict.followUp).toBeNull();
  });

  it("scores a question without required keywords as complete", () => {
    const assessment = assessKeywords({ ...QUESTION, requiredKeywords: [] }, "");

    expect(assessment.missing).toEqual([]);
    expect(assessment.verdict).toEqual({ perPointStatus: {}, overallScore: 1, followUp: null });
  });
});

describe("JudgeEvaluator", () => {
  it("passes question, answer, expected points and guidance to the judge", async () => {
    const judge = judgeReturning({ perPointStatus: { redis: "present", ttl: "present" }, overallScore: 1, followUp: null });
    const signal = new AbortController().signal;

    await new JudgeEvaluator(judge).evaluate(QUESTION, "Redis, TTL", { signal });

    expect(judge.evaluate).toHaveBeenCalledWith(
      {
        question: "Describe your caching experience",
        answer: "Redis, TTL",
        expectedPoints: ["redis", "ttl"],
        guidance: "Look for an expiry strategy",
      },
      { signal },
    );
  });

  it("counts explained points as covered", async () => {
    const judge = judgeReturning({
      perPointStatus: { redis: "explained", ttl: "present" },
      overallScore: 0.9,
      followUp: null,
    });

    const assessment = await new JudgeEvaluator(judge).evaluate(QUESTION, "answer");

    expect(assessment.missing).toEqual([]);
    expect(assessment.followUps).toEqual([]);
  });

  it("uses the judge's follow-up for the first missing point", async () => {
    const judge = judgeReturning({
      perPointStatus: { redis: "missing", ttl: "missing" },
      overallScore: 0,
      followUp: "Which cache store did you use?",
    });

    const assessment = await new JudgeEvaluator(judge).evaluate(QUESTION, "answer");

    expect(assessment.missing).toEqual(["redis", "ttl"]);
    expect(assessment.followUps).toEqual([{ point: "redis", prompt: "Which cache store did you use?" }]);
  });

  it("falls back to one template follow-up per missing point", async () => {
    const judge = judgeReturning({ perPointStatus: { redis: "present" }, overallScore: 0.5, followUp: null });

    const assessment = await new JudgeEvaluator(judge).evaluate(QUESTION, "answer");

    expect(assessment.missing).toEqual(["ttl"]);
    expect(assessment.followUps).toEqual([{ point: "ttl", prompt: followUpPromptFor("ttl") }]);
  });

  it("ignores a follow-up when nothing is missing", async () => {
    const judge = judgeReturning({
      perPointStatus: { redis: "present", ttl: "present" },
      overallScore: 1,
      followUp: "Anything else?",
    });

    const assessment = await new JudgeEvaluator(judge).evaluate(QUESTION, "answer");

    expect(assessment.followUps).toEqual([]);
  });

  it("propagates judge errors", async () => {
    const judge: Judge = {
      evaluate: vi.fn().mockRejectedValue(new Error("boom")),
      summarize: vi.fn(),
    };

    await expect(new JudgeEvaluator(judge).evaluate(QUESTION, "answer")).rejects.toThrow("boom");
  });
});
