import { describe, it, expect, vi } from "vitest";
import {
  OpenAIJudge,
  DEFAULT_JUDGE_MODEL,
  buildEvaluationUserPrompt,
  buildSummaryUserPrompt,
  parseSummary,
  parseVerdict,
  type OpenAIClient,
} from "./judge.js";
import { JudgeMalformedResponseError, JudgeUnavailableError } from "./errors.js";
import type { AnsweredRecord } from "./types.js";

// ─── Mock OpenAI client ─────────────────────────────────────────────────────────

function mockClient(content: string | null) {
  const create = vi.fn().mockResolvedValue({ choices: [{ message: { content } }] });
  const client: OpenAIClient = { chat: { completions: { create } } };
  return { client, create };
}

function failingClient(error: Error) {
  const create = vi.fn().mockRejectedValue(error);
  const client: OpenAIClient = { chat: { completions: { create } } };
  return { client, create };
}

const RECORD: AnsweredRecord = {
  questionId: "q1",
  questionText: "Describe your caching experience",
  answerText: "I used Redis",
  notes: "",
  status: "gaps_remaining",
  missing: ["ttl"],
  followUpsAsked: 2,
  evaluationNote: null,
};

// ─── parseVerdict ───────────────────────────────────────────────────────────────

describe("parseVerdict()", () => {
  it("parses a well-formed verdict", () => {
    const raw = JSON.stringify({
      per_point_status: { redis: "present", ttl: "explained" },
      overall_score: 0.8,
      follow_up: null,
    });

    expect(parseVerdict(raw, ["redis", "ttl"])).toEqual({
      perPointStatus: { redis: "present", ttl: "explained" },
      overallScore: 0.8,
      followUp: null,
    });
  });

  it("normalizes status case and whitespace", () => {
    const raw = JSON.stringify({ per_point_status: { redis: " Present " }, overall_score: 1 });
    expect(parseVerdict(raw, ["redis"]).perPointStatus).toEqual({ redis: "present" });
  });

  it("marks expected points the judge did not mention as missing", () => {
    const raw = JSON.stringify({ per_point_status: { redis: "present" }, overall_score: 0.5, follow_up: "TTL?" });
    expect(parseVerdict(raw, ["redis", "ttl"])).toEqual({
      perPointStatus: { redis: "present", ttl: "missing" },
      overallScore: 0.5,
      followUp: "TTL?",
    });
  });

  it("clamps the score into [0, 1]", () => {
    expect(parseVerdict(JSON.stringify({ per_point_status: {}, overall_score: 1.7 }), []).overallScore).toBe(1);
    expect(parseVerdict(JSON.stringify({ per_point_status: {}, overall_score: -3 }), []).overallScore).toBe(0);
  });

  it("turns a blank follow-up into null", () => {
    const raw = JSON.stringify({ per_point_status: {}, overall_score: 1, follow_up: "   " });
    expect(parseVerdict(raw, []).followUp).toBeNull();
  });

  it("rejects non-JSON", () => {
    expect(() => parseVerdict("not json", [])).toThrow(JudgeMalformedResponseError);
  });

  it("rejects a JSON array", () => {
    expect(() => parseVerdict("[]", [])).toThrow("Judge response is not a JSON object");
  });

  it("rejects a missing per_point_status", () => {
    expect(() => parseVerdict(JSON.stringify({ overall_score: 1 }), [])).toThrow(
      "Judge response missing or invalid 'per_point_status' object",
    );
  });

  it("rejects an unknown status", () => {
    const raw = JSON.stringify({ per_point_status: { redis: "maybe" }, overall_score: 1 });
    expect(() => parseVerdict(raw, ["redis"])).toThrow('Judge returned invalid status for point "redis": maybe');
  });

  it("rejects a non-numeric score", () => {
    const raw = JSON.stringify({ per_point_status: {}, overall_score: "high" });
    expect(() => parseVerdict(raw, [])).toThrow("Judge response missing or invalid 'overall_score' number");
  });

  it("rejects a non-string follow-up", () => {
    const raw = JSON.stringify({ per_point_status: {}, overall_score: 1, follow_up: 42 });
    expect(() => parseVerdict(raw, [])).toThrow("Judge response has a non-string 'follow_up'");
  });
});

describe("parseSummary()", () => {
  it("returns the trimmed summary", () => {
    expect(parseSummary(JSON.stringify({ summary: "  Strong on caching.  " }))).toBe("Strong on caching.");
  });

  it("rejects an empty summary", () => {
    expect(() => parseSummary(JSON.stringify({ summary: "" }))).toThrow(JudgeMalformedResponseError);
  });
});

// ─── Prompt construction ────────────────────────────────────────────────────────

describe("prompt builders", () => {
  it("lists expected points and guidance in the evaluation prompt", () => {
    const prompt = buildEvaluationUserPrompt({
      question: "Describe caching",
      answer: "",
      expectedPoints: ["redis", "ttl"],
      guidance: "Expiry matters",
    });

    expect(prompt).toBe(
      [
        "## Question",
        "Describe caching",
        "",
        "## Expected points",
        "- redis",
        "- ttl",
        "",
        "## Interviewer guidance",
        "Expiry matters",
        "",
        "## Candidate answer",
        "(no answer)",
      ].join("\n"),
    );
  });

  it("includes uncovered points in the summary prompt", () => {
    const prompt = buildSummaryUserPrompt({ jobDescription: "Backend engineer", answers: [RECORD] });

    expect(prompt.split("\n")).toEqual([
      "## Job description",
      "Backend engineer",
      "",
      "## Interview",
      "",
      "Q (q1): Describe your caching experience",
      "A: I used Redis",
      "Uncovered points: ttl",
    ]);
  });

  it("shows a whitespace-only answer as no answer", () => {
    const evaluation = buildEvaluationUserPrompt({ question: "Q", answer: " \n ", expectedPoints: [] });
    const summary = buildSummaryUserPrompt({ jobDescription: "JD", answers: [{ ...RECORD, answerText: "  " }] });

    expect(evaluation.split("\n").at(-1)).toBe("(no answer)");
    expect(summary.split("\n")).toContain("A: (no answer)");
  });
});

// ─── OpenAIJudge ────────────────────────────────────────────────────────────────

describe("OpenAIJudge", () => {
  it("calls chat completions in JSON mode with the configured model", async () => {
    const { client, create } = mockClient(JSON.stringify({ per_point_status: { redis: "present" }, overall_score: 1 }));
    const judge = new OpenAIJudge(client);

    const verdict = await judge.evaluate({ question: "Q", answer: "redis", expectedPoints: ["redis"] });

    expect(verdict.perPointStatus).toEqual({ redis: "present" });
    expect(create).toHaveBeenCalledTimes(1);
    const [params, options] = create.mock.calls[0];
    expect(params.model).toBe(DEFAULT_JUDGE_MODEL);
    expect(params.response_format).toEqual({ type: "json_object" });
    expect(params.messages.map((m: { role: string }) => m.role)).toEqual(["system", "user"]);
    expect(options).toBeUndefined();
  });

  it("forwards the abort signal", async () => {
    const { client, create } = mockClient(JSON.stringify({ summary: "Fine." }));
    const signal = new AbortController().signal;

    await new OpenAIJudge(client, "test-model").summarize({ jobDescription: "JD", answers: [] }, { signal });

    expect(create.mock.calls[0][0].model).toBe("test-model");
    expect(create.mock.calls[0][1]).toEqual({ signal });
  });

  it("wraps client failures in JudgeUnavailableError", async () => {
    const { client } = failingClient(new Error("ECONNRESET"));

    const error = await new OpenAIJudge(client)
      .evaluate({ question: "Q", answer: "A", expectedPoints: [] })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(JudgeUnavailableError);
    expect(error).toMatchObject({ code: "JUDGE_UNAVAILABLE", message: "Judge request failed: ECONNRESET" });
  });

  it("rejects an empty completion as malformed", async () => {
    const { client } = mockClient(null);

    await expect(
      new OpenAIJudge(client).evaluate({ question: "Q", answer: "A", expectedPoints: [] }),
    ).rejects.toThrow("Judge returned empty response");
  });

  it("rejects an unparseable completion as malformed", async () => {
    const { client } = mockClient("I think the answer is fine");

    await expect(
      new OpenAIJudge(client).summarize({ jobDescription: "JD", answers: [] }),
    ).rejects.toBeInstanceOf(JudgeMalformedResponseError);
  });
});
