import { describe, it, expect, vi } from "vitest";
import { PassThrough, Writable } from "node:stream";
import { formatPromptLine, runTerminalInterview } from "./terminal-interview.js";
import { SessionManager } from "./session-manager.js";
import { followUpPromptFor } from "./answer-evaluator.js";
import { SessionPhase, type InterviewConfig, type TurnResult } from "./types.js";

const CONFIG: InterviewConfig = {
  jobDescription: "Backend engineer",
  maxFollowUpChances: 1,
  questions: [
    { id: "q1", text: "Describe your caching experience", requiredKeywords: ["redis", "ttl"], guidance: "" },
  ],
};

function createCollector() {
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { output, text: () => chunks.join("") };
}

function createManager(): SessionManager {
  return new SessionManager({ logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn() } });
}

describe("formatPromptLine()", () => {
  const base: TurnResult = {
    sessionId: "s-1",
    outcome: "prompt",
    prompt: "Describe your caching experience",
    isFollowUp: false,
    done: false,
    phase: SessionPhase.INTERVIEWING,
    questionIndex: 1,
  };

  it("labels main questions with their position", () => {
    expect(formatPromptLine(base, 3)).toBe("[Q2/3] Describe your caching experience");
  });

  it("labels follow-ups", () => {
    expect(formatPromptLine({ ...base, isFollowUp: true, prompt: "Which TTL?" }, 3)).toBe("[Follow-up] Which TTL?");
  });
});

describe("runTerminalInterview()", () => {
  it("reads one answer per line and prints the report", async () => {
    const input = new PassThrough();
    const { output, text } = createCollector();
    input.end("I used Redis\nwith a TTL\n");

    const state = await runTerminalInterview({ sessionManager: createManager(), config: CONFIG, input, output });

    expect(state.phase).toBe(SessionPhase.DONE);
    expect(state.answers[0]).toMatchObject({ answerText: "with a TTL", status: "complete" });
    expect(
      text().startsWith(
        `Interview started (session ${state.sessionId})\n` +
          "\n[Q1/1] Describe your caching experience\n> " +
          `\n[Follow-up] ${followUpPromptFor("ttl")}\n> ` +
          "\n=== Interview Report ===\n",
      ),
    ).toBe(true);
    expect(text().endsWith("--- Summary (coverage only) ---\n1 of 1 questions answered completely (100%).\n")).toBe(
      true,
    );
  });

  it("cancels the interview at end of input", async () => {
    const input = new PassThrough();
    const { output, text } = createCollector();
    input.end("I used Redis\n");

    const state = await runTerminalInterview({ sessionManager: createManager(), config: CONFIG, input, output });

    expect(state.phase).toBe(SessionPhase.CANCELLED);
    expect(state.answers).toEqual([]);
    expect(text().endsWith(`[Follow-up] ${followUpPromptFor("ttl")}\n> \n\nInterview cancelled.\n`)).toBe(true);
  });
});
