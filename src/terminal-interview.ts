// Interview Dialogue Engine - Terminal interview runner
// Drives one session over a pair of streams: prompts are written to `output`,
// each line read from `input` is one answer. End of input cancels the session.

import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { SessionManager } from "./session-manager.js";
import { SessionPhase, type InterviewConfig, type SessionState, type TurnResult } from "./types.js";

export interface TerminalInterviewOptions {
  sessionManager: SessionManager;
  config: InterviewConfig;
  input: Readable;
  output: Writable;
}

export function formatPromptLine(result: TurnResult, questionCount: number): string {
  const label = result.isFollowUp ? "Follow-up" : `Q${result.questionIndex + 1}/${questionCount}`;
  return `[${label}] ${result.prompt ?? ""}`;
}

/**
 * Runs an interview to its end and returns the final session state.
 * Completed interviews print their report; cancelled and failed ones a one-line notice.
 */
export async function runTerminalInterview(options: TerminalInterviewOptions): Promise<SessionState> {
  const { sessionManager, config, input, output } = options;
  const rl = createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  try {
    let result = await sessionManager.createSession(config);
    output.write(`Interview started (session ${result.sessionId})\n`);

    while (result.outcome === "prompt") {
      output.write(`\n${formatPromptLine(result, config.questions.length)}\n> `);
      const line = await lines.next();
      if (line.done) {
        output.write("\n");
        sessionManager.cancelSession(result.sessionId);
        break;
      }
      result = await sessionManager.submitAnswer(result.sessionId, line.value);
    }

    const state = sessionManager.getState(result.sessionId);
    output.write("\n");
    switch (state.phase) {
      case SessionPhase.DONE:
        output.write(`${state.review?.report ?? state.review?.summary.text ?? ""}\n`);
        break;
      case SessionPhase.CANCELLED:
        output.write("Interview cancelled.\n");
        break;
      default:
        output.write(`Interview failed: ${state.error?.message ?? "unknown error"}\n`);
    }
    return state;
  } finally {
    rl.close();
  }
}
