#!/usr/bin/env node
// Interview Dialogue Engine - Terminal entry point
// Usage: interview [path/to/job-config.json]
// Falls back to JOB_CONFIG_PATH, then data/job-config.json.

import "dotenv/config";
import { loadAppConfig } from "./config.js";
import { loadInterviewConfig } from "./job-config.js";
import { createEngine } from "./bootstrap.js";
import { runTerminalInterview } from "./terminal-interview.js";
import { createConsoleLogger, silentLogger } from "./logger.js";
import { errorMessage } from "./utils.js";
import { SessionPhase } from "./types.js";

const log = createConsoleLogger("CLI");

async function main(): Promise<number> {
  const appConfig = loadAppConfig();
  const jobPath = process.argv[2] ?? appConfig.jobConfigPath;
  const interviewConfig = await loadInterviewConfig(jobPath);

  // Engine logs would interleave with the interview transcript.
  const { sessionManager } = createEngine(appConfig, { loggerFor: () => silentLogger });

  const state = await runTerminalInterview({
    sessionManager,
    config: interviewConfig,
    input: process.stdin,
    output: process.stdout,
  });
  sessionManager.shutdown();
  return state.phase === SessionPhase.DONE ? 0 : 1;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log.error(errorMessage(err));
    process.exitCode = 1;
  },
);
