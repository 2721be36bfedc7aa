import { describe, it, expect } from "vitest";
import { loadAppConfig, DEFAULT_JOB_CONFIG_PATH, DEFAULT_PORT, DEFAULT_SWEEP_INTERVAL_MS } from "./config.js";
import { ConfigInvalidError } from "./errors.js";
import { DEFAULT_JUDGE_MODEL } from "./judge.js";

describe("loadAppConfig()", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadAppConfig({})).toEqual({
      port: DEFAULT_PORT,
      openaiApiKey: null,
      judgeModel: DEFAULT_JUDGE_MODEL,
      judgeTimeoutMs: 20_000,
      judgeMaxAttempts: 2,
      maxSessions: 100,
      sessionIdleTimeoutMs: 30 * 60 * 1000,
      sessionSweepIntervalMs: DEFAULT_SWEEP_INTERVAL_MS,
      jobConfigPath: DEFAULT_JOB_CONFIG_PATH,
    });
  });

  it("reads every setting from the environment", () => {
    const config = loadAppConfig({
      PORT: "8080",
      OPENAI_API_KEY: "test-secret",
      JUDGE_MODEL: "test-model",
      JUDGE_TIMEOUT_MS: "5000",
      JUDGE_MAX_ATTEMPTS: "3",
      MAX_SESSIONS: "10",
      SESSION_IDLE_TIMEOUT_MS: "60000",
      SESSION_SWEEP_INTERVAL_MS: "1000",
      JOB_CONFIG_PATH: "jobs/backend.json",
    });

    expect(config).toEqual({
      port: 8080,
      openaiApiKey: "test-secret",
      judgeModel: "test-model",
      judgeTimeoutMs: 5000,
      judgeMaxAttempts: 3,
      maxSessions: 10,
      sessionIdleTimeoutMs: 60000,
      sessionSweepIntervalMs: 1000,
      jobConfigPath: "jobs/backend.json",
    });
  });

  it("treats a blank API key as unset", () => {
    expect(loadAppConfig({ OPENAI_API_KEY: "   " }).openaiApiKey).toBeNull();
  });

  it("rejects malformed numbers and lists every offending variable", () => {
    try {
      loadAppConfig({ PORT: "eighty", MAX_SESSIONS: "0", JUDGE_TIMEOUT_MS: "1.5" });
      expect.unreachable("loadAppConfig should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigInvalidError);
      if (err instanceof ConfigInvalidError) {
        expect(err.details.map((d) => d.field)).toEqual(["PORT", "JUDGE_TIMEOUT_MS", "MAX_SESSIONS"]);
      }
    }
  });

  it("rejects an out-of-range port", () => {
    expect(() => loadAppConfig({ PORT: "70000" })).toThrow("PORT must be <= 65535, got 70000");
  });
});
