// Interview Dialogue Engine - Application configuration
// Reads process settings from the environment (.env is loaded by dotenv in main.ts).

import { ConfigInvalidError, type ValidationDetail } from "./errors.js";
import { DEFAULT_JUDGE_MODEL } from "./judge.js";
import {
  DEFAULT_IDLE_TIMEOUT_MS,
  DEFAULT_JUDGE_MAX_ATTEMPTS,
  DEFAULT_JUDGE_TIMEOUT_MS,
  DEFAULT_MAX_SESSIONS,
} from "./session-manager.js";

export const DEFAULT_PORT = 3000;
export const DEFAULT_SWEEP_INTERVAL_MS = 60_000;
export const DEFAULT_JOB_CONFIG_PATH = "data/job-config.json";

export interface AppConfig {
  port: number;
  /** Null when no key is set: the judge strategy is then unavailable. */
  openaiApiKey: string | null;
  judgeModel: string;
  judgeTimeoutMs: number;
  judgeMaxAttempts: number;
  maxSessions: number;
  sessionIdleTimeoutMs: number;
  sessionSweepIntervalMs: number;
  jobConfigPath: string;
}

type Env = Readonly<Record<string, string | undefined>>;

function readInteger(
  env: Env,
  name: string,
  fallback: number,
  min: number,
  details: ValidationDetail[],
): number {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    details.push({ field: name, message: `must be an integer >= ${min}, got "${raw}"` });
    return fallback;
  }
  return value;
}

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

/**
 * Builds the application configuration from environment variables.
 *
 * @throws ConfigInvalidError when a numeric setting is malformed.
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const details: ValidationDetail[] = [];

  const config: AppConfig = {
    port: readInteger(env, "PORT", DEFAULT_PORT, 0, details),
    openaiApiKey: env.OPENAI_API_KEY?.trim() || null,
    judgeModel: readString(env, "JUDGE_MODEL", DEFAULT_JUDGE_MODEL),
    judgeTimeoutMs: readInteger(env, "JUDGE_TIMEOUT_MS", DEFAULT_JUDGE_TIMEOUT_MS, 1, details),
    judgeMaxAttempts: readInteger(env, "JUDGE_MAX_ATTEMPTS", DEFAULT_JUDGE_MAX_ATTEMPTS, 1, details),
    maxSessions: readInteger(env, "MAX_SESSIONS", DEFAULT_MAX_SESSIONS, 1, details),
    sessionIdleTimeoutMs: readInteger(env, "SESSION_IDLE_TIMEOUT_MS", DEFAULT_IDLE_TIMEOUT_MS, 1, details),
    sessionSweepIntervalMs: readInteger(env, "SESSION_SWEEP_INTERVAL_MS", DEFAULT_SWEEP_INTERVAL_MS, 1, details),
    jobConfigPath: readString(env, "JOB_CONFIG_PATH", DEFAULT_JOB_CONFIG_PATH),
  };

  if (config.port > 65535) {
    details.push({ field: "PORT", message: `must be <= 65535, got ${config.port}` });
  }

  if (details.length > 0) {
    throw new ConfigInvalidError(
      `Invalid environment: ${details.map((d) => `${d.field} ${d.message}`).join("; ")}`,
      details,
    );
  }
  return config;
}
