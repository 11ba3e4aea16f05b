/**
 * Environment-driven configuration, read once per invocation.
 *
 * The token is handed out as an explicit Credentials object that callers
 * pass to createGitHubClient; nothing here is cached between runs.
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { ValidationError } from "./errors.js";

export const TOOL_NAME = "ghx";
export const TOOL_VERSION = "0.3.0";

const TOKEN_VARIABLES = ["GHX_TOKEN", "GITHUB_TOKEN", "GH_TOKEN"] as const;

export type Env = Record<string, string | undefined>;

export interface Credentials {
  token: string;
  /** Name of the environment variable the token came from. */
  source: string;
}

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
}

export interface GhxConfig {
  credentials: Credentials;
  retry: RetryConfig;
  debug: boolean;
  logDir: string;
}

/**
 * Read a variable, treating empty strings and unexpanded `${VAR}`
 * literals (left behind by some MCP hosts) as unset.
 */
export function resolveEnv(env: Env, name: string): string | undefined {
  const val = env[name];
  if (!val || val.startsWith("${")) return undefined;
  return val;
}

export function resolveCredentials(env: Env): Credentials {
  for (const name of TOKEN_VARIABLES) {
    const token = resolveEnv(env, name);
    if (token) return { token, source: name };
  }
  throw new ValidationError(
    "No GitHub token found. Set one of: " +
      TOKEN_VARIABLES.join(", ") +
      ". The token needs the 'project' scope (and 'repo' to read issue content).",
  );
}

function parseIntegerEnv(
  env: Env,
  name: string,
  fallback: number,
  min: number,
  max: number,
): number {
  const raw = resolveEnv(env, name);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw.trim())) {
    throw new ValidationError(`${name} must be an integer, got "${raw}"`);
  }
  const value = Number.parseInt(raw, 10);
  if (value < min || value > max) {
    throw new ValidationError(
      `${name} must be between ${min} and ${max}, got "${raw}"`,
    );
  }
  return value;
}

export function loadConfig(env: Env = process.env): GhxConfig {
  return {
    credentials: resolveCredentials(env),
    retry: {
      maxRetries: parseIntegerEnv(env, "GHX_MAX_RETRIES", 3, 0, 10),
      baseDelayMs: parseIntegerEnv(env, "GHX_RETRY_BASE_MS", 500, 0, 60_000),
    },
    debug: resolveEnv(env, "GHX_DEBUG") === "true",
    logDir: resolveEnv(env, "GHX_LOG_DIR") ?? join(homedir(), ".ghx", "logs"),
  };
}
