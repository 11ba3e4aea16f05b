/**
 * Debug logger for the ghx CLI and MCP server.
 *
 * Captures command invocations, GraphQL operations and per-item bulk
 * outcomes as JSONL when GHX_DEBUG=true. Returns null when disabled for
 * zero overhead.
 */

import { writeFile, appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { randomBytes } from "node:crypto";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DebugLoggerOptions {
  logDir: string;
}

export interface GraphQLLogFields {
  operation?: string;
  variables?: Record<string, unknown>;
  durationMs: number;
  status: number;
  attempt?: number;
  rateLimitRemaining?: number;
  rateLimitCost?: number;
  error?: string;
}

export interface CommandLogFields {
  command: string;
  params: Record<string, unknown>;
  durationMs: number;
  ok: boolean;
  error?: string;
}

export interface BulkLogFields {
  operation: string;
  target: string;
  ok: boolean;
  error?: string;
}

interface LogEvent {
  ts: string;
  cat: "command" | "graphql" | "bulk" | "session";
  [key: string]: unknown;
}

// ---------------------------------------------------------------------------
// Sanitization
// ---------------------------------------------------------------------------

const SENSITIVE_PATTERNS = /token|auth|secret|key|password|credential/i;

/**
 * Strip fields whose keys match sensitive patterns.
 */
export function sanitize(
  obj: Record<string, unknown> | undefined,
): Record<string, unknown> | undefined {
  if (!obj) return obj;
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    result[k] = SENSITIVE_PATTERNS.test(k) ? "[REDACTED]" : v;
  }
  return result;
}

// ---------------------------------------------------------------------------
// DebugLogger
// ---------------------------------------------------------------------------

export class DebugLogger {
  private logPath: string | null = null;
  private logDir: string;
  private pending: Promise<void> = Promise.resolve();

  constructor(options: DebugLoggerOptions) {
    this.logDir = options.logDir;
  }

  private async getLogPath(): Promise<string> {
    if (this.logPath) return this.logPath;

    await mkdir(this.logDir, { recursive: true });

    const ts = new Date()
      .toISOString()
      .replace(/[:.]/g, "-")
      .replace("T", "-")
      .replace("Z", "");
    const rand = randomBytes(2).toString("hex");
    const path = join(this.logDir, `session-${ts}-${rand}.jsonl`);

    await writeFile(path, "");
    this.logPath = path;
    return path;
  }

  private append(event: LogEvent): void {
    // Writes are chained so events land in order; flush() awaits the chain.
    this.pending = this.pending
      .then(() => this.getLogPath())
      .then((path) => appendFile(path, JSON.stringify(event) + "\n"))
      .catch((error: unknown) => {
        console.error("[ghx] Debug log write failed:", error);
      });
  }

  logSession(fields: Record<string, unknown>): void {
    this.append({ ts: new Date().toISOString(), cat: "session", ...fields });
  }

  logGraphQL(fields: GraphQLLogFields): void {
    this.append({
      ts: new Date().toISOString(),
      cat: "graphql",
      operation: fields.operation,
      variables: sanitize(fields.variables),
      durationMs: fields.durationMs,
      status: fields.status,
      attempt: fields.attempt,
      rateLimitRemaining: fields.rateLimitRemaining,
      rateLimitCost: fields.rateLimitCost,
      ...(fields.error ? { error: fields.error } : {}),
    });
  }

  logCommand(fields: CommandLogFields): void {
    this.append({
      ts: new Date().toISOString(),
      cat: "command",
      command: fields.command,
      params: sanitize(fields.params) ?? {},
      durationMs: fields.durationMs,
      ok: fields.ok,
      ...(fields.error ? { error: fields.error } : {}),
    });
  }

  logBulk(fields: BulkLogFields): void {
    this.append({
      ts: new Date().toISOString(),
      cat: "bulk",
      operation: fields.operation,
      target: fields.target,
      ok: fields.ok,
      ...(fields.error ? { error: fields.error } : {}),
    });
  }

  /** Wait for every queued write. */
  flush(): Promise<void> {
    return this.pending;
  }

  /** Get the current log file path (for testing). */
  getSessionLogPath(): string | null {
    return this.logPath;
  }
}

// ---------------------------------------------------------------------------
// Factory & Wrapper
// ---------------------------------------------------------------------------

/**
 * Create a DebugLogger when debugging is enabled, otherwise null.
 */
export function createDebugLogger(options: {
  enabled: boolean;
  logDir: string;
}): DebugLogger | null {
  if (!options.enabled) return null;
  return new DebugLogger({ logDir: options.logDir });
}

/**
 * Extract a GraphQL operation name from a query string.
 */
export function extractOperationName(
  queryString: string,
): string | undefined {
  const match = queryString.match(/(?:query|mutation)\s+(\w+)/);
  return match?.[1];
}

/**
 * Wrap a command or tool handler with debug logging.
 * When logger is null, calls handler directly.
 */
export async function withLogging<T>(
  logger: DebugLogger | null,
  command: string,
  params: Record<string, unknown>,
  handler: () => Promise<T>,
): Promise<T> {
  if (!logger) return handler();

  const t0 = Date.now();
  try {
    const result = await handler();
    logger.logCommand({
      command,
      params,
      durationMs: Date.now() - t0,
      ok: true,
    });
    return result;
  } catch (error) {
    logger.logCommand({
      command,
      params,
      durationMs: Date.now() - t0,
      ok: false,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}
