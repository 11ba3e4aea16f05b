/**
 * Plumbing shared by the CLI commands.
 */

import { z } from "zod";
import type { GitHubClient } from "../github-client.js";
import type { BulkResult } from "../lib/bulk-executor.js";
import type { DebugLogger } from "../lib/debug-logger.js";
import { ValidationError } from "../lib/errors.js";

/**
 * What a command needs from the process. The client and logger are
 * created on first use so `--help` works without a token.
 */
export interface CommandContext {
  client: () => GitHubClient;
  debugLogger: () => DebugLogger | null;
  signal: AbortSignal;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  setExitCode: (code: number) => void;
}

function kebab(name: string): string {
  return name.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}

/**
 * Validate commander's option bag against a zod schema, reporting the
 * first bad option as a ValidationError.
 */
export function parseOptions<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? `--${kebab(String(issue.path[0]))}: ` : "";
    throw new ValidationError(`${where}${issue?.message ?? "invalid options"}`);
  }
  return parsed.data;
}

export function printJson(ctx: CommandContext, data: unknown): void {
  ctx.stdout(JSON.stringify(data, null, 2));
}

/**
 * Summary line plus one line per failed item.
 */
export function formatBulkResult(result: BulkResult, verb: string): string[] {
  const lines = [
    `${verb} ${result.succeeded} of ${result.attempted} item(s)` +
      (result.failed > 0 ? `, ${result.failed} failed` : ""),
  ];
  for (const error of result.errors) {
    lines.push(`  ${error}`);
  }
  return lines;
}
