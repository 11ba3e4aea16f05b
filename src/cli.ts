#!/usr/bin/env node
/**
 * ghx - entry point.
 *
 * Configuration is read from the environment on first use. SIGINT
 * aborts the shared signal: running commands stop between requests and
 * report what they finished.
 */

import { createGitHubClient, type GitHubClient } from "./github-client.js";
import type { CommandContext } from "./commands/shared.js";
import { loadConfig, TOOL_VERSION, type GhxConfig } from "./lib/config.js";
import { createDebugLogger, type DebugLogger } from "./lib/debug-logger.js";
import { CancelledError, errorMessage, exitCodeFor } from "./lib/errors.js";
import { startMcpServer } from "./mcp-server.js";
import { createProgram } from "./program.js";

const controller = new AbortController();

process.once("SIGINT", () => {
  console.error("[ghx] Interrupted. Finishing the current request...");
  controller.abort(new CancelledError("interrupted"));
});

let config: GhxConfig | undefined;
let client: GitHubClient | undefined;
let debugLogger: DebugLogger | null | undefined;

function getConfig(): GhxConfig {
  config ??= loadConfig();
  return config;
}

function getDebugLogger(): DebugLogger | null {
  if (debugLogger === undefined) {
    const { debug, logDir } = getConfig();
    debugLogger = createDebugLogger({ enabled: debug, logDir });
    debugLogger?.logSession({ argv: process.argv.slice(2), version: TOOL_VERSION });
  }
  return debugLogger;
}

const ctx: CommandContext = {
  client: () => {
    client ??= createGitHubClient(getConfig().credentials, {
      retry: getConfig().retry,
      debugLogger: getDebugLogger(),
    });
    return client;
  },
  debugLogger: getDebugLogger,
  signal: controller.signal,
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

const program = createProgram(ctx);

program
  .command("mcp")
  .description("Run as an MCP server over stdio")
  .action(async () => {
    await startMcpServer(getConfig());
  });

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(`[ghx] Error: ${errorMessage(error)}`);
    process.exitCode = exitCodeFor(error);
  } finally {
    await debugLogger?.flush();
  }
}

main().catch((error: unknown) => {
  console.error("[ghx] Fatal error:", error);
  process.exit(1);
});
