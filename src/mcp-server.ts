/**
 * Stdio MCP server exposing the portability and bulk tools.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createGitHubClient } from "./github-client.js";
import { TOOL_NAME, TOOL_VERSION, type GhxConfig } from "./lib/config.js";
import { createDebugLogger } from "./lib/debug-logger.js";
import { registerPortabilityTools } from "./tools/portability-tools.js";

export async function startMcpServer(config: GhxConfig): Promise<void> {
  console.error("[ghx] Starting MCP server...");
  console.error(`[ghx] Token: ${config.credentials.source}`);

  const debugLogger = createDebugLogger({ enabled: config.debug, logDir: config.logDir });
  debugLogger?.logSession({ mode: "mcp", version: TOOL_VERSION });

  const client = createGitHubClient(config.credentials, {
    retry: config.retry,
    debugLogger,
  });

  const server = new McpServer({
    name: TOOL_NAME,
    version: TOOL_VERSION,
  });
  registerPortabilityTools(server, client, debugLogger);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error("[ghx] MCP server connected and ready.");
}
