/**
 * MCP tools for project export, import and bulk item mutation.
 *
 * Each tool takes the same inputs as its CLI command and returns the
 * command's result as JSON. Errors come back as toolError payloads.
 */

import { readFile } from "node:fs/promises";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { GitHubClient } from "../github-client.js";
import {
  bulkMutate,
  MAX_CONCURRENCY,
  validateMutationSpec,
  type MutationSpec,
} from "../lib/bulk-executor.js";
import { loadTargetSources } from "../lib/bulk-targets.js";
import { BUNDLE_FORMATS, serializeBundle } from "../lib/bundle.js";
import { withLogging, type DebugLogger } from "../lib/debug-logger.js";
import { ValidationError, errorMessage } from "../lib/errors.js";
import { exportProject, writeBundleFile } from "../lib/export.js";
import { DEFAULT_MERGE_STRATEGY, MERGE_STRATEGIES, importProject } from "../lib/import.js";
import { requireProject } from "../lib/owner-resolution.js";
import { parseProjectReference } from "../lib/references.js";
import { toolError, toolSuccess, type ToolResult } from "../types.js";

// ---------------------------------------------------------------------------
// Input shapes
// ---------------------------------------------------------------------------

export const exportProjectInput = {
  project: z.string().describe("Project as owner/number"),
  includeItems: z.boolean().optional().default(true).describe("Include items (default: true)"),
  includeFields: z.boolean().optional().default(true).describe("Include custom fields (default: true)"),
  includeViews: z.boolean().optional().default(true).describe("Include views (default: true)"),
  format: z.enum(BUNDLE_FORMATS).optional().default("json").describe("Bundle encoding"),
  outputPath: z.string().optional().describe("Write the bundle to this file instead of returning it"),
};

export const importProjectInput = {
  owner: z.string().describe("User or organization login that will own the new project"),
  bundle: z.string().optional().describe("Bundle text (JSON or YAML)"),
  filePath: z.string().optional().describe("Path to a bundle file (JSON or YAML)"),
  dryRun: z.boolean().optional().default(false),
  skipItems: z.boolean().optional().default(false),
  skipFields: z.boolean().optional().default(false),
  mergeStrategy: z.enum(MERGE_STRATEGIES).optional().default(DEFAULT_MERGE_STRATEGY),
};

export const bulkMutateInput = {
  project: z.string().describe("Project as owner/number"),
  operation: z.enum(["update-field", "delete", "archive"]),
  field: z.string().optional().describe("Field name (update-field only)"),
  value: z.string().optional().describe("New value (update-field only)"),
  items: z.string().optional().describe("Item numbers, N or N-M"),
  filter: z.string().optional().describe("label:<name> (first 100 labels per item), assignee:<login> or state:<state>"),
  file: z.string().optional().describe("File with one identifier per line"),
  targets: z.array(z.string()).optional().describe("Item numbers, owner/repo#N references, URLs or item ids"),
  concurrency: z.number().int().min(1).max(MAX_CONCURRENCY).optional(),
};

export type ExportProjectArgs = z.infer<z.ZodObject<typeof exportProjectInput>>;
export type ImportProjectArgs = z.infer<z.ZodObject<typeof importProjectInput>>;
export type BulkMutateArgs = z.infer<z.ZodObject<typeof bulkMutateInput>>;

export interface ToolDeps {
  client: GitHubClient;
  debugLogger: DebugLogger | null;
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

export async function handleExportProject(
  { client, debugLogger }: ToolDeps,
  args: ExportProjectArgs,
  signal?: AbortSignal,
): Promise<ToolResult> {
  try {
    return await withLogging(debugLogger, "ghx__export_project", args, async () => {
      const { owner, number } = parseProjectReference(args.project);
      const handle = await requireProject(client, owner, number, signal);
      const bundle = await exportProject(client, handle, {
        includeItems: args.includeItems,
        includeFields: args.includeFields,
        includeViews: args.includeViews,
        signal,
      });

      if (args.outputPath) {
        await writeBundleFile(args.outputPath, serializeBundle(bundle, args.format));
        return toolSuccess({
          path: args.outputPath,
          format: args.format,
          itemCount: bundle.items?.length,
          fieldCount: bundle.fields?.length,
          viewCount: bundle.views?.length,
        });
      }
      return args.format === "json"
        ? toolSuccess(bundle)
        : toolSuccess({ format: "yaml", document: serializeBundle(bundle, "yaml") });
    });
  } catch (error: unknown) {
    return toolError(`Failed to export project: ${errorMessage(error)}`);
  }
}

export async function handleImportProject(
  { client, debugLogger }: ToolDeps,
  args: ImportProjectArgs,
  signal?: AbortSignal,
): Promise<ToolResult> {
  try {
    return await withLogging(debugLogger, "ghx__import_project", args, async () => {
      let text = args.bundle;
      if (text === undefined) {
        if (!args.filePath) {
          throw new ValidationError("either bundle or filePath is required");
        }
        text = await readFile(args.filePath, "utf8");
      }
      const result = await importProject(client, text, {
        owner: args.owner,
        dryRun: args.dryRun,
        skipItems: args.skipItems,
        skipFields: args.skipFields,
        mergeStrategy: args.mergeStrategy,
        signal,
      });
      return toolSuccess(result);
    });
  } catch (error: unknown) {
    return toolError(`Failed to import project: ${errorMessage(error)}`);
  }
}

export async function handleBulkMutate(
  { client, debugLogger }: ToolDeps,
  args: BulkMutateArgs,
  signal?: AbortSignal,
): Promise<ToolResult> {
  try {
    return await withLogging(debugLogger, "ghx__bulk_mutate_items", args, async () => {
      const { owner, number } = parseProjectReference(args.project);
      const spec: MutationSpec =
        args.operation === "update-field"
          ? { kind: "update-field", fieldName: args.field ?? "", value: args.value ?? "" }
          : { kind: args.operation };
      validateMutationSpec(spec);
      const sources = await loadTargetSources({
        items: args.items,
        filter: args.filter,
        file: args.file,
        identifiers: args.targets,
      });

      const project = await requireProject(client, owner, number, signal);
      const result = await bulkMutate(client, project, {
        sources,
        spec,
        concurrency: args.concurrency,
        signal,
        debugLogger,
      });
      return toolSuccess(result);
    });
  } catch (error: unknown) {
    return toolError(`Bulk mutation failed: ${errorMessage(error)}`);
  }
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

export function registerPortabilityTools(
  server: McpServer,
  client: GitHubClient,
  debugLogger: DebugLogger | null,
): void {
  const deps: ToolDeps = { client, debugLogger };

  server.tool(
    "ghx__export_project",
    "Export a GitHub Project (v2) to a portable bundle. Returns the bundle, or writes it to outputPath and returns a summary. Collections not requested are left out of the bundle.",
    exportProjectInput,
    (args, extra) => handleExportProject(deps, args, extra.signal),
  );

  server.tool(
    "ghx__import_project",
    "Create a new GitHub Project (v2) from a bundle given inline or by file path. Use dryRun to get the counts without creating anything. A failed stage leaves already-created objects in place; the error names the project.",
    importProjectInput,
    (args, extra) => handleImportProject(deps, args, extra.signal),
  );

  server.tool(
    "ghx__bulk_mutate_items",
    "Apply one mutation (update-field, delete or archive) to many project items. Targets are the union of an item range, a live filter, a file and inline identifiers. Partial failures don't abort the batch; check errors for the items that failed.",
    bulkMutateInput,
    (args, extra) => handleBulkMutate(deps, args, extra.signal),
  );
}
