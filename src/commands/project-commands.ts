/**
 * `ghx project export` and `ghx project import`.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import type { Command } from "commander";
import { z } from "zod";
import { serializeBundle, validateFormat, type Bundle } from "../lib/bundle.js";
import { withLogging } from "../lib/debug-logger.js";
import { ValidationError, errorMessage } from "../lib/errors.js";
import { exportProject, writeBundleFile } from "../lib/export.js";
import {
  DEFAULT_MERGE_STRATEGY,
  MERGE_STRATEGIES,
  importProject,
  validateMergeStrategy,
  type ImportResult,
} from "../lib/import.js";
import { requireProject } from "../lib/owner-resolution.js";
import { formatProjectReference, parseProjectReference } from "../lib/references.js";
import { parseOptions, printJson, type CommandContext } from "./shared.js";

const exportOptionsSchema = z.object({
  output: z.string().min(1).optional(),
  format: z.string().optional(),
  includeItems: z.boolean().default(false),
  includeFields: z.boolean().default(false),
  includeViews: z.boolean().default(false),
  includeWorkflows: z.boolean().default(false),
});

const importOptionsSchema = z.object({
  file: z.string().min(1),
  owner: z.string().min(1),
  dryRun: z.boolean().default(false),
  skipItems: z.boolean().default(false),
  skipFields: z.boolean().default(false),
  mergeStrategy: z.string().default(DEFAULT_MERGE_STRATEGY),
  json: z.boolean().default(false),
});

function formatFromPath(path: string | undefined): string {
  const ext = path ? extname(path).toLowerCase() : "";
  return ext === ".yaml" || ext === ".yml" ? "yaml" : "json";
}

function describeCollections(bundle: Bundle): string {
  const parts: string[] = [];
  if (bundle.items) parts.push(`${bundle.items.length} items`);
  if (bundle.fields) parts.push(`${bundle.fields.length} fields`);
  if (bundle.views) parts.push(`${bundle.views.length} views`);
  return parts.length > 0 ? parts.join(", ") : "project metadata only";
}

function describeImport(result: ImportResult): string {
  const counts = `${result.fieldCount} fields, ${result.itemCount} items, ${result.viewCount} views`;
  return result.dryRun
    ? `Dry run: would create project "${result.projectTitle}" with ${counts}`
    : `Created project "${result.projectTitle}" (${result.projectUrl}) with ${counts}`;
}

export function registerProjectCommands(program: Command, ctx: CommandContext): void {
  const project = program
    .command("project")
    .description("Export and import GitHub Projects");

  project
    .command("export")
    .description("Export a project to a portable JSON or YAML bundle")
    .argument("<project>", "project as owner/number")
    .option("-o, --output <path>", "file to write (default: stdout)")
    .option("-f, --format <format>", "json or yaml (default: from --output extension, else json)")
    .option("--include-items", "include project items", false)
    .option("--include-fields", "include custom field definitions", false)
    .option("--include-views", "include saved views", false)
    .option("--include-workflows", "accepted for compatibility; workflows are not exported", false)
    .action(async (ref: string, rawOptions: unknown) => {
      const options = parseOptions(exportOptionsSchema, rawOptions);
      const { owner, number } = parseProjectReference(ref);
      const format = validateFormat(options.format ?? formatFromPath(options.output));

      if (options.includeWorkflows) {
        ctx.stderr("[ghx] --include-workflows is ignored: workflows are not part of the bundle");
      }

      const client = ctx.client();
      await withLogging(ctx.debugLogger(), "project export", { ref, ...options }, async () => {
        const handle = await requireProject(client, owner, number, ctx.signal);
        const bundle = await exportProject(client, handle, {
          includeItems: options.includeItems,
          includeFields: options.includeFields,
          includeViews: options.includeViews,
          signal: ctx.signal,
        });
        const text = serializeBundle(bundle, format);

        if (!options.output) {
          ctx.stdout(text.trimEnd());
          return;
        }
        await writeBundleFile(options.output, text);
        ctx.stdout(
          `Exported ${formatProjectReference(owner, number)} to ${options.output} (${describeCollections(bundle)})`,
        );
      });
    });

  project
    .command("import")
    .description("Create a new project from an exported bundle")
    .requiredOption("--file <path>", "bundle file (JSON or YAML)")
    .requiredOption("--owner <login>", "user or organization that will own the new project")
    .option("--dry-run", "plan and count without creating anything", false)
    .option("--skip-items", "do not import items", false)
    .option("--skip-fields", "do not import custom fields", false)
    .option(
      "--merge-strategy <strategy>",
      `one of ${MERGE_STRATEGIES.join(", ")}`,
      DEFAULT_MERGE_STRATEGY,
    )
    .option("--json", "print the result as JSON", false)
    .action(async (rawOptions: unknown) => {
      const options = parseOptions(importOptionsSchema, rawOptions);
      const mergeStrategy = validateMergeStrategy(options.mergeStrategy);

      let text: string;
      try {
        text = await readFile(options.file, "utf8");
      } catch (error) {
        throw new ValidationError(
          `cannot read bundle file "${options.file}": ${errorMessage(error)}`,
          { cause: error },
        );
      }

      const client = ctx.client();
      const result = await withLogging(
        ctx.debugLogger(),
        "project import",
        { ...options },
        () =>
          importProject(client, text, {
            owner: options.owner,
            dryRun: options.dryRun,
            skipItems: options.skipItems,
            skipFields: options.skipFields,
            mergeStrategy,
            signal: ctx.signal,
          }),
      );

      if (options.json) {
        printJson(ctx, result);
      } else {
        ctx.stdout(describeImport(result));
      }
    });
}
