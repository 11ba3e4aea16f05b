/**
 * `ghx item update-bulk`, `delete-bulk` and `archive-bulk`.
 *
 * A run that reaches every target exits with BULK_PARTIAL_FAILURE_EXIT_CODE
 * even when items failed; the failures are printed, not raised.
 */

import type { Command } from "commander";
import { z } from "zod";
import {
  MAX_CONCURRENCY,
  bulkMutate,
  validateConcurrency,
  validateMutationSpec,
  type BulkMutateResult,
  type MutationSpec,
} from "../lib/bulk-executor.js";
import { loadTargetSources } from "../lib/bulk-targets.js";
import { withLogging } from "../lib/debug-logger.js";
import { BULK_PARTIAL_FAILURE_EXIT_CODE, EXIT_CODES } from "../lib/errors.js";
import { requireProject } from "../lib/owner-resolution.js";
import { parseProjectReference } from "../lib/references.js";
import {
  formatBulkResult,
  parseOptions,
  printJson,
  type CommandContext,
} from "./shared.js";

const targetOptionsSchema = z.object({
  items: z.string().optional(),
  filter: z.string().optional(),
  file: z.string().optional(),
  concurrency: z.string().optional(),
  json: z.boolean().default(false),
});

const updateOptionsSchema = targetOptionsSchema.extend({
  field: z.string().min(1),
  value: z.string(),
});

type TargetOptions = z.infer<typeof targetOptionsSchema>;

function withTargetOptions(command: Command): Command {
  return command
    .argument("<project>", "project as owner/number")
    .option("--items <range>", "item numbers, N or N-M")
    .option("--filter <expr>", "live filter: label:<name> (first 100 labels per item), assignee:<login> or state:<state>")
    .option("--file <path>", "file with one item identifier per line")
    .option("--concurrency <n>", `parallel mutations, 1-${MAX_CONCURRENCY}`)
    .option("--json", "print the result as JSON", false);
}

async function runBulk(
  ctx: CommandContext,
  commandName: string,
  verb: string,
  ref: string,
  options: TargetOptions,
  spec: MutationSpec,
): Promise<void> {
  // Everything that can be checked locally is checked before the first request.
  const { owner, number } = parseProjectReference(ref);
  const concurrency = validateConcurrency(options.concurrency);
  validateMutationSpec(spec);
  const sources = await loadTargetSources({
    items: options.items,
    filter: options.filter,
    file: options.file,
  });

  const client = ctx.client();
  const debugLogger = ctx.debugLogger();
  const result: BulkMutateResult = await withLogging(
    debugLogger,
    commandName,
    { ref, ...options, ...spec },
    async () => {
      const project = await requireProject(client, owner, number, ctx.signal);
      return bulkMutate(client, project, {
        sources,
        spec,
        concurrency,
        signal: ctx.signal,
        debugLogger,
      });
    },
  );

  if (options.json) {
    printJson(ctx, result);
  } else {
    for (const line of formatBulkResult(result, verb)) ctx.stdout(line);
  }

  if (result.cancelled) {
    ctx.stderr(
      `[ghx] Cancelled after ${result.attempted} of ${result.targets.length} item(s)`,
    );
    ctx.setExitCode(EXIT_CODES.cancelled);
    return;
  }
  ctx.setExitCode(BULK_PARTIAL_FAILURE_EXIT_CODE);
}

export function registerItemCommands(program: Command, ctx: CommandContext): void {
  const item = program.command("item").description("Bulk operations on project items");

  withTargetOptions(
    item
      .command("update-bulk")
      .description("Set one field on many project items")
      .requiredOption("--field <name>", "field to update")
      .requiredOption("--value <value>", "new value (option name for single-select fields)"),
  ).action(async (ref: string, rawOptions: unknown) => {
    const options = parseOptions(updateOptionsSchema, rawOptions);
    await runBulk(ctx, "item update-bulk", "Updated", ref, options, {
      kind: "update-field",
      fieldName: options.field,
      value: options.value,
    });
  });

  withTargetOptions(
    item.command("delete-bulk").description("Remove many items from a project"),
  ).action(async (ref: string, rawOptions: unknown) => {
    const options = parseOptions(targetOptionsSchema, rawOptions);
    await runBulk(ctx, "item delete-bulk", "Deleted", ref, options, { kind: "delete" });
  });

  withTargetOptions(
    item.command("archive-bulk").description("Archive many project items"),
  ).action(async (ref: string, rawOptions: unknown) => {
    const options = parseOptions(targetOptionsSchema, rawOptions);
    await runBulk(ctx, "item archive-bulk", "Archived", ref, options, { kind: "archive" });
  });
}
