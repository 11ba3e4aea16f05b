/**
 * The `ghx` command tree, built against a CommandContext so tests can
 * drive it without a process or a token.
 */

import { Command } from "commander";
import { registerItemCommands } from "./commands/item-commands.js";
import { registerProjectCommands } from "./commands/project-commands.js";
import type { CommandContext } from "./commands/shared.js";
import { TOOL_NAME, TOOL_VERSION } from "./lib/config.js";

export function createProgram(ctx: CommandContext): Command {
  const program = new Command();

  program
    .name(TOOL_NAME)
    .description("Export, import and bulk-edit GitHub Projects (v2)")
    .version(TOOL_VERSION);

  registerProjectCommands(program, ctx);
  registerItemCommands(program, ctx);

  return program;
}
