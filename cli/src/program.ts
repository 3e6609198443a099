/**
 * Shelfkeep CLI — Program
 *
 * Builds the root command with its global options and every subcommand.
 * Kept apart from the entry point so tests can drive the CLI in-process.
 */

import { Command } from "commander";
import { registerAddCommand } from "./commands/add";
import { registerCheckCommand } from "./commands/check";
import { registerExportCommand } from "./commands/export";
import { registerImportCommand } from "./commands/import";
import { registerListCommand } from "./commands/list";
import { registerRemoveCommand } from "./commands/remove";
import { registerSearchCommand } from "./commands/search";
import { registerShowCommand } from "./commands/show";
import { setDebugMode } from "./output";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("shelf")
    .description("Keep a catalog of books, e-books and audiobooks in one file")
    .version("0.1.0")
    .option("-f, --file <path>", "Catalog file (default: ~/.shelfkeep/library.json)")
    .option("--debug", "Show debug output and structured logs", false)
    .hook("preAction", (thisCommand) => {
      setDebugMode(thisCommand.opts<{ debug: boolean }>().debug);
    });

  // ─── Reading ────────────────────────────────────────────────
  registerListCommand(program);
  registerSearchCommand(program);
  registerShowCommand(program);

  // ─── Changing ───────────────────────────────────────────────
  registerAddCommand(program);
  registerRemoveCommand(program);

  // ─── Files ──────────────────────────────────────────────────
  registerImportCommand(program);
  registerExportCommand(program);
  registerCheckCommand(program);

  return program;
}
