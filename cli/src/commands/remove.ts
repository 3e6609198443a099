/**
 * Shelfkeep CLI — Remove Command
 *
 * Removes a record by identifier. Removing an identifier that is not in
 * the catalog is not an error.
 *
 * Usage:
 *   shelf remove <id>
 *   shelf rm <id>
 */

import { Command } from "commander";
import { GlobalOptions, openCatalog } from "../config";
import { colors, printInfo, printSuccess } from "../output";

export function registerRemoveCommand(program: Command): void {
  program
    .command("remove <id>")
    .alias("rm")
    .description("Remove a record from the catalog")
    .action((id: string, _opts: Record<string, never>, cmd: Command) => {
      const catalog = openCatalog(cmd.optsWithGlobals<GlobalOptions>());
      const record = catalog.find(id);

      if (!record) {
        printInfo(`No record with id "${id}". Nothing removed.`);
        return;
      }

      catalog.remove(id);
      printSuccess(`Removed ${colors.app(id)}: ${record.title}`);
    });
}
