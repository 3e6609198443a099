/**
 * Shelfkeep CLI — Show Command
 *
 * Prints every field of one record.
 *
 * Usage:
 *   shelf show <id>
 *   shelf show <id> --json
 */

import { Command } from "commander";
import { GlobalOptions, openCatalog } from "../config";
import { CliError } from "../errors";
import { printJson, printRecord } from "../output";

export function registerShowCommand(program: Command): void {
  program
    .command("show <id>")
    .description("Show one record")
    .option("--json", "Print the stored form as JSON", false)
    .action((id: string, opts: { json: boolean }, cmd: Command) => {
      const catalog = openCatalog(cmd.optsWithGlobals<GlobalOptions>());
      const record = catalog.find(id);

      if (!record) {
        throw new CliError(`No record with id "${id}".`);
      }

      if (opts.json) {
        printJson([record]);
      } else {
        printRecord(record);
      }
    });
}
