/**
 * Shelfkeep CLI - List Command
 *
 * Lists the catalog in insertion order. Adapts table layout to terminal
 * width; falls back to compact cards when the terminal is narrower than
 * 70 columns.
 *
 * Usage:
 *   shelf list
 *   shelf list --type ebook
 *   shelf list --json
 */

import { Command } from "commander";
import { GlobalOptions, openCatalog } from "../config";
import { requireRecordType } from "../options";
import { colors, printInfo, printJson, printRecordTable } from "../output";

export function registerListCommand(program: Command): void {
  program
    .command("list")
    .alias("ls")
    .description("List records in the catalog")
    .option("--type <type>", "Only records of this type")
    .option("--json", "Print records as JSON", false)
    .action((opts: { type?: string; json: boolean }, cmd: Command) => {
      const type = opts.type === undefined ? undefined : requireRecordType(opts.type);
      const catalog = openCatalog(cmd.optsWithGlobals<GlobalOptions>());
      const records = type ? catalog.filterByType(type) : catalog.list();

      if (opts.json) {
        printJson(records);
        return;
      }

      if (records.length === 0) {
        printInfo(type ? `No ${type} records.` : "Catalog is empty.");
        printInfo(`Run ${colors.bold("shelf add <type>")} to add one.`);
        return;
      }

      printInfo(`${colors.bold(String(records.length))} record(s) in ${catalog.path}:\n`);
      printRecordTable(records);
    });
}
