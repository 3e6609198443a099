/**
 * Shelfkeep CLI — Search Command
 *
 * Case-insensitive substring search over titles and authors.
 *
 * Usage:
 *   shelf search <query>
 *   shelf search            (every record)
 */

import { Command } from "commander";
import { GlobalOptions, openCatalog } from "../config";
import { printInfo, printJson, printRecordTable } from "../output";

export function registerSearchCommand(program: Command): void {
  program
    .command("search [query]")
    .description("Search titles and authors")
    .option("--json", "Print matches as JSON", false)
    .action((query: string | undefined, opts: { json: boolean }, cmd: Command) => {
      const catalog = openCatalog(cmd.optsWithGlobals<GlobalOptions>());
      const records = catalog.search(query ?? "");

      if (opts.json) {
        printJson(records);
        return;
      }

      if (records.length === 0) {
        printInfo(query ? `No records found matching "${query}".` : "Catalog is empty.");
        return;
      }

      printInfo(
        query
          ? `Found ${records.length} record(s) matching "${query}":\n`
          : `${records.length} record(s):\n`,
      );
      printRecordTable(records);
    });
}
