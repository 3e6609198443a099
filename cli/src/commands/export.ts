/**
 * Shelfkeep CLI — Export Command
 *
 * Writes the whole catalog to another file. The extension picks the
 * format: .yaml/.yml for YAML, anything else JSON.
 *
 * Usage:
 *   shelf export backup.json
 *   shelf export shelf.yaml
 */

import * as path from "path";
import { Command } from "commander";
import { saveRecords } from "@shelfkeep/catalog";
import { GlobalOptions, openCatalog } from "../config";
import { CliError } from "../errors";
import { printSuccess } from "../output";

export function registerExportCommand(program: Command): void {
  program
    .command("export <file>")
    .description("Write the catalog to another JSON or YAML file")
    .action((file: string, _opts: Record<string, never>, cmd: Command) => {
      const catalog = openCatalog(cmd.optsWithGlobals<GlobalOptions>());
      const target = path.resolve(file);

      if (target === catalog.path) {
        throw new CliError("Export target is the catalog file itself.");
      }

      const records = catalog.list();
      saveRecords(target, records);
      printSuccess(`Exported ${records.length} record(s) to ${target}`);
    });
}
