/**
 * Shelfkeep CLI — Import Command
 *
 * Adds every record from another catalog file (JSON or YAML).
 * Every incoming record is validated before the first one is added.
 * Records whose id is already taken are skipped with a warning; with
 * --strict any clash aborts the import before anything is added.
 *
 * Usage:
 *   shelf import <file>
 *   shelf import <file> --strict
 */

import * as fs from "fs";
import * as path from "path";
import { Command } from "commander";
import {
  DuplicateIdentifierError,
  InvalidRecordError,
  loadRecords,
  validateRecord,
} from "@shelfkeep/catalog";
import { GlobalOptions, openCatalog } from "../config";
import { CliError } from "../errors";
import { colors, printDebug, printInfo, printSuccess, printWarn } from "../output";

export function registerImportCommand(program: Command): void {
  program
    .command("import <file>")
    .description("Add the records of another catalog file")
    .option("--strict", "Fail if any identifier is already taken", false)
    .action((file: string, opts: { strict: boolean }, cmd: Command) => {
      const source = path.resolve(file);
      if (!fs.existsSync(source)) {
        throw new CliError(`File not found: ${source}`);
      }

      const incoming = loadRecords(source);
      const catalog = openCatalog(cmd.optsWithGlobals<GlobalOptions>());
      printDebug(`Read ${incoming.length} record(s) from ${source}`);

      for (const record of incoming) {
        const validation = validateRecord(record);
        if (!validation.valid) {
          throw new InvalidRecordError(record.id, validation.errors);
        }
        if (opts.strict && catalog.has(record.id)) {
          throw new DuplicateIdentifierError(record.id);
        }
      }

      let added = 0;
      for (const record of incoming) {
        if (catalog.has(record.id)) {
          printWarn(`Skipped ${colors.app(record.id)}: id already in catalog`);
          continue;
        }
        catalog.add(record);
        added++;
      }

      const skipped = incoming.length - added;
      if (added === 0) {
        printInfo(`Nothing imported from ${source}.`);
      } else {
        printSuccess(
          `Imported ${added} record(s) from ${source}` + (skipped > 0 ? ` (${skipped} skipped)` : ""),
        );
      }
    });
}
