/**
 * Shelfkeep CLI — Check Command
 *
 * Validates every record of a catalog file and reports all problems,
 * where loading would stop at the first one. Also reports identifiers
 * used more than once.
 *
 * Usage:
 *   shelf check              Check the configured catalog
 *   shelf check <file>       Check another file
 *
 * Exits with status 1 when any record is invalid.
 */

import * as path from "path";
import { Command } from "commander";
import { inspectRecords } from "@shelfkeep/catalog";
import { GlobalOptions, resolveLibraryPath } from "../config";
import { CliError } from "../errors";
import { colors, printInfo, printStageError, printStageSuccess } from "../output";

export function registerCheckCommand(program: Command): void {
  program
    .command("check [file]")
    .description("Validate every record in a catalog file")
    .action((file: string | undefined, _opts: Record<string, never>, cmd: Command) => {
      const target = file ? path.resolve(file) : resolveLibraryPath(cmd.optsWithGlobals<GlobalOptions>());
      const report = inspectRecords(target);

      printInfo(`Checking ${target}\n`);

      const seen = new Set<string>();
      let failures = 0;
      for (const entry of report) {
        const label = entry.id ?? `#${entry.index}`;
        const duplicate = entry.id !== undefined && seen.has(entry.id);
        if (entry.id !== undefined) seen.add(entry.id);

        if (entry.result.valid && !duplicate) {
          printStageSuccess(label);
          continue;
        }

        failures++;
        printStageError(label);
        for (const error of entry.result.errors) {
          console.log(`    - [${error.rule}] ${error.path}: ${error.message}`);
        }
        if (duplicate) {
          console.log(`    - [catalog:duplicate-id] /id: ${colors.app(label)} is used by an earlier record`);
        }
      }

      console.log(`\n${report.length} record(s) checked.`);
      if (failures > 0) {
        throw new CliError(`${failures} record(s) have errors.`);
      }
      printInfo("All records are valid.");
    });
}
