/**
 * Shelfkeep CLI — Add Command
 *
 * Adds one record to the catalog.
 *
 * Usage:
 *   shelf add book -t "Dune" -a "Frank Herbert" --isbn 978-0441013593 -p 412
 *   shelf add ebook -t "Dune" -a "Frank Herbert" --size 3.2 --format EPUB
 *   shelf add audiobook -t "The Hobbit" -a "J.R.R. Tolkien" --duration 660 --narrator "..."
 *
 * Without --id a random identifier is generated.
 */

import { Command } from "commander";
import { GlobalOptions, openCatalog } from "../config";
import { buildRecord, parseAmount, parseCount, RecordOptions } from "../options";
import { colors, formatRecordType, printSuccess } from "../output";

export function registerAddCommand(program: Command): void {
  program
    .command("add <type>")
    .description("Add a record (type: printed|book, electronic|ebook, audio|audiobook)")
    .option("--id <id>", "Record identifier (default: generated)")
    .requiredOption("-t, --title <title>", "Title")
    .requiredOption("-a, --author <author>", "Author")
    .option("--isbn <isbn>", "ISBN or other standard number", "")
    .option("-p, --pages <count>", "Page count", parseCount)
    .option("--size <mb>", "File size in megabytes (electronic)", parseAmount)
    .option("--format <format>", "File format, e.g. EPUB or PDF (electronic)")
    .option("--duration <minutes>", "Running time in minutes (audio)", parseAmount)
    .option("--narrator <name>", "Narrator (audio)")
    .action((typeName: string, opts: RecordOptions, cmd: Command) => {
      const record = buildRecord(typeName, opts);
      const catalog = openCatalog(cmd.optsWithGlobals<GlobalOptions>());

      catalog.add(record);
      printSuccess(
        `Added ${formatRecordType(record.type)} ${colors.app(record.id)}: ${record.title}`,
      );
    });
}
