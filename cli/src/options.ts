/**
 * Shelfkeep CLI — Option Parsing
 *
 * Commander argument parsers and the mapping from `shelf add` options to
 * a record of the requested variant.
 */

import { InvalidArgumentError } from "commander";
import { v4 as uuidv4 } from "uuid";
import { LibraryRecord, parseRecordType, RecordType } from "@shelfkeep/catalog";
import { CliError } from "./errors";

export interface RecordOptions {
  id?: string;
  title: string;
  author: string;
  isbn: string;
  pages?: number;
  size?: number;
  format?: string;
  duration?: number;
  narrator?: string;
}

/** Non-negative whole number, e.g. a page count */
export function parseCount(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n)) {
    throw new InvalidArgumentError("Must be a non-negative whole number.");
  }
  return n;
}

/** Non-negative decimal, e.g. megabytes or minutes */
export function parseAmount(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError("Must be a non-negative number.");
  }
  return n;
}

/**
 * Map a user-supplied type name to its tag, or fail with a usage error.
 */
export function requireRecordType(name: string): RecordType {
  const type = parseRecordType(name);
  if (!type) {
    throw new CliError(
      `Unknown record type "${name}". Use printed (book), electronic (ebook) or audio (audiobook).`,
    );
  }
  return type;
}

/**
 * Build a record of the named type from `shelf add` options.
 * Variant options must match the type: --size/--format for electronic,
 * --duration/--narrator for audio.
 */
export function buildRecord(
  typeName: string,
  opts: RecordOptions,
  generateId: () => string = uuidv4,
): LibraryRecord {
  const type = requireRecordType(typeName);
  const base = {
    id: opts.id ?? generateId(),
    title: opts.title,
    author: opts.author,
    isbn: opts.isbn,
    ...(opts.pages === undefined ? {} : { pageCount: opts.pages }),
  };

  switch (type) {
    case "Printed":
      rejectOptions(type, opts, ["size", "format", "duration", "narrator"]);
      return { type, ...base };
    case "Electronic":
      rejectOptions(type, opts, ["duration", "narrator"]);
      if (opts.size === undefined || opts.format === undefined) {
        throw new CliError("Electronic records need --size <mb> and --format <format>.");
      }
      return { type, ...base, fileSizeMb: opts.size, fileFormat: opts.format };
    case "Audio":
      rejectOptions(type, opts, ["size", "format"]);
      if (opts.duration === undefined || opts.narrator === undefined) {
        throw new CliError("Audio records need --duration <minutes> and --narrator <name>.");
      }
      return { type, ...base, durationMinutes: opts.duration, narrator: opts.narrator };
  }
}

function rejectOptions(
  type: RecordType,
  opts: RecordOptions,
  names: readonly ("size" | "format" | "duration" | "narrator")[],
): void {
  const given = names.filter((name) => opts[name] !== undefined);
  if (given.length > 0) {
    const flags = given.map((name) => `--${name}`).join(", ");
    throw new CliError(`${flags} cannot be used with ${type} records.`);
  }
}
