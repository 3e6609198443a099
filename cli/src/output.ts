/**
 * Shelfkeep CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, tables, record
 * details and error reports. Uses chalk (v4, CommonJS compatible) for
 * ANSI colors and cli-table3 for tabular data.
 *
 * All user-visible output flows through this module.
 */

import chalk from "chalk";
import Table from "cli-table3";
import {
  CatalogError,
  CatalogErrorCode,
  describeError,
  encodeRecord,
  LibraryRecord,
  RecordType,
} from "@shelfkeep/catalog";

// ─── Debug Mode ─────────────────────────────────────────────

let _debugMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
  app: chalk.bold.white,
  muted: chalk.gray,
};

// ─── Symbols ────────────────────────────────────────────────

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
  warn: chalk.yellow("\u26A0"), // ⚠
  info: chalk.cyan("\u2139"), // ℹ
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.log(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

export function printWarn(msg: string): void {
  console.log(`${symbols.warn}  ${msg}`);
}

export function printInfo(msg: string): void {
  console.log(`${symbols.info} ${msg}`);
}

/**
 * Print a debug message. Only visible with --debug flag.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.log(colors.muted(`  [debug] ${msg}`));
  }
}

/**
 * Print an indented detail line.
 */
export function printDetail(label: string, value: string): void {
  console.log(`  ${colors.dim(label + ":")} ${value}`);
}

/**
 * Print a per-item check line, e.g. "  ✔ b1".
 */
export function printStageSuccess(msg: string): void {
  console.log(`  ${symbols.success} ${msg}`);
}

export function printStageError(msg: string): void {
  console.log(`  ${symbols.error} ${msg}`);
}

/**
 * Print records in their stored form as a JSON array.
 */
export function printJson(records: readonly LibraryRecord[]): void {
  console.log(JSON.stringify(records.map(encodeRecord), null, 2));
}

// ─── Record Formatting ──────────────────────────────────────

const RECORD_LABELS: Record<RecordType, string> = {
  Printed: "Book",
  Electronic: "E-book",
  Audio: "Audiobook",
};

const RECORD_COLORS: Record<RecordType, chalk.Chalk> = {
  Printed: chalk.yellow,
  Electronic: chalk.blue,
  Audio: chalk.magenta,
};

export function formatRecordType(type: RecordType): string {
  return RECORD_COLORS[type](RECORD_LABELS[type]);
}

/**
 * Running time: "45 min" under an hour, "11h 0m" otherwise.
 */
export function formatMinutes(minutes: number): string {
  const total = Math.round(minutes);
  if (total < 60) return `${total} min`;
  return `${Math.floor(total / 60)}h ${total % 60}m`;
}

export function formatSize(megabytes: number): string {
  return `${megabytes.toFixed(1)} MB`;
}

/**
 * One-line summary of the variant-specific fields.
 */
export function formatRecordDetails(record: LibraryRecord): string {
  switch (record.type) {
    case "Printed":
      return record.pageCount === undefined ? "-" : `${record.pageCount} pages`;
    case "Electronic":
      return `${record.fileFormat}, ${formatSize(record.fileSizeMb)}`;
    case "Audio":
      return `${formatMinutes(record.durationMinutes)}, read by ${record.narrator}`;
  }
}

/**
 * Print every field of one record.
 */
export function printRecord(record: LibraryRecord): void {
  console.log(`${colors.app(record.title)} ${colors.dim(`(${record.id})`)}`);
  printDetail("Type", formatRecordType(record.type));
  printDetail("Author", record.author || "-");
  printDetail("ISBN", record.isbn || "-");
  printDetail("Pages", record.pageCount === undefined ? "-" : String(record.pageCount));

  switch (record.type) {
    case "Electronic":
      printDetail("Format", record.fileFormat);
      printDetail("Size", formatSize(record.fileSizeMb));
      break;
    case "Audio":
      printDetail("Duration", formatMinutes(record.durationMinutes));
      printDetail("Narrator", record.narrator);
      break;
    case "Printed":
      break;
  }
}

/**
 * Print records as an adaptive table.
 */
export function printRecordTable(records: readonly LibraryRecord[]): void {
  printAdaptiveTable({
    columns: [
      { header: "ID", minWidth: 8 },
      { header: "Type", minWidth: 9 },
      { header: "Title", minWidth: 12, flexible: true },
      { header: "Author", minWidth: 14 },
      { header: "Details", minWidth: 16 },
    ],
    rows: records.map((r) => [
      colors.app(r.id),
      formatRecordType(r.type),
      r.title,
      r.author,
      formatRecordDetails(r),
    ]),
  });
}

// ─── Errors ─────────────────────────────────────────────────

const ERROR_LABELS: Record<CatalogErrorCode, string> = {
  DUPLICATE_IDENTIFIER: "Duplicate identifier",
  INVALID_RECORD: "Invalid record",
  UNRECOGNIZED_TYPE: "Unrecognized record type",
  STORAGE_READ_FAILURE: "Catalog file could not be read",
  STORAGE_WRITE_FAILURE: "Catalog file could not be written",
};

export function formatErrorCode(code: CatalogErrorCode): string {
  return ERROR_LABELS[code];
}

/**
 * Print an error that reached the entry point.
 */
export function reportError(err: unknown): void {
  if (err instanceof CatalogError) {
    printError(`${formatErrorCode(err.code)}: ${err.message}`);
  } else {
    printError(describeError(err));
  }
  if (err instanceof Error && err.stack) {
    printDebug(err.stack);
  }
}

// ─── Tables ─────────────────────────────────────────────────

/** Minimum terminal width below which we switch to compact (no-table) layout */
const MIN_TABLE_WIDTH = 70;

/** Default terminal width when process.stdout.columns is unavailable */
const DEFAULT_TERMINAL_WIDTH = 80;

/**
 * Detect whether to use ASCII-only box drawing characters.
 * On Windows cmd/PowerShell without TERM set, Unicode borders corrupt.
 */
export function shouldUseAsciiBorders(): boolean {
  return process.platform === "win32" && !process.env.TERM;
}

/**
 * Get the usable terminal width in columns.
 */
export function getTerminalWidth(): number {
  return process.stdout.columns || DEFAULT_TERMINAL_WIDTH;
}

/**
 * Strip ANSI escape codes to get the visible text of a string.
 */
export function stripAnsi(s: string): string {
  // eslint-disable-next-line no-control-regex
  return s.replace(/\u001b\[[0-9;]*m/g, "");
}

/**
 * Pad or truncate a (possibly ANSI-colored) string to exactly `width`
 * visible characters. Truncates with "..." if over; right-pads if under.
 */
export function fitToWidth(s: string, width: number): string {
  const visible = stripAnsi(s);
  if (visible.length <= width) {
    return s + " ".repeat(width - visible.length);
  }
  // Truncate character by character, keeping escape sequences intact
  const RESET = "\u001b[0m";
  let out = "";
  let visCount = 0;
  const target = width - 3; // leave room for "..."
  let i = 0;
  while (i < s.length && visCount < target) {
    if (s[i] === "\u001b") {
      const end = s.indexOf("m", i);
      if (end !== -1) {
        out += s.slice(i, end + 1);
        i = end + 1;
        continue;
      }
    }
    out += s[i];
    visCount++;
    i++;
  }
  return out + RESET + "...";
}

export interface TableColumn {
  /** Header label */
  header: string;
  /** Minimum column width (content area, excluding borders) */
  minWidth?: number;
  /**
   * If true, this column absorbs remaining space and shrinks first
   * when the terminal is narrow. Only one column should be flexible.
   */
  flexible?: boolean;
}

export interface AdaptiveTableOptions {
  columns: TableColumn[];
  /**
   * Row data; each inner array must match columns.length.
   * Values may contain ANSI color codes.
   */
  rows: string[][];
}

export interface CompactItem {
  /** Primary label displayed as the heading line */
  label: string;
  /** Key-value pairs displayed indented below the label */
  fields: { key: string; value: string }[];
}

/**
 * Calculate cli-table3 colWidths that fit within `termWidth`.
 *
 * Every column starts at its minWidth (default 8); the flexible column
 * takes whatever is left, never less than its own minimum. colWidths
 * include 2 chars of padding, and N columns have N+1 border chars.
 */
export function calculateColWidths(columns: TableColumn[], termWidth: number): number[] {
  const borderOverhead = columns.length + 1;
  const paddingPerCol = 2;
  const available = termWidth - borderOverhead;

  const minWidths = columns.map((c) => Math.max(c.minWidth ?? 8, 4));
  const flexIdx = columns.findIndex((c) => c.flexible);

  const fixedSum = minWidths.reduce(
    (sum, w, i) => sum + (i === flexIdx ? 0 : w + paddingPerCol),
    0,
  );

  const widths = minWidths.map((min, i) => {
    if (i === flexIdx) {
      const remaining = available - fixedSum - paddingPerCol;
      return Math.max(remaining, min);
    }
    return min;
  });

  return widths.map((w) => w + paddingPerCol);
}

const ASCII_CHARS = {
  top: "-",
  "top-mid": "+",
  "top-left": "+",
  "top-right": "+",
  bottom: "-",
  "bottom-mid": "+",
  "bottom-left": "+",
  "bottom-right": "+",
  left: "|",
  "left-mid": "+",
  mid: "-",
  "mid-mid": "+",
  right: "|",
  "right-mid": "+",
  middle: "|",
};

/**
 * Print a table that adapts to terminal width.
 *
 * - Wide terminal  → bordered table with dynamic column sizing
 * - Narrow terminal (<70 cols) → compact card-style layout
 * - Windows cmd without TERM → ASCII borders instead of Unicode
 * - Content that exceeds column width → truncated with "...", never wraps
 */
export function printAdaptiveTable(opts: AdaptiveTableOptions): void {
  const termWidth = getTerminalWidth();
  const { columns, rows } = opts;

  if (termWidth < MIN_TABLE_WIDTH) {
    printCompactList(
      rows.map((row) => ({
        label: stripAnsi(row[0]),
        fields: columns.slice(1).map((col, i) => ({
          key: col.header,
          value: row[i + 1],
        })),
      })),
    );
    return;
  }

  const colWidths = calculateColWidths(columns, termWidth);
  const contentWidths = colWidths.map((w) => w - 2);
  const ascii = shouldUseAsciiBorders();

  const table = new Table({
    head: columns.map((c) => chalk.bold.cyan(c.header)),
    colWidths,
    style: { head: [], border: ascii ? [] : ["gray"] },
    wordWrap: false,
    ...(ascii ? { chars: ASCII_CHARS } : {}),
  });
  for (const row of rows) {
    table.push(row.map((cell, i) => fitToWidth(cell, contentWidths[i])));
  }
  console.log(table.toString());
}

/**
 * Print a compact card-style list for narrow terminals.
 *
 * Example:
 *   b1
 *     Type:    Book
 *     Title:   Dune
 *     Details: 412 pages
 */
export function printCompactList(items: CompactItem[]): void {
  for (const item of items) {
    console.log(colors.app(item.label));
    const maxKeyLen = Math.max(...item.fields.map((f) => f.key.length));
    for (const f of item.fields) {
      const padded = f.key.padEnd(maxKeyLen);
      console.log(`  ${colors.dim(padded + ":")} ${f.value}`);
    }
    console.log();
  }
}
