/**
 * Shelfkeep Catalog — Record Types
 *
 * A catalog holds three kinds of item, modelled as a closed union
 * discriminated by `type`. Records are plain immutable values: the
 * catalog only changes which records it holds, never their fields.
 */

// ─── Record Variants ─────────────────────────────────────────────

export type RecordType = "Printed" | "Electronic" | "Audio";

export const RECORD_TYPES: readonly RecordType[] = [
  "Printed",
  "Electronic",
  "Audio",
];

/** Fields shared by every variant */
export interface BaseRecord {
  /** Unique within a catalog */
  readonly id: string;
  readonly title: string;
  readonly author: string;
  /** Standard number, usually an ISBN. May be empty. */
  readonly isbn: string;
  /** Absent for items that have no pages */
  readonly pageCount?: number;
}

export interface PrintedRecord extends BaseRecord {
  readonly type: "Printed";
}

export interface ElectronicRecord extends BaseRecord {
  readonly type: "Electronic";
  readonly fileSizeMb: number;
  /** e.g. EPUB, PDF, MOBI */
  readonly fileFormat: string;
}

export interface AudioRecord extends BaseRecord {
  readonly type: "Audio";
  readonly durationMinutes: number;
  readonly narrator: string;
}

export type LibraryRecord = PrintedRecord | ElectronicRecord | AudioRecord;

// ─── Factories ───────────────────────────────────────────────────

export function createPrinted(fields: Omit<PrintedRecord, "type">): PrintedRecord {
  return { type: "Printed", ...fields };
}

export function createElectronic(
  fields: Omit<ElectronicRecord, "type">,
): ElectronicRecord {
  return { type: "Electronic", ...fields };
}

export function createAudio(fields: Omit<AudioRecord, "type">): AudioRecord {
  return { type: "Audio", ...fields };
}

// ─── Type Tags ───────────────────────────────────────────────────

export function isRecordType(value: unknown): value is RecordType {
  return typeof value === "string" && (RECORD_TYPES as readonly string[]).includes(value);
}

/** Names accepted from users, lower-cased */
const TYPE_ALIASES: Record<string, RecordType> = {
  printed: "Printed",
  book: "Printed",
  electronic: "Electronic",
  ebook: "Electronic",
  audio: "Audio",
  audiobook: "Audio",
};

/**
 * Map a user-supplied type name (case-insensitive) to its tag.
 * Returns undefined for names that match no variant.
 */
export function parseRecordType(name: string): RecordType | undefined {
  return TYPE_ALIASES[name.trim().toLowerCase()];
}
