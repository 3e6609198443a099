/**
 * Shelfkeep Catalog — Record Codec
 *
 * Converts between in-memory records and the snake_case shape written to
 * catalog files. Each variant lists its own fields; the switches are
 * exhaustive so a new variant fails to compile until it is handled here.
 */

import type {
  AudioRecord,
  ElectronicRecord,
  LibraryRecord,
  PrintedRecord,
  RecordType,
} from "./records";

// ─── Stored Shapes ───────────────────────────────────────────────

export interface StoredBase {
  type: RecordType;
  id: string;
  title: string;
  author: string;
  isbn: string;
  page_count: number | null;
}

export interface StoredPrinted extends StoredBase {
  type: "Printed";
}

export interface StoredElectronic extends StoredBase {
  type: "Electronic";
  file_size_mb: number;
  file_format: string;
}

export interface StoredAudio extends StoredBase {
  type: "Audio";
  duration_minutes: number;
  narrator: string;
}

export type StoredRecord = StoredPrinted | StoredElectronic | StoredAudio;

// ─── Encode ──────────────────────────────────────────────────────

function encodeBase(record: LibraryRecord): Omit<StoredBase, "type"> {
  return {
    id: record.id,
    title: record.title,
    author: record.author,
    isbn: record.isbn,
    page_count: record.pageCount ?? null,
  };
}

export function encodeRecord(record: LibraryRecord): StoredRecord {
  switch (record.type) {
    case "Printed":
      return { type: "Printed", ...encodeBase(record) };
    case "Electronic":
      return {
        type: "Electronic",
        ...encodeBase(record),
        file_size_mb: record.fileSizeMb,
        file_format: record.fileFormat,
      };
    case "Audio":
      return {
        type: "Audio",
        ...encodeBase(record),
        duration_minutes: record.durationMinutes,
        narrator: record.narrator,
      };
    default:
      return assertNever(record);
  }
}

// ─── Decode ──────────────────────────────────────────────────────

/**
 * Build a record from an already validated stored shape.
 * A null page count becomes an absent one.
 */
export function decodeStoredRecord(stored: StoredRecord): LibraryRecord {
  const base = {
    id: stored.id,
    title: stored.title,
    author: stored.author,
    isbn: stored.isbn,
    ...(stored.page_count === null ? {} : { pageCount: stored.page_count }),
  };

  switch (stored.type) {
    case "Printed": {
      const record: PrintedRecord = { type: "Printed", ...base };
      return record;
    }
    case "Electronic": {
      const record: ElectronicRecord = {
        type: "Electronic",
        ...base,
        fileSizeMb: stored.file_size_mb,
        fileFormat: stored.file_format,
      };
      return record;
    }
    case "Audio": {
      const record: AudioRecord = {
        type: "Audio",
        ...base,
        durationMinutes: stored.duration_minutes,
        narrator: stored.narrator,
      };
      return record;
    }
    default:
      return assertNever(stored);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled record variant: ${JSON.stringify(value)}`);
}
