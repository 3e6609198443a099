/**
 * Shelfkeep Catalog — File Store
 *
 * Reads and writes a whole catalog as one document: a top-level array of
 * stored records. Files ending in .yaml or .yml are YAML, anything else
 * is JSON.
 *
 * Writes go to a sibling temporary file which is then renamed over the
 * target, so a failed write leaves the previous file in place.
 */

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { decodeStoredRecord, encodeRecord } from "./codec";
import {
  describeError,
  StorageReadError,
  StorageWriteError,
  UnrecognizedTypeError,
} from "./errors";
import { isRecordType, LibraryRecord } from "./records";
import {
  formatValidationErrors,
  getRecordValidator,
  validateStoredRecord,
  ValidationResult,
} from "./validator";

/** The durable side of a catalog */
export interface RecordStore {
  load(filePath: string): LibraryRecord[];
  save(filePath: string, records: readonly LibraryRecord[]): void;
}

export type StoreFormat = "json" | "yaml";

/** Per-element outcome of inspectRecords() */
export interface RecordInspection {
  index: number;
  /** The element's id, when it has a string one */
  id?: string;
  result: ValidationResult;
}

export function formatForPath(filePath: string): StoreFormat {
  const ext = path.extname(filePath).toLowerCase();
  return ext === ".yaml" || ext === ".yml" ? "yaml" : "json";
}

/**
 * Load every record in a catalog file. A missing or empty file is an
 * empty catalog. Fails on the first element that cannot be decoded or
 * that repeats an earlier id.
 */
export function loadRecords(filePath: string): LibraryRecord[] {
  const elements = readDocument(filePath);
  const seen = new Set<string>();

  return elements.map((element, index) => {
    if (typeof element !== "object" || element === null || Array.isArray(element)) {
      throw new StorageReadError(filePath, `element ${index} is not an object`);
    }

    const tag: unknown = "type" in element ? element.type : undefined;
    if (!isRecordType(tag)) {
      throw new UnrecognizedTypeError(tag, index);
    }

    const validate = getRecordValidator(tag);
    if (!validate(element)) {
      const result = validateStoredRecord(element);
      throw new StorageReadError(
        filePath,
        `element ${index} is malformed (${formatValidationErrors(result.errors)})`,
      );
    }
    const record = decodeStoredRecord(element);
    if (seen.has(record.id)) {
      throw new StorageReadError(filePath, `element ${index} repeats id "${record.id}"`);
    }
    seen.add(record.id);
    return record;
  });
}

/**
 * Replace the content of a catalog file with `records`.
 */
export function saveRecords(filePath: string, records: readonly LibraryRecord[]): void {
  const stored = records.map(encodeRecord);
  const content =
    formatForPath(filePath) === "yaml"
      ? stringifyYaml(stored)
      : JSON.stringify(stored, null, 2) + "\n";

  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(tmpPath, content, "utf-8");
    fs.renameSync(tmpPath, filePath);
  } catch (err: unknown) {
    if (fs.existsSync(tmpPath)) fs.rmSync(tmpPath, { force: true });
    throw new StorageWriteError(filePath, describeError(err), err);
  }
}

/**
 * Validate every element of a catalog file without stopping at the first
 * bad one. Unreadable or unparsable files still throw StorageReadError.
 */
export function inspectRecords(filePath: string): RecordInspection[] {
  return readDocument(filePath).map((element, index) => {
    const id =
      typeof element === "object" && element !== null && "id" in element && typeof element.id === "string"
        ? element.id
        : undefined;

    return {
      index,
      ...(id === undefined ? {} : { id }),
      result: validateStoredRecord(element),
    };
  });
}

/** Store backed by catalog files on the local filesystem */
export const fileStore: RecordStore = {
  load: loadRecords,
  save: saveRecords,
};

// ─── Private ────────────────────────────────────────────────

function readDocument(filePath: string): unknown[] {
  if (!fs.existsSync(filePath)) return [];

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err: unknown) {
    throw new StorageReadError(filePath, describeError(err), err);
  }

  if (content.trim().length === 0) return [];

  let document: unknown;
  try {
    document = formatForPath(filePath) === "yaml" ? parseYaml(content) : JSON.parse(content);
  } catch (err: unknown) {
    throw new StorageReadError(filePath, `not valid ${formatForPath(filePath).toUpperCase()} (${describeError(err)})`, err);
  }

  if (!Array.isArray(document)) {
    throw new StorageReadError(filePath, "document is not a list of records");
  }
  return document;
}
