/**
 * Shelfkeep Catalog — Catalog
 *
 * An ordered, in-memory collection of records mirrored to one file.
 * The file is read once on construction and rewritten in full after
 * every mutation; reads never touch the disk.
 *
 * Mutations are write-before-commit: the next collection is saved first
 * and only replaces the in-memory one once the save succeeded. A failed
 * save therefore leaves both memory and disk as they were.
 */

import {
  CatalogError,
  describeError,
  DuplicateIdentifierError,
  InvalidRecordError,
  StorageWriteError,
} from "./errors";
import { createLogger, Logger } from "./logger";
import type { LibraryRecord, RecordType } from "./records";
import { fileStore, RecordStore } from "./storage";
import { validateRecord } from "./validator";

export interface CatalogOptions {
  /** Where records are loaded from and saved to (default: fileStore) */
  store: RecordStore;
  logger: Logger;
}

export class Catalog {
  private readonly storagePath: string;
  private readonly store: RecordStore;
  private readonly logger: Logger;
  private records: readonly LibraryRecord[];

  constructor(storagePath: string, options: Partial<CatalogOptions> = {}) {
    this.storagePath = storagePath;
    this.store = options.store ?? fileStore;
    this.logger = options.logger ?? createLogger();
    this.records = this.load();
  }

  /**
   * Path of the backing file.
   */
  get path(): string {
    return this.storagePath;
  }

  /**
   * Number of records in the catalog.
   */
  get size(): number {
    return this.records.length;
  }

  /**
   * Append a record. Its id must not be in use.
   */
  add(record: LibraryRecord): void {
    if (this.has(record.id)) {
      throw new DuplicateIdentifierError(record.id);
    }

    const validation = validateRecord(record);
    if (!validation.valid) {
      throw new InvalidRecordError(record.id, validation.errors);
    }

    this.commit([...this.records, record]);
    this.logger.debug({ id: record.id, type: record.type }, "Record added");
  }

  /**
   * Remove the record with `id`. Removing an id that is not present
   * does nothing and returns false.
   */
  remove(id: string): boolean {
    const record = this.find(id);
    if (!record) return false;

    this.commit(this.records.filter((r) => r !== record));
    this.logger.debug({ id }, "Record removed");
    return true;
  }

  /**
   * Get the record with `id`, or undefined.
   */
  find(id: string): LibraryRecord | undefined {
    return this.records.find((r) => r.id === id);
  }

  /**
   * Check if a record exists in the catalog.
   */
  has(id: string): boolean {
    return this.find(id) !== undefined;
  }

  /**
   * Records whose title or author contains `query`, ignoring case.
   * An empty query matches every record.
   */
  search(query: string): LibraryRecord[] {
    const q = query.toLowerCase();
    return this.records.filter(
      (r) => r.title.toLowerCase().includes(q) || r.author.toLowerCase().includes(q),
    );
  }

  /**
   * Records of one variant, in catalog order.
   */
  filterByType(type: RecordType): LibraryRecord[] {
    return this.records.filter((r) => r.type === type);
  }

  /**
   * All records in insertion order. The returned array is a copy.
   */
  list(): LibraryRecord[] {
    return [...this.records];
  }

  /**
   * Discard the in-memory collection and read the file again.
   */
  refresh(): LibraryRecord[] {
    this.records = this.load();
    return this.list();
  }

  // ─── Private ────────────────────────────────────────────────

  private load(): LibraryRecord[] {
    const records = this.store.load(this.storagePath);
    this.logger.debug({ path: this.storagePath, count: records.length }, "Catalog loaded");
    return records;
  }

  /**
   * Save `next`, then make it the current collection.
   */
  private commit(next: readonly LibraryRecord[]): void {
    try {
      this.store.save(this.storagePath, next);
    } catch (err: unknown) {
      this.logger.error({ path: this.storagePath, err }, "Catalog save failed");
      if (err instanceof CatalogError) throw err;
      throw new StorageWriteError(this.storagePath, describeError(err), err);
    }

    this.records = next;
    this.logger.debug({ path: this.storagePath, count: next.length }, "Catalog saved");
  }
}
