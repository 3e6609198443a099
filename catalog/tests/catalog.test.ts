/**
 * Shelfkeep Catalog — Catalog Tests
 *
 * Covers the add/remove/find/search/list operations, the write-before-commit
 * policy, and persistence across instances.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as path from "path";
import {
  Catalog,
  createLogger,
  createPrinted,
  DuplicateIdentifierError,
  InvalidRecordError,
  LibraryRecord,
  RecordStore,
  saveRecords,
  StorageReadError,
  StorageWriteError,
} from "../src";
import { duneEbook, duneHardcover, hobbitAudio, makeTempDir } from "./helpers";

/** In-memory store that can be told to fail the next save */
class MemoryStore implements RecordStore {
  saved: LibraryRecord[] = [];
  saves = 0;
  failWith: unknown = null;

  constructor(initial: LibraryRecord[] = []) {
    this.saved = [...initial];
  }

  load(): LibraryRecord[] {
    return [...this.saved];
  }

  save(_filePath: string, records: readonly LibraryRecord[]): void {
    if (this.failWith !== null) throw this.failWith;
    this.saves++;
    this.saved = [...records];
  }
}

describe("Catalog", () => {
  let dir: string;
  let file: string;
  let catalog: Catalog;

  beforeEach(() => {
    dir = makeTempDir("catalog");
    file = path.join(dir, "library.json");
    catalog = new Catalog(file);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("construction", () => {
    it("starts empty when the file does not exist", () => {
      expect(catalog.size).toBe(0);
      expect(catalog.list()).toEqual([]);
      expect(fs.existsSync(file)).toBe(false);
    });

    it("exposes the storage path", () => {
      expect(catalog.path).toBe(file);
    });

    it("loads records written by an earlier instance", () => {
      catalog.add(duneHardcover());
      catalog.add(hobbitAudio());

      const reopened = new Catalog(file);
      expect(reopened.list()).toEqual([duneHardcover(), hobbitAudio()]);
    });

    it("refuses a file in which two records share an id", () => {
      saveRecords(file, [duneHardcover(), duneHardcover({ title: "Copy" })]);

      expect(() => new Catalog(file)).toThrow(StorageReadError);
      expect(() => new Catalog(file)).toThrow('element 1 repeats id "b1"');
    });
  });

  describe("add", () => {
    it("appends records in insertion order", () => {
      catalog.add(duneHardcover());
      catalog.add(duneEbook());
      catalog.add(hobbitAudio());

      expect(catalog.size).toBe(3);
      expect(catalog.list().map((r) => r.id)).toEqual(["b1", "e1", "a1"]);
    });

    it("writes the whole collection to disk", () => {
      catalog.add(duneHardcover());
      catalog.add(duneEbook());

      const stored = JSON.parse(fs.readFileSync(file, "utf-8"));
      expect(stored.map((r: { id: string }) => r.id)).toEqual(["b1", "e1"]);
    });

    it("rejects a duplicate identifier and keeps the first record", () => {
      catalog.add(duneHardcover());
      const before = fs.readFileSync(file, "utf-8");

      expect(() => catalog.add(hobbitAudio({ id: "b1" }))).toThrow(DuplicateIdentifierError);
      expect(catalog.list()).toEqual([duneHardcover()]);
      expect(fs.readFileSync(file, "utf-8")).toBe(before);
    });

    it("reports the clashing identifier", () => {
      catalog.add(duneHardcover());
      try {
        catalog.add(duneHardcover());
        expect.fail("expected DuplicateIdentifierError");
      } catch (err) {
        expect(err).toBeInstanceOf(DuplicateIdentifierError);
        if (err instanceof DuplicateIdentifierError) {
          expect(err.identifier).toBe("b1");
          expect(err.code).toBe("DUPLICATE_IDENTIFIER");
          expect(err.message).toBe('Record with id "b1" already exists');
        }
      }
    });

    it("accepts a record with an empty title", () => {
      catalog.add(duneHardcover({ title: "" }));

      expect(catalog.find("b1")?.title).toBe("");
      expect(new Catalog(file).list()).toEqual([duneHardcover({ title: "" })]);
    });

    it("rejects an invalid record without writing", () => {
      const bad = createPrinted({ id: "x1", title: "Broken", author: "A", isbn: "", pageCount: -3 });

      expect(() => catalog.add(bad)).toThrow(InvalidRecordError);
      expect(catalog.size).toBe(0);
      expect(fs.existsSync(file)).toBe(false);
    });
  });

  describe("remove", () => {
    beforeEach(() => {
      catalog.add(duneHardcover());
      catalog.add(duneEbook());
    });

    it("removes a present record and persists the change", () => {
      expect(catalog.remove("b1")).toBe(true);

      expect(catalog.size).toBe(1);
      expect(catalog.find("b1")).toBeUndefined();
      expect(new Catalog(file).list()).toEqual([duneEbook()]);
    });

    it("is a no-op for an absent identifier", () => {
      const before = fs.readFileSync(file, "utf-8");

      expect(catalog.remove("missing")).toBe(false);
      expect(catalog.list()).toEqual([duneHardcover(), duneEbook()]);
      expect(fs.readFileSync(file, "utf-8")).toBe(before);
    });
  });

  describe("find", () => {
    it("returns the matching record", () => {
      catalog.add(duneHardcover());
      catalog.add(hobbitAudio());

      expect(catalog.find("a1")).toEqual(hobbitAudio());
      expect(catalog.has("a1")).toBe(true);
    });

    it("returns undefined when nothing matches", () => {
      expect(catalog.find("nope")).toBeUndefined();
      expect(catalog.has("nope")).toBe(false);
    });
  });

  describe("search", () => {
    beforeEach(() => {
      catalog.add(duneHardcover());
      catalog.add(hobbitAudio());
      catalog.add(duneEbook());
    });

    it("matches titles ignoring case, in catalog order", () => {
      expect(catalog.search("dune").map((r) => r.id)).toEqual(["b1", "e1"]);
    });

    it("matches authors ignoring case", () => {
      const lower = catalog.search("tolkien");
      const upper = catalog.search("TOLKIEN");

      expect(lower.map((r) => r.id)).toEqual(["a1"]);
      expect(upper).toEqual(lower);
    });

    it("matches substrings inside words", () => {
      expect(catalog.search("bbi").map((r) => r.id)).toEqual(["a1"]);
    });

    it("returns every record for an empty query", () => {
      expect(catalog.search("")).toEqual(catalog.list());
    });

    it("returns nothing when no title or author matches", () => {
      expect(catalog.search("978-0441013593")).toEqual([]);
    });
  });

  describe("list", () => {
    it("returns a copy that cannot change the catalog", () => {
      catalog.add(duneHardcover());

      const listed = catalog.list();
      listed.push(hobbitAudio());
      listed.length = 0;

      expect(catalog.size).toBe(1);
      expect(catalog.list()).toEqual([duneHardcover()]);
    });
  });

  describe("filterByType", () => {
    it("returns records of one variant", () => {
      catalog.add(duneHardcover());
      catalog.add(duneEbook());
      catalog.add(hobbitAudio());

      expect(catalog.filterByType("Electronic")).toEqual([duneEbook()]);
      expect(catalog.filterByType("Audio")).toEqual([hobbitAudio()]);
    });
  });

  describe("refresh", () => {
    it("picks up changes made to the file by another instance", () => {
      catalog.add(duneHardcover());
      const other = new Catalog(file);
      other.add(hobbitAudio());

      expect(catalog.size).toBe(1);
      expect(catalog.refresh().map((r) => r.id)).toEqual(["b1", "a1"]);
      expect(catalog.size).toBe(2);
    });
  });

  it("runs the Dune scenario end to end", () => {
    catalog.add(duneHardcover());
    catalog.add(duneEbook());

    expect(catalog.search("dune")).toEqual([duneHardcover(), duneEbook()]);

    catalog.remove("b1");
    expect(catalog.list()).toEqual([duneEbook()]);
  });
});

describe("Catalog write failures", () => {
  it("leaves memory unchanged when add cannot be saved", () => {
    const store = new MemoryStore([duneHardcover()]);
    const catalog = new Catalog("memory", { store });
    store.failWith = new StorageWriteError("memory", "disk full");

    expect(() => catalog.add(duneEbook())).toThrow(StorageWriteError);
    expect(catalog.list()).toEqual([duneHardcover()]);
    expect(store.saved).toEqual([duneHardcover()]);
  });

  it("leaves memory unchanged when remove cannot be saved", () => {
    const store = new MemoryStore([duneHardcover(), duneEbook()]);
    const catalog = new Catalog("memory", { store });
    store.failWith = new StorageWriteError("memory", "disk full");

    expect(() => catalog.remove("b1")).toThrow(StorageWriteError);
    expect(catalog.find("b1")).toEqual(duneHardcover());
    expect(catalog.size).toBe(2);
  });

  it("wraps foreign store errors in StorageWriteError", () => {
    const store = new MemoryStore();
    const catalog = new Catalog("memory", { store });
    const cause = new Error("EROFS: read-only file system");
    store.failWith = cause;

    try {
      catalog.add(duneHardcover());
      expect.fail("expected StorageWriteError");
    } catch (err) {
      expect(err).toBeInstanceOf(StorageWriteError);
      if (err instanceof StorageWriteError) {
        expect(err.path).toBe("memory");
        expect(err.cause).toBe(cause);
        expect(err.message).toBe(
          "Cannot write catalog file memory: EROFS: read-only file system",
        );
      }
    }
    expect(catalog.size).toBe(0);
  });

  it("saves once per successful mutation and never for a no-op", () => {
    const store = new MemoryStore();
    const catalog = new Catalog("memory", { store });

    catalog.add(duneHardcover());
    catalog.remove("missing");
    catalog.remove("b1");

    expect(store.saves).toBe(2);
  });

  it("logs each mutation through the injected logger", () => {
    const logger = createLogger();
    const debug = vi.spyOn(logger, "debug");
    const catalog = new Catalog("memory", { store: new MemoryStore(), logger });

    catalog.add(duneHardcover());

    expect(debug).toHaveBeenCalledWith({ id: "b1", type: "Printed" }, "Record added");
  });
});
