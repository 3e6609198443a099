/**
 * Shared fixtures for catalog tests.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  createAudio,
  createElectronic,
  createPrinted,
  AudioRecord,
  ElectronicRecord,
  PrintedRecord,
} from "../src";

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `shelfkeep-${prefix}-`));
}

export function duneHardcover(overrides: Partial<PrintedRecord> = {}): PrintedRecord {
  return createPrinted({
    id: "b1",
    title: "Dune",
    author: "Frank Herbert",
    isbn: "978-0441013593",
    pageCount: 412,
    ...overrides,
  });
}

export function duneEbook(overrides: Partial<ElectronicRecord> = {}): ElectronicRecord {
  return createElectronic({
    id: "e1",
    title: "Dune",
    author: "Frank Herbert",
    isbn: "978-0441013593",
    pageCount: 412,
    fileSizeMb: 3.2,
    fileFormat: "EPUB",
    ...overrides,
  });
}

export function hobbitAudio(overrides: Partial<AudioRecord> = {}): AudioRecord {
  return createAudio({
    id: "a1",
    title: "The Hobbit",
    author: "J.R.R. Tolkien",
    isbn: "978-0007458424",
    durationMinutes: 660,
    narrator: "Test Narrator",
    ...overrides,
  });
}
