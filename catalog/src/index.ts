/**
 * Shelfkeep Catalog — Public API
 *
 * Main entry point for the catalog package.
 * Exports the Catalog class, record types, file store, validator and errors.
 */

export { Catalog } from "./catalog";
export type { CatalogOptions } from "./catalog";
export {
  RECORD_TYPES,
  createAudio,
  createElectronic,
  createPrinted,
  isRecordType,
  parseRecordType,
} from "./records";
export type {
  AudioRecord,
  BaseRecord,
  ElectronicRecord,
  LibraryRecord,
  PrintedRecord,
  RecordType,
} from "./records";
export { decodeStoredRecord, encodeRecord } from "./codec";
export type { StoredRecord } from "./codec";
export { fileStore, formatForPath, inspectRecords, loadRecords, saveRecords } from "./storage";
export type { RecordInspection, RecordStore, StoreFormat } from "./storage";
export {
  formatValidationErrors,
  validateRecord,
  validateStoredRecord,
} from "./validator";
export type { ValidationError, ValidationResult } from "./validator";
export {
  CatalogError,
  DuplicateIdentifierError,
  InvalidRecordError,
  StorageReadError,
  StorageWriteError,
  UnrecognizedTypeError,
  describeError,
} from "./errors";
export type { CatalogErrorCode } from "./errors";
export { createLogger, isLogLevel } from "./logger";
export type { LogLevel, Logger, LoggerOptions } from "./logger";
