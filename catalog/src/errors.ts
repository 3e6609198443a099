/**
 * Shelfkeep Catalog — Errors
 *
 * Every failure the catalog raises is a CatalogError with a stable `code`.
 * A missing record is not an error: find() returns undefined and
 * remove() returns false.
 */

import type { ValidationError } from "./validator";

export type CatalogErrorCode =
  | "DUPLICATE_IDENTIFIER"
  | "INVALID_RECORD"
  | "UNRECOGNIZED_TYPE"
  | "STORAGE_READ_FAILURE"
  | "STORAGE_WRITE_FAILURE";

export class CatalogError extends Error {
  readonly code: CatalogErrorCode;

  constructor(message: string, code: CatalogErrorCode, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class DuplicateIdentifierError extends CatalogError {
  readonly identifier: string;

  constructor(identifier: string) {
    super(`Record with id "${identifier}" already exists`, "DUPLICATE_IDENTIFIER");
    this.identifier = identifier;
  }
}

export class InvalidRecordError extends CatalogError {
  readonly identifier: string;
  readonly errors: ValidationError[];

  constructor(identifier: string, errors: ValidationError[]) {
    const details = errors.map((e) => `${e.path}: ${e.message}`).join("; ");
    super(`Record "${identifier}" is invalid: ${details}`, "INVALID_RECORD");
    this.identifier = identifier;
    this.errors = errors;
  }
}

/**
 * A stored record whose `type` tag is missing or names no known variant.
 */
export class UnrecognizedTypeError extends CatalogError {
  readonly tag: unknown;
  /** Position of the offending element in the stored document */
  readonly index: number;

  constructor(tag: unknown, index: number) {
    const shown = tag === undefined ? "missing" : JSON.stringify(tag);
    super(`Unrecognized record type at index ${index}: ${shown}`, "UNRECOGNIZED_TYPE");
    this.tag = tag;
    this.index = index;
  }
}

export class StorageReadError extends CatalogError {
  readonly path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super(`Cannot read catalog file ${path}: ${reason}`, "STORAGE_READ_FAILURE", cause);
    this.path = path;
  }
}

export class StorageWriteError extends CatalogError {
  readonly path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super(`Cannot write catalog file ${path}: ${reason}`, "STORAGE_WRITE_FAILURE", cause);
    this.path = path;
  }
}

/** Message of an unknown thrown value */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
