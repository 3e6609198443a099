/**
 * Shelfkeep Catalog — Record Validator
 *
 * Validates stored records against the per-variant JSON Schemas in
 * record-schemas.json, using AJV.
 *
 * Two levels of validation:
 * 1. Schema validation (structure, types, ranges) via AJV
 * 2. Semantic rules that apply to records entering a catalog
 */

import Ajv, { ErrorObject, ValidateFunction } from "ajv";
import recordSchemas from "../record-schemas.json";
import { encodeRecord, StoredRecord } from "./codec";
import { isRecordType, LibraryRecord, RECORD_TYPES, RecordType } from "./records";

/** A validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  rule: string;
}

let _validators: Record<RecordType, ValidateFunction<StoredRecord>> | null = null;

function getValidators(): Record<RecordType, ValidateFunction<StoredRecord>> {
  if (_validators) return _validators;

  const ajv = new Ajv({ allErrors: true, strict: false });
  _validators = {
    Printed: ajv.compile<StoredRecord>(recordSchemas.Printed),
    Electronic: ajv.compile<StoredRecord>(recordSchemas.Electronic),
    Audio: ajv.compile<StoredRecord>(recordSchemas.Audio),
  };
  return _validators;
}

/**
 * Schema check for one variant. Narrows `data` to a stored record.
 */
export function getRecordValidator(type: RecordType): ValidateFunction<StoredRecord> {
  return getValidators()[type];
}

/**
 * Validate a stored (on-disk shaped) record: its type tag, then the
 * schema of the variant the tag names.
 */
export function validateStoredRecord(data: unknown): ValidationResult {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return invalid([{ path: "/", message: "must be object", rule: "schema:type" }]);
  }

  const tag: unknown = "type" in data ? data.type : undefined;
  if (!isRecordType(tag)) {
    return invalid([
      {
        path: "/type",
        message:
          tag === undefined
            ? "missing record type"
            : `unrecognized record type ${JSON.stringify(tag)} (expected one of ${RECORD_TYPES.join(", ")})`,
        rule: "type:unrecognized",
      },
    ]);
  }

  const validate = getRecordValidator(tag);
  if (validate(data)) {
    return { valid: true, errors: [] };
  }
  return invalid((validate.errors ?? []).map(toValidationError));
}

/**
 * Validate a record about to enter a catalog: schema of its stored form
 * plus semantic rules.
 */
export function validateRecord(record: LibraryRecord): ValidationResult {
  const errors = [...validateStoredRecord(encodeRecord(record)).errors];
  errors.push(...validateSemanticRules(record));

  return {
    valid: errors.length === 0,
    errors,
  };
}

/** One-line summary of validation errors */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map((e) => `${e.path}: ${e.message}`).join("; ");
}

// ─── Private ────────────────────────────────────────────────

function invalid(errors: ValidationError[]): ValidationResult {
  return { valid: false, errors };
}

function toValidationError(err: ErrorObject): ValidationError {
  const extra: unknown = err.params.additionalProperty;
  const path = typeof extra === "string" ? `${err.instancePath}/${extra}` : err.instancePath;

  return {
    path: path || "/",
    message: err.message || "Unknown validation error",
    rule: `schema:${err.keyword}`,
  };
}

function validateSemanticRules(record: LibraryRecord): ValidationError[] {
  const errors: ValidationError[] = [];

  if (record.id !== record.id.trim()) {
    errors.push({
      path: "/id",
      message: "Identifier must not start or end with whitespace",
      rule: "semantic:id-trimmed",
    });
  }

  if (record.title.length > 0 && record.title.trim().length === 0) {
    errors.push({
      path: "/title",
      message: "Title must not be blank",
      rule: "semantic:title-blank",
    });
  }

  return errors;
}
