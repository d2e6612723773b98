import Ajv, { type SchemaObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { CANONICAL_RECORD_SCHEMA_PATH, DATASET_INFO_SCHEMA_PATH, DATASET_INFO_FILENAME } from "./paths.js";
import { readJsonFile } from "./json.js";
import { SchemaError } from "../pipeline/errors.js";

export interface ValidationIssue {
  file: string;
  messages: string[];
}

const MAX_MESSAGES_PER_FILE = 20;

function createAjv(): Ajv {
  const ajv = new Ajv({ allErrors: true, strict: true, strictSchema: true });
  addFormats(ajv);
  return ajv;
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function loadSchema(path: string): SchemaObject {
  const schema = readJsonFile(path);
  if (!isSchemaObject(schema)) {
    throw new SchemaError(`JSON schema must be an object: ${path}`);
  }
  return schema;
}

export class DatasetValidator {
  private readonly validateRecord: ValidateFunction;
  private readonly validateInfo: ValidateFunction;

  constructor() {
    const ajv = createAjv();
    this.validateRecord = ajv.compile(loadSchema(CANONICAL_RECORD_SCHEMA_PATH));
    this.validateInfo = ajv.compile(loadSchema(DATASET_INFO_SCHEMA_PATH));
  }

  /** One issue per split file with at least one invalid record. */
  checkSplits(splits: ReadonlyMap<string, readonly unknown[]>): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    for (const [split, records] of splits) {
      const messages: string[] = [];
      let invalid = 0;
      records.forEach((record, index) => {
        if (this.validateRecord(record)) {
          return;
        }
        invalid++;
        if (messages.length < MAX_MESSAGES_PER_FILE) {
          messages.push(...formatErrors(this.validateRecord, `[${index}]`));
        }
      });
      if (invalid > 0) {
        if (invalid > MAX_MESSAGES_PER_FILE) {
          messages.push(`... ${invalid} invalid records in total`);
        }
        issues.push({ file: `${split}.jsonl`, messages });
      }
    }
    return issues;
  }

  checkInfo(info: unknown, splits?: ReadonlyMap<string, readonly unknown[]>): ValidationIssue[] {
    if (!this.validateInfo(info)) {
      return [{ file: DATASET_INFO_FILENAME, messages: formatErrors(this.validateInfo, "") }];
    }
    if (!splits || !isSchemaObject(info) || !isSchemaObject(info.splits)) {
      return [];
    }
    const declared: Record<string, unknown> = info.splits;
    const messages: string[] = [];
    for (const [split, records] of splits) {
      if (declared[split] !== records.length) {
        messages.push(
          `split "${split}" declares ${String(declared[split])} records but has ${records.length}`
        );
      }
    }
    return messages.length > 0 ? [{ file: DATASET_INFO_FILENAME, messages }] : [];
  }
}

function formatErrors(validate: ValidateFunction, prefix: string): string[] {
  return (validate.errors ?? []).map(
    (err) => `${prefix}${err.instancePath || "/"} ${err.message ?? "is invalid"}`
  );
}

export function validateDataset(
  splits: ReadonlyMap<string, readonly unknown[]>,
  info?: unknown
): ValidationIssue[] {
  const validator = new DatasetValidator();
  const issues = validator.checkSplits(splits);
  if (info !== undefined) {
    issues.push(...validator.checkInfo(info, splits));
  }
  return issues;
}
