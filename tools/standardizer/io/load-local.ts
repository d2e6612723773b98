import { existsSync, readdirSync, readFileSync, statSync } from "fs";
import { basename, extname, join } from "path";
import { csvToRecords } from "../lib/csv.js";
import { parseNdjson } from "../lib/json.js";
import { DatasetLoadError, SchemaError } from "../pipeline/errors.js";
import { emitAgentEvent } from "../pipeline/events.js";
import type { DatasetSplits, RawRecord } from "../pipeline/types.js";

export const DATASET_EXTENSIONS = [".jsonl", ".ndjson", ".json", ".csv"] as const;
type DatasetExtension = (typeof DATASET_EXTENSIONS)[number];

function datasetExtension(path: string): DatasetExtension | null {
  const ext = extname(path).toLowerCase();
  return DATASET_EXTENSIONS.find((candidate) => candidate === ext) ?? null;
}

/**
 * Loads a dataset from disk. A directory yields one split per
 * `<split>.{jsonl,ndjson,json,csv}` file, ordered by file name; a single file
 * yields a `train` split.
 */
export function loadLocalDataset(path: string): DatasetSplits<RawRecord> {
  if (!existsSync(path)) {
    throw new DatasetLoadError(`Dataset path not found: ${path}`);
  }

  const dataset: DatasetSplits<RawRecord> = new Map();
  if (statSync(path).isDirectory()) {
    const files = readdirSync(path)
      .filter((name) => datasetExtension(name) !== null)
      .sort();
    for (const file of files) {
      const split = basename(file, extname(file));
      if (dataset.has(split)) {
        throw new DatasetLoadError(`Split "${split}" is defined by more than one file in ${path}`);
      }
      dataset.set(split, readRecordsFile(join(path, file)));
    }
  } else {
    dataset.set("train", readRecordsFile(path));
  }

  if (dataset.size === 0) {
    throw new DatasetLoadError(
      `No dataset files (${DATASET_EXTENSIONS.join(", ")}) found in ${path}`
    );
  }

  emitAgentEvent({
    level: "info",
    eventType: "dataset.load",
    message: "Dataset loaded",
    path,
    splits: Object.fromEntries([...dataset].map(([split, records]) => [split, records.length])),
  });
  return dataset;
}

export function readRecordsFile(path: string): RawRecord[] {
  const ext = datasetExtension(path);
  if (ext === null) {
    throw new DatasetLoadError(`Unsupported dataset file type: ${path}`);
  }
  emitAgentEvent({
    level: "debug",
    eventType: "file.read",
    message: "Reading dataset file",
    path,
  });

  const content = readFileSync(path, "utf-8");
  if (ext === ".csv") {
    return csvToRecords(content);
  }

  let rows: unknown[];
  try {
    rows = ext === ".json" ? parseJsonArray(content) : parseNdjson(content);
  } catch (error) {
    if (error instanceof SchemaError) {
      throw error;
    }
    throw new DatasetLoadError(`Could not parse ${path}`, error);
  }
  return rows.map((row, index) => toRawRecord(row, `${path}#${index}`));
}

function parseJsonArray(content: string): unknown[] {
  const parsed: unknown = JSON.parse(content);
  if (!Array.isArray(parsed)) {
    throw new SchemaError("JSON dataset files must contain an array of records");
  }
  return parsed;
}

function toRawRecord(row: unknown, where: string): RawRecord {
  if (!isJsonObject(row)) {
    throw new SchemaError(`Record ${where} is not an object`);
  }
  return row;
}

// Rows come from JSON.parse, so every nested value is already JSON.
function isJsonObject(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
