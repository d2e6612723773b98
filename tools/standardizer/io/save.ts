import { existsSync } from "fs";
import { join } from "path";
import { readJsonFile, readNdjsonFile, writeJsonAtomic, writeNdjsonAtomic } from "../lib/json.js";
import { DATASET_INFO_FILENAME, splitOutputPath } from "../lib/paths.js";
import { DatasetLoadError } from "../pipeline/errors.js";
import { emitAgentEvent } from "../pipeline/events.js";
import type { CanonicalRecord, DatasetInfo, DatasetSplits } from "../pipeline/types.js";

export interface StoredDataset {
  info: unknown;
  splits: Map<string, unknown[]>;
  files: string[];
}

/** Writes `<split>.jsonl` per split and `dataset_info.json`; returns the paths. */
export function saveStandardized(
  outDir: string,
  dataset: DatasetSplits<CanonicalRecord>,
  info: DatasetInfo
): string[] {
  const written: string[] = [];
  for (const [split, records] of dataset) {
    const path = splitOutputPath(outDir, split);
    writeNdjsonAtomic(path, records);
    written.push(path);
  }
  const infoPath = join(outDir, DATASET_INFO_FILENAME);
  writeJsonAtomic(infoPath, info);
  written.push(infoPath);

  emitAgentEvent({
    level: "info",
    eventType: "summary",
    message: "Standardized dataset written",
    path: outDir,
    files: written.length,
  });
  return written;
}

/**
 * Reads a directory written by `saveStandardized`. Split files are taken from
 * the `splits` keys of `dataset_info.json`; nothing is validated here.
 */
export function readStandardized(outDir: string): StoredDataset {
  const infoPath = join(outDir, DATASET_INFO_FILENAME);
  if (!existsSync(infoPath)) {
    throw new DatasetLoadError(`Missing ${DATASET_INFO_FILENAME} in ${outDir}`);
  }
  const info = readJsonFile(infoPath);
  const files = [infoPath];
  const splits = new Map<string, unknown[]>();
  for (const split of splitNames(info)) {
    const path = splitOutputPath(outDir, split);
    if (!existsSync(path)) {
      throw new DatasetLoadError(`Missing split file for "${split}": ${path}`);
    }
    splits.set(split, readNdjsonFile(path));
    files.push(path);
  }
  return { info, splits, files };
}

function splitNames(info: unknown): string[] {
  if (typeof info !== "object" || info === null || !("splits" in info)) {
    return [];
  }
  const { splits } = info;
  if (typeof splits !== "object" || splits === null) {
    return [];
  }
  return Object.keys(splits);
}
