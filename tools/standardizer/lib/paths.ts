import { dirname, join, resolve } from "path";
import { fileURLToPath } from "url";

const THIS_DIR = dirname(fileURLToPath(import.meta.url));

export const REPO_ROOT = resolve(THIS_DIR, "../../..");
export const STANDARDIZER_ROOT = resolve(THIS_DIR, "..");

export const DATA_DIR = join(STANDARDIZER_ROOT, "data");
export const SCHEMA_DIR = join(STANDARDIZER_ROOT, "schema");
export const DEFAULT_REGISTRY_PATH = join(DATA_DIR, "registry.json");

export const CANONICAL_RECORD_SCHEMA_PATH = join(SCHEMA_DIR, "canonical-record.schema.json");
export const DATASET_INFO_SCHEMA_PATH = join(SCHEMA_DIR, "dataset-info.schema.json");

export const DATASET_INFO_FILENAME = "dataset_info.json";

export function defaultOutDir(): string {
  return join(REPO_ROOT, "data", "processed", "out");
}

export function splitOutputPath(outDir: string, split: string): string {
  return join(outDir, `${split}.jsonl`);
}
