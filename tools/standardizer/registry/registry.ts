import { existsSync } from "fs";
import { DEFAULT_REGISTRY_PATH } from "../lib/paths.js";
import { readJsonFile } from "../lib/json.js";
import { SchemaError } from "../pipeline/errors.js";
import { emitAgentEvent } from "../pipeline/events.js";
import type { ExtractionSpec } from "../pipeline/types.js";
import { DEFAULT_THRESHOLD, registryFileSchema } from "./schema.js";

export function emptySpec(): ExtractionSpec {
  return {
    labelIsScore: false,
    threshold: DEFAULT_THRESHOLD,
    joinConversationTurns: false,
  };
}

/**
 * Known dataset schemas keyed by dataset identifier. Entries are never
 * handed out directly; `lookup` returns a copy the caller may change.
 */
export class SchemaRegistry {
  private readonly entries: ReadonlyMap<string, ExtractionSpec>;

  constructor(entries: Iterable<[string, ExtractionSpec]>) {
    this.entries = new Map(entries);
  }

  static parse(input: unknown, source = "<inline>"): SchemaRegistry {
    const parsed = registryFileSchema.safeParse(input);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ");
      throw new SchemaError(`Invalid schema registry ${source}: ${details}`, parsed.error);
    }
    return new SchemaRegistry(Object.entries(parsed.data.datasets));
  }

  has(datasetId: string): boolean {
    return this.entries.has(datasetId);
  }

  lookup(datasetId: string): ExtractionSpec {
    const entry = this.entries.get(datasetId);
    emitAgentEvent({
      level: "info",
      eventType: "registry.lookup",
      message: entry ? "Registered schema found" : "No registered schema; using heuristics",
      dataset: datasetId,
      registered: entry !== undefined,
    });
    if (!entry) {
      return emptySpec();
    }
    return {
      ...entry,
      multilabelFields: entry.multilabelFields ? { ...entry.multilabelFields } : undefined,
    };
  }
}

export function loadRegistry(path: string = DEFAULT_REGISTRY_PATH): SchemaRegistry {
  if (!existsSync(path)) {
    throw new SchemaError(`Schema registry not found: ${path}`);
  }
  let raw: unknown;
  try {
    raw = readJsonFile(path);
  } catch (error) {
    throw new SchemaError(`Schema registry is not valid JSON: ${path}`, error);
  }
  return SchemaRegistry.parse(raw, path);
}
