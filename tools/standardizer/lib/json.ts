import { mkdirSync, readFileSync, renameSync, writeFileSync } from "fs";
import { dirname } from "path";
import { emitAgentEvent } from "../pipeline/events.js";

export function ensureDir(path: string): void {
  mkdirSync(path, { recursive: true });
}

export function readJsonFile(path: string): unknown {
  emitAgentEvent({
    level: "debug",
    eventType: "file.read",
    message: "Reading JSON file",
    path,
  });
  return JSON.parse(readFileSync(path, "utf-8"));
}

export function writeJsonAtomic(path: string, value: unknown): void {
  writeTextAtomic(path, `${JSON.stringify(value, null, 2)}\n`);
}

export function writeTextAtomic(path: string, content: string): void {
  ensureDir(dirname(path));
  emitAgentEvent({
    level: "debug",
    eventType: "file.write",
    message: "Writing text file atomically",
    path,
    bytes: content.length,
  });
  const tmpPath = `${path}.tmp-${process.pid}-${Date.now()}`;
  writeFileSync(tmpPath, content);
  renameSync(tmpPath, path);
}

export function writeNdjsonAtomic(path: string, rows: readonly unknown[]): void {
  const content = rows.map((row) => JSON.stringify(row)).join("\n");
  writeTextAtomic(path, content.length > 0 ? `${content}\n` : "");
}

/** The value as it reads back after a JSON write. */
export function jsonRoundTrip(value: unknown): unknown {
  const text = JSON.stringify(value);
  return text === undefined ? undefined : JSON.parse(text);
}

/** One JSON value per non-blank line; line numbers in errors are 1-based. */
export function parseNdjson(text: string): unknown[] {
  const out: unknown[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const trimmed = lines[i].trim();
    if (!trimmed) {
      continue;
    }
    try {
      out.push(JSON.parse(trimmed));
    } catch (error) {
      throw new Error(`Invalid JSON on line ${i + 1}`, { cause: error });
    }
  }
  return out;
}

export function readNdjsonFile(path: string): unknown[] {
  emitAgentEvent({
    level: "debug",
    eventType: "file.read",
    message: "Reading NDJSON file",
    path,
  });
  return parseNdjson(readFileSync(path, "utf-8"));
}
