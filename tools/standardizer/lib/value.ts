import { LabelCoercionError } from "../pipeline/errors.js";
import type { FieldValue, JsonValue, RawRecord, TypedRecord } from "../pipeline/types.js";

export const NUMERIC_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_FLOATS = new Map<string, number>([
  ["inf", Infinity],
  ["infinity", Infinity],
  ["nan", NaN],
]);

export function toFieldValue(value: JsonValue): FieldValue {
  if (value === null) {
    return { kind: "null" };
  }
  if (typeof value === "string") {
    return { kind: "string", value };
  }
  if (typeof value === "number") {
    return { kind: "number", value };
  }
  if (typeof value === "boolean") {
    return { kind: "boolean", value };
  }
  if (Array.isArray(value)) {
    return { kind: "sequence", items: value.map(toFieldValue) };
  }
  return { kind: "mapping", fields: toTypedRecord(value) };
}

export function toTypedRecord(raw: RawRecord): TypedRecord {
  return new Map(Object.entries(raw).map(([key, value]) => [key, toFieldValue(value)]));
}

export function fromFieldValue(value: FieldValue): JsonValue {
  switch (value.kind) {
    case "string":
    case "number":
    case "boolean":
      return value.value;
    case "null":
      return null;
    case "sequence":
      return value.items.map(fromFieldValue);
    case "mapping": {
      const out: { [key: string]: JsonValue } = {};
      for (const [key, item] of value.fields) {
        out[key] = fromFieldValue(item);
      }
      return out;
    }
  }
}

/** String form used whenever a text value is not already a string. */
export function stringifyFieldValue(value: FieldValue | undefined): string {
  if (!value || value.kind === "null") {
    return "null";
  }
  switch (value.kind) {
    case "string":
      return value.value;
    case "number":
    case "boolean":
      return String(value.value);
    case "sequence":
    case "mapping":
      return JSON.stringify(fromFieldValue(value));
  }
}

export function parseNumericString(input: string): number | null {
  const trimmed = input.trim();
  if (NUMERIC_PATTERN.test(trimmed)) {
    return Number(trimmed);
  }
  const sign = trimmed.startsWith("-") ? -1 : 1;
  const unsigned = trimmed.replace(/^[+-]/, "").toLowerCase();
  const special = SPECIAL_FLOATS.get(unsigned);
  return special === undefined ? null : sign * special;
}

/** Numbers and booleans (as 1 and 0); `null` for every other variant. */
export function numericValue(value: FieldValue): number | null {
  if (value.kind === "number") {
    return value.value;
  }
  if (value.kind === "boolean") {
    return value.value ? 1 : 0;
  }
  return null;
}

/**
 * Converts a score to a float. Numbers and booleans pass through, numeric
 * strings are parsed; every other variant throws.
 */
export function toFloat(field: string, value: FieldValue): number {
  const numeric = numericValue(value);
  if (numeric !== null) {
    return numeric;
  }
  if (value.kind === "string") {
    const parsed = parseNumericString(value.value);
    if (parsed !== null) {
      return parsed;
    }
  }
  throw LabelCoercionError.unconvertible(field, stringifyFieldValue(value));
}

export function thresholdToBinary(field: string, value: FieldValue, threshold: number): 0 | 1 {
  return toFloat(field, value) >= threshold ? 1 : 0;
}
