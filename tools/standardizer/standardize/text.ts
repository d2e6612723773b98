import { stringifyFieldValue } from "../lib/value.js";
import type { FieldValue, ResolvedSpec, TypedRecord } from "../pipeline/types.js";

/** Checked in order; the first one holding a string wins. */
export const TEXT_FIELD_CANDIDATES = [
  "text",
  "prompt",
  "content",
  "question",
  "sentence",
  "response",
] as const;

export const CONVERSATION_FIELD = "messages";
const DEFAULT_ROLE = "user";

export interface TextFieldMatch {
  field: string;
  joinConversationTurns: boolean;
}

type TextFieldRule = (record: TypedRecord) => TextFieldMatch | null;

const TEXT_FIELD_RULES: readonly TextFieldRule[] = [
  (record) => {
    const field = TEXT_FIELD_CANDIDATES.find((name) => record.get(name)?.kind === "string");
    return field ? { field, joinConversationTurns: false } : null;
  },
  (record) =>
    record.get(CONVERSATION_FIELD)?.kind === "sequence"
      ? { field: CONVERSATION_FIELD, joinConversationTurns: true }
      : null,
  (record) => {
    for (const [field, value] of record) {
      if (value.kind === "string") {
        return { field, joinConversationTurns: false };
      }
    }
    return null;
  },
];

export function detectTextField(record: TypedRecord): TextFieldMatch | null {
  for (const rule of TEXT_FIELD_RULES) {
    const match = rule(record);
    if (match) {
      return match;
    }
  }
  return null;
}

/**
 * Flattens chat turns into one string. Mapping turns render as
 * `role: content`, string turns verbatim; turns without content are dropped.
 */
export function joinConversationTurns(turns: readonly FieldValue[]): string {
  const parts: string[] = [];
  for (const turn of turns) {
    if (turn.kind === "string") {
      parts.push(turn.value);
      continue;
    }
    if (turn.kind !== "mapping") {
      continue;
    }
    const content = turn.fields.get("content");
    if (!content || !hasContent(content)) {
      continue;
    }
    const role = turn.fields.get("role");
    const roleText = role && role.kind !== "null" ? stringifyFieldValue(role) : DEFAULT_ROLE;
    parts.push(`${roleText}: ${stringifyFieldValue(content)}`);
  }
  return parts.join("\n");
}

function hasContent(value: FieldValue): boolean {
  switch (value.kind) {
    case "null":
      return false;
    case "string":
      return value.value.length > 0;
    case "number":
      return value.value !== 0;
    case "boolean":
      return value.value;
    case "sequence":
      return value.items.length > 0;
    case "mapping":
      return value.fields.size > 0;
  }
}

export function extractText(spec: ResolvedSpec, record: TypedRecord): string {
  const value = spec.textField === null ? undefined : record.get(spec.textField);
  if (spec.joinConversationTurns && value?.kind === "sequence") {
    return joinConversationTurns(value.items);
  }
  return stringifyFieldValue(value);
}
