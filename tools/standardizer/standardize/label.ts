import { fromFieldValue, numericValue, thresholdToBinary, toFloat } from "../lib/value.js";
import { LabelCoercionError } from "../pipeline/errors.js";
import type {
  FieldValue,
  JsonValue,
  Label,
  LabelOptions,
  ResolvedSpec,
  TypedRecord,
} from "../pipeline/types.js";

export const LABEL_FIELD_CANDIDATES = ["label", "labels", "target", "y", "class"] as const;

interface LabelContext {
  spec: ResolvedSpec;
  record: TypedRecord;
  options: LabelOptions;
}

// `undefined` means the rule does not apply; a rule that applies ends the
// chain even when it yields no label.
type LabelRule = (ctx: LabelContext) => { label: Label | null } | undefined;

const multilabelRule: LabelRule = ({ spec, record, options }) => {
  const fields = spec.multilabelFields;
  if (options.task !== "multilabel" || !fields || Object.keys(fields).length === 0) {
    return undefined;
  }
  const value: Record<string, 0 | 1> = {};
  for (const [name, field] of Object.entries(fields)) {
    const raw = record.get(field);
    if (raw) {
      value[name] = thresholdToBinary(field, raw, options.threshold);
    }
  }
  return { label: { kind: "multilabel", value } };
};

const labelFieldRule: LabelRule = ({ spec, record, options }) => {
  const field = spec.labelField;
  const raw = field ? record.get(field) : undefined;
  if (!field || !raw) {
    return undefined;
  }
  const numeric = numericValue(raw);
  if (options.task === "binary" && (spec.labelIsScore || numeric !== null)) {
    return { label: { kind: "int", value: thresholdToBinary(field, raw, options.threshold) } };
  }
  if (options.task === "regression" && numeric !== null) {
    return { label: numericLabel(field, "float", numeric) };
  }
  return { label: coerceCategorical(field, raw) };
};

const scoreFieldRule: LabelRule = ({ record, options }) => {
  const field = options.scoreField;
  const raw = field ? record.get(field) : undefined;
  if (!field || !raw) {
    return undefined;
  }
  if (options.task === "binary") {
    return { label: { kind: "int", value: thresholdToBinary(field, raw, options.threshold) } };
  }
  return { label: numericLabel(field, "float", toFloat(field, raw)) };
};

const conventionalNameRule: LabelRule = ({ record }) => {
  for (const field of LABEL_FIELD_CANDIDATES) {
    const raw = record.get(field);
    if (raw) {
      return { label: coerceCategorical(field, raw) };
    }
  }
  return undefined;
};

const LABEL_RULES: readonly LabelRule[] = [
  multilabelRule,
  labelFieldRule,
  scoreFieldRule,
  conventionalNameRule,
];

// NaN and the infinities have no JSON form.
function numericLabel(field: string, kind: "int" | "float", value: number): Label {
  if (!Number.isFinite(value)) {
    throw LabelCoercionError.nonFinite(field, value);
  }
  return { kind, value };
}

function coerceCategorical(field: string, raw: FieldValue): Label | null {
  if (raw.kind === "null") {
    return null;
  }
  const numeric = numericValue(raw);
  if (numeric !== null) {
    return numericLabel(field, "int", Math.trunc(numeric));
  }
  return { kind: "categorical", value: raw };
}

export function extractLabel(
  spec: ResolvedSpec,
  record: TypedRecord,
  options: LabelOptions
): Label | null {
  const ctx: LabelContext = { spec, record, options };
  for (const rule of LABEL_RULES) {
    const outcome = rule(ctx);
    if (outcome) {
      return outcome.label;
    }
  }
  return null;
}

export function labelToJson(label: Label): JsonValue {
  switch (label.kind) {
    case "int":
    case "float":
      return label.value;
    case "multilabel":
      return { ...label.value };
    case "categorical":
      return fromFieldValue(label.value);
  }
}
