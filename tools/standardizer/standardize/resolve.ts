import { emitAgentEvent } from "../pipeline/events.js";
import type { ExtractionSpec, ResolvedSpec, TypedRecord } from "../pipeline/types.js";
import { detectTextField } from "./text.js";

export function isResolvedSpec(spec: ExtractionSpec | ResolvedSpec): spec is ResolvedSpec {
  return "resolved" in spec && spec.resolved === true;
}

/**
 * Decides the text field for a whole dataset from one sample record. A
 * registered text field wins when the sample carries it; otherwise the
 * detection rules run. An already resolved spec comes back unchanged.
 */
export function resolveSpec(spec: ExtractionSpec | ResolvedSpec, sample: TypedRecord): ResolvedSpec {
  if (isResolvedSpec(spec)) {
    return spec;
  }

  let textField: string | null;
  let joinConversationTurns: boolean;
  let source: "registry" | "detected";
  if (spec.textField && sample.has(spec.textField)) {
    textField = spec.textField;
    joinConversationTurns = spec.joinConversationTurns;
    source = "registry";
  } else {
    const match = detectTextField(sample);
    textField = match?.field ?? null;
    joinConversationTurns = match?.joinConversationTurns ?? false;
    source = "detected";
  }

  emitAgentEvent({
    level: textField === null ? "warn" : "info",
    eventType: "schema.resolve",
    message: textField === null ? "No text field could be determined" : "Text field resolved",
    textField,
    joinConversationTurns,
    source,
  });

  const resolved: ResolvedSpec = {
    resolved: true,
    textField,
    labelField: spec.labelField,
    labelIsScore: spec.labelIsScore,
    threshold: spec.threshold,
    multilabelFields: spec.multilabelFields ? Object.freeze({ ...spec.multilabelFields }) : undefined,
    joinConversationTurns,
  };
  return Object.freeze(resolved);
}
