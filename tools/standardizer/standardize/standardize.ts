import { basicClean } from "../lib/clean.js";
import { toTypedRecord } from "../lib/value.js";
import { emitAgentEvent } from "../pipeline/events.js";
import { withSplitContext } from "../pipeline/telemetry-context.js";
import type {
  CanonicalRecord,
  DatasetInfo,
  DatasetSplits,
  ExtractionSpec,
  LabelOptions,
  RawRecord,
  ResolvedSpec,
  Task,
  TypedRecord,
} from "../pipeline/types.js";
import { extractLabel, labelToJson } from "./label.js";
import { resolveSpec } from "./resolve.js";
import { extractText } from "./text.js";

export interface StandardizeOptions {
  task: Task;
  scoreField?: string;
  /** Overrides the spec's own threshold when set. */
  threshold?: number;
  clean?: boolean;
}

export interface StandardizeResult {
  dataset: DatasetSplits<CanonicalRecord>;
  resolved: ResolvedSpec;
  labelOptions: LabelOptions;
}

/** First record of the first non-empty split, in split order. */
export function sampleRecord(dataset: DatasetSplits<RawRecord>): TypedRecord {
  for (const records of dataset.values()) {
    if (records.length > 0) {
      return toTypedRecord(records[0]);
    }
  }
  return new Map();
}

export function standardizeRecord(
  spec: ResolvedSpec,
  record: TypedRecord,
  options: LabelOptions,
  clean = false
): CanonicalRecord {
  const text = extractText(spec, record);
  const label = extractLabel(spec, record, options);
  const out: CanonicalRecord = {
    text: clean ? basicClean(text) : text,
    ...(label === null ? {} : { label: labelToJson(label) }),
  };
  return Object.freeze(out);
}

/**
 * Resolves the spec once against the dataset's first record, then maps every
 * record of every split to `{ text, label? }`. All other fields are dropped.
 */
export function standardizeDataset(
  dataset: DatasetSplits<RawRecord>,
  spec: ExtractionSpec | ResolvedSpec,
  options: StandardizeOptions
): StandardizeResult {
  const resolved = resolveSpec(spec, sampleRecord(dataset));
  const labelOptions: LabelOptions = {
    task: options.task,
    scoreField: options.scoreField,
    threshold: options.threshold ?? resolved.threshold,
  };

  const out: DatasetSplits<CanonicalRecord> = new Map();
  for (const [split, records] of dataset) {
    const standardized = withSplitContext(split, () => {
      emitAgentEvent({
        level: "debug",
        eventType: "standardize.split",
        phase: "start",
        message: "Standardizing split",
        records: records.length,
      });
      const mapped = records.map((record) =>
        standardizeRecord(resolved, toTypedRecord(record), labelOptions, options.clean)
      );
      emitAgentEvent({
        level: "info",
        eventType: "standardize.split",
        phase: "end",
        message: "Split standardized",
        records: mapped.length,
        labeled: mapped.filter((record) => record.label !== undefined).length,
      });
      return mapped;
    });
    out.set(split, standardized);
  }

  return { dataset: out, resolved, labelOptions };
}

export function splitCounts(dataset: ReadonlyMap<string, readonly unknown[]>): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const [split, records] of dataset) {
    counts[split] = records.length;
  }
  return counts;
}

export function buildDatasetInfo(
  source: string,
  result: StandardizeResult,
  createdAt: Date = new Date()
): DatasetInfo {
  const { resolved, labelOptions } = result;
  return {
    source,
    task: labelOptions.task,
    textField: resolved.textField,
    labelField: resolved.labelField ?? labelOptions.scoreField ?? null,
    threshold: labelOptions.task === "binary" ? labelOptions.threshold : null,
    joinConversationTurns: resolved.joinConversationTurns,
    splits: splitCounts(result.dataset),
    createdAt: createdAt.toISOString(),
  };
}
