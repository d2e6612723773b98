import type { SchemaRegistry } from "../registry/registry.js";
import type { StandardizeResult } from "../standardize/standardize.js";
import type { Logger } from "./logger.js";
import { PipelineError } from "./errors.js";
import type { DatasetInfo, DatasetSplits, PrepareOptions, RawRecord, StepName } from "./types.js";

/** Shared state handed from step to step; each step fills its own slot. */
export interface PipelineContext {
  options: PrepareOptions;
  logger: Logger;
  registry: SchemaRegistry;
  raw?: DatasetSplits<RawRecord>;
  standardized?: StandardizeResult;
  info?: DatasetInfo;
  writtenFiles?: string[];
}

export function requireStepInput<T>(value: T | undefined, step: StepName, what: string): T {
  if (value === undefined) {
    throw new PipelineError(`${what} missing before ${step} step`, { code: "STEP_INPUT_MISSING" });
  }
  return value;
}
