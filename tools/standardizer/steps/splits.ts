import { ensureSplits } from "../splits/ensure-splits.js";
import { requireStepInput, type PipelineContext } from "../pipeline/context.js";

export function runSplitsStep(context: PipelineContext): void {
  const raw = requireStepInput(context.raw, "splits", "Loaded dataset");
  context.raw = ensureSplits(raw, context.options.seed);
}
