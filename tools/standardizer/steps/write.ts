import { saveStandardized } from "../io/save.js";
import { requireStepInput, type PipelineContext } from "../pipeline/context.js";

export function runWriteStep(context: PipelineContext): void {
  const standardized = requireStepInput(context.standardized, "write", "Standardized dataset");
  const info = requireStepInput(context.info, "write", "Dataset info");
  context.writtenFiles = saveStandardized(context.options.outDir, standardized.dataset, info);
}
