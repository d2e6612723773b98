import { loadLocalDataset } from "../io/load-local.js";
import type { PipelineContext } from "../pipeline/context.js";

export function runLoadStep(context: PipelineContext): void {
  context.raw = loadLocalDataset(context.options.inputPath);
}
