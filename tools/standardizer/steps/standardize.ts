import { buildDatasetInfo, standardizeDataset } from "../standardize/standardize.js";
import { requireStepInput, type PipelineContext } from "../pipeline/context.js";

export function runStandardizeStep(context: PipelineContext): void {
  const { options, registry, logger } = context;
  const raw = requireStepInput(context.raw, "standardize", "Split dataset");
  const spec = registry.lookup(options.name);

  const result = standardizeDataset(raw, spec, {
    task: options.task,
    scoreField: options.scoreField,
    threshold: options.threshold,
    clean: options.clean,
  });
  context.standardized = result;
  context.info = buildDatasetInfo(options.name, result);

  logger.info("Dataset standardized", {
    eventType: "summary",
    textField: context.info.textField,
    labelField: context.info.labelField,
    joinConversationTurns: context.info.joinConversationTurns,
    splits: context.info.splits,
  });
}
