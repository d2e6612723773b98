import { loadRegistry, type SchemaRegistry } from "../registry/registry.js";
import { runLoadStep } from "../steps/load.js";
import { runSplitsStep } from "../steps/splits.js";
import { runStandardizeStep } from "../steps/standardize.js";
import { runValidateStep } from "../steps/validate.js";
import { runWriteStep } from "../steps/write.js";
import { requireStepInput, type PipelineContext } from "./context.js";
import { initializeEventEmitter } from "./events.js";
import { Logger } from "./logger.js";
import { runSteps, type StepDefinition } from "./step-runner.js";
import type { PrepareOptions, PrepareResult } from "./types.js";

const STEPS: readonly StepDefinition<PipelineContext>[] = [
  { name: "load", run: runLoadStep },
  { name: "splits", run: runSplitsStep },
  { name: "standardize", run: runStandardizeStep },
  { name: "validate", run: runValidateStep },
  { name: "write", run: runWriteStep },
];

export interface PrepareDependencies {
  registry?: SchemaRegistry;
}

export async function runPrepareDatasetPipeline(
  options: PrepareOptions,
  deps: PrepareDependencies = {}
): Promise<PrepareResult> {
  initializeEventEmitter({
    runId: options.runId,
    format: options.logFormat,
    verbose: options.verbose,
    agentLogs: options.agentLogs,
    eventFilePath: options.eventFile,
  });

  const logger = new Logger();
  const registry = deps.registry ?? loadRegistry(options.registryPath);

  logger.info("Pipeline start", {
    eventType: "summary",
    dataset: options.name,
    input: options.inputPath,
    task: options.task,
    scoreField: options.scoreField,
    threshold: options.threshold,
    seed: options.seed,
    clean: options.clean,
    outDir: options.outDir,
  });

  const context: PipelineContext = { options, logger, registry };
  await runSteps(STEPS, context, logger);

  const standardized = requireStepInput(context.standardized, "write", "Standardized dataset");
  const info = requireStepInput(context.info, "write", "Dataset info");
  logger.info("Pipeline finished", {
    eventType: "summary",
    outDir: options.outDir,
    files: context.writtenFiles?.length ?? 0,
  });

  return { dataset: standardized.dataset, info, outDir: options.outDir };
}
