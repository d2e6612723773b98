import { PipelineError } from "./errors.js";
import type { Logger } from "./logger.js";
import { runWithTelemetryContext } from "./telemetry-context.js";
import type { StepName } from "./types.js";

export interface StepDefinition<TContext> {
  name: StepName;
  run: (context: TContext) => Promise<void> | void;
}

/**
 * Runs one pipeline step inside its telemetry context, logging start, end and
 * failure. Errors are normalized to PipelineError and rethrown.
 */
export async function runStep<TContext>(
  step: StepDefinition<TContext>,
  context: TContext,
  logger: Logger
): Promise<void> {
  const startedAt = Date.now();
  logger.info("Step started", {
    step: step.name,
    eventType: "step.lifecycle",
    phase: "start",
  });

  try {
    await runWithTelemetryContext({ step: step.name }, async () => {
      await step.run(context);
    });
  } catch (error) {
    const wrapped = normalizeStepError(error);
    logger.error("Step failed", {
      step: step.name,
      eventType: "step.lifecycle",
      phase: "fail",
      durationMs: Date.now() - startedAt,
      errorCode: wrapped.code,
      errorMessage: wrapped.message,
    });
    throw wrapped;
  }

  logger.info("Step completed", {
    step: step.name,
    eventType: "step.lifecycle",
    phase: "end",
    durationMs: Date.now() - startedAt,
  });
}

export async function runSteps<TContext>(
  steps: readonly StepDefinition<TContext>[],
  context: TContext,
  logger: Logger
): Promise<void> {
  for (const step of steps) {
    await runStep(step, context, logger);
  }
}

export function normalizeStepError(error: unknown): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  if (error instanceof Error) {
    return new PipelineError(error.message, {
      code: "STEP_ERROR",
      cause: error,
    });
  }

  return new PipelineError(String(error), {
    code: "STEP_ERROR",
    cause: error,
  });
}
