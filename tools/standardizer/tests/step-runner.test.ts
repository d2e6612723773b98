import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { PipelineError, SplitError } from "../pipeline/errors.js";
import { initializeEventEmitter, resetEventEmitter } from "../pipeline/events.js";
import { Logger } from "../pipeline/logger.js";
import { normalizeStepError, runStep, runSteps } from "../pipeline/step-runner.js";
import { getTelemetryContext } from "../pipeline/telemetry-context.js";

describe("step runner", () => {
  let dir: string;
  let eventFile: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "standardizer-steps-"));
    eventFile = join(dir, "events.ndjson");
    initializeEventEmitter({
      runId: "run-steps",
      format: "json",
      verbose: false,
      agentLogs: false,
      eventFilePath: eventFile,
    });
  });

  afterEach(() => {
    resetEventEmitter();
    rmSync(dir, { recursive: true, force: true });
  });

  function phases(): string[] {
    return readFileSync(eventFile, "utf-8")
      .trim()
      .split("\n")
      .map((line) => {
        const parsed: { step: string; phase?: string } = JSON.parse(line);
        return `${parsed.step}:${parsed.phase ?? "-"}`;
      });
  }

  test("runs steps in order inside their telemetry context", async () => {
    const seen: string[] = [];
    await runSteps(
      [
        { name: "load", run: () => void seen.push(getTelemetryContext().step) },
        { name: "splits", run: async () => void seen.push(getTelemetryContext().step) },
      ],
      {},
      new Logger()
    );
    expect(seen).toEqual(["load", "splits"]);
    expect(phases()).toEqual(["load:start", "load:end", "splits:start", "splits:end"]);
  });

  test("wraps foreign errors and stops the run", async () => {
    const ran: string[] = [];
    const failure = runSteps(
      [
        {
          name: "load",
          run: () => {
            throw new Error("boom");
          },
        },
        { name: "splits", run: () => void ran.push("splits") },
      ],
      {},
      new Logger()
    );
    await expect(failure).rejects.toMatchObject({ code: "STEP_ERROR", message: "boom" });
    expect(ran).toEqual([]);
    expect(phases()).toEqual(["load:start", "load:fail"]);
  });

  test("keeps pipeline errors as they are", async () => {
    const error = new SplitError("too small");
    await expect(
      runStep(
        {
          name: "splits",
          run: () => {
            throw error;
          },
        },
        {},
        new Logger()
      )
    ).rejects.toBe(error);
  });
});

describe("normalizeStepError", () => {
  test("wraps non-error values", () => {
    const wrapped = normalizeStepError("plain");
    expect(wrapped).toBeInstanceOf(PipelineError);
    expect(wrapped.code).toBe("STEP_ERROR");
    expect(wrapped.message).toBe("plain");
    expect(wrapped.cause).toBe("plain");
  });
});
