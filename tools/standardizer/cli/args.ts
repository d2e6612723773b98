import { parseArgs } from "util";
import { defaultOutDir } from "../lib/paths.js";
import { TASKS, type PrepareOptions, type Task } from "../pipeline/types.js";
import { DEFAULT_SEED } from "../splits/ensure-splits.js";

const USAGE =
  "Usage: tsx tools/standardizer/cli/prepare-data.ts --name <dataset-id> --input <path> [--task binary|regression|multilabel] [--score-key <field>] [--thr <float>] [--seed <int>] [--out <dir>] [--clean] [--registry <path>] [--log-format pretty|json] [--verbose] [--quiet] [--event-file <path>] [--run-id <id>]";

export class CliUsageError extends Error {}

function isTask(value: string): value is Task {
  return TASKS.some((task) => task === value);
}

export function parseCliArgs(argv: string[]): PrepareOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      name: { type: "string" },
      input: { type: "string" },
      task: { type: "string" },
      "score-key": { type: "string" },
      thr: { type: "string" },
      seed: { type: "string" },
      out: { type: "string" },
      clean: { type: "boolean" },
      registry: { type: "string" },
      "log-format": { type: "string" },
      verbose: { type: "boolean" },
      quiet: { type: "boolean" },
      "event-file": { type: "string" },
      "run-id": { type: "string" },
    },
  });

  if (!values.name || !values.input) {
    throw new CliUsageError(USAGE);
  }

  const task = values.task ?? "binary";
  if (!isTask(task)) {
    throw new CliUsageError(`Invalid --task value: ${task}. Valid tasks: ${TASKS.join(", ")}`);
  }

  const threshold = values.thr !== undefined ? Number.parseFloat(values.thr) : undefined;
  if (threshold !== undefined && !Number.isFinite(threshold)) {
    throw new CliUsageError("--thr must be a number");
  }

  const seed = values.seed !== undefined ? Number.parseInt(values.seed, 10) : DEFAULT_SEED;
  if (!Number.isInteger(seed) || seed < 0) {
    throw new CliUsageError("--seed must be a non-negative integer");
  }

  const logFormat = values["log-format"] ?? "pretty";
  if (logFormat !== "pretty" && logFormat !== "json") {
    throw new CliUsageError("--log-format must be pretty or json");
  }

  return {
    name: values.name,
    inputPath: values.input,
    task,
    scoreField: values["score-key"] || undefined,
    threshold,
    seed,
    outDir: values.out || defaultOutDir(),
    clean: values.clean ?? false,
    registryPath: values.registry,
    runId: values["run-id"] || createRunId(values.name),
    verbose: values.verbose ?? false,
    agentLogs: !(values.quiet ?? false),
    eventFile: values["event-file"],
    logFormat,
  };
}

function createRunId(name: string): string {
  const now = new Date().toISOString().replace(/[.:]/g, "-");
  return `${toSlug(name)}-${now}`;
}

function toSlug(input: string): string {
  return input
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 40);
}
