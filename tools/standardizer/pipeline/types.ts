export const STEP_ORDER = [
  "load",
  "splits",
  "standardize",
  "validate",
  "write",
] as const;

export type StepName = (typeof STEP_ORDER)[number];

export const TASKS = ["binary", "regression", "multilabel"] as const;
export type Task = (typeof TASKS)[number];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** A record as it comes off disk: field name to arbitrary JSON. */
export type RawRecord = { [key: string]: JsonValue };

export type FieldValue =
  | { kind: "string"; value: string }
  | { kind: "number"; value: number }
  | { kind: "boolean"; value: boolean }
  | { kind: "sequence"; items: FieldValue[] }
  | { kind: "mapping"; fields: TypedRecord }
  | { kind: "null" };

/** Field name to tagged value, in the record's natural key order. */
export type TypedRecord = ReadonlyMap<string, FieldValue>;

/** Named partitions in load order. */
export type DatasetSplits<T> = Map<string, T[]>;

export interface ExtractionSpec {
  textField?: string;
  labelField?: string;
  labelIsScore: boolean;
  threshold: number;
  multilabelFields?: Record<string, string>;
  joinConversationTurns: boolean;
}

export interface ResolvedSpec {
  readonly resolved: true;
  readonly textField: string | null;
  readonly labelField?: string;
  readonly labelIsScore: boolean;
  readonly threshold: number;
  readonly multilabelFields?: Readonly<Record<string, string>>;
  readonly joinConversationTurns: boolean;
}

export type Label =
  | { kind: "int"; value: number }
  | { kind: "float"; value: number }
  | { kind: "multilabel"; value: Record<string, 0 | 1> }
  | { kind: "categorical"; value: FieldValue };

export interface CanonicalRecord {
  readonly text: string;
  readonly label?: JsonValue;
}

export interface LabelOptions {
  task: Task;
  scoreField?: string;
  threshold: number;
}

export interface DatasetInfo {
  source: string;
  task: Task;
  textField: string | null;
  labelField: string | null;
  threshold: number | null;
  joinConversationTurns: boolean;
  splits: Record<string, number>;
  createdAt: string;
}

export interface PrepareOptions {
  name: string;
  inputPath: string;
  task: Task;
  scoreField?: string;
  /** Falls back to the registered spec's threshold when unset. */
  threshold?: number;
  seed: number;
  outDir: string;
  clean: boolean;
  registryPath?: string;
  runId: string;
  verbose: boolean;
  agentLogs: boolean;
  eventFile?: string;
  logFormat: LogFormat;
}

export interface PrepareResult {
  dataset: DatasetSplits<CanonicalRecord>;
  info: DatasetInfo;
  outDir: string;
}

export type LogFormat = "pretty" | "json";
export type EventType =
  | "step.lifecycle"
  | "file.read"
  | "file.write"
  | "registry.lookup"
  | "dataset.load"
  | "dataset.splits"
  | "schema.resolve"
  | "standardize.split"
  | "validation"
  | "summary";

export interface AgentEvent {
  ts: string;
  runId: string;
  level: "debug" | "info" | "warn" | "error";
  step: StepName | "system";
  eventType: EventType;
  message: string;
  phase?: "start" | "end" | "fail" | "progress";
  action?: string;
  durationMs?: number;
  records?: number;
  bytes?: number;
  path?: string;
  errorCode?: string;
  [key: string]: unknown;
}

export interface LogRuntimeConfig {
  runId: string;
  format: LogFormat;
  verbose: boolean;
  agentLogs: boolean;
  eventFilePath?: string;
}
