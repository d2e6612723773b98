import { appendFileSync } from "fs";
import { dirname } from "path";
import { ensureDir } from "../lib/json.js";
import { getTelemetryContext } from "./telemetry-context.js";
import type { AgentEvent, EventType, LogRuntimeConfig } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface EmitInput {
  level: LogLevel;
  message: string;
  eventType?: EventType;
  step?: AgentEvent["step"];
  phase?: AgentEvent["phase"];
  action?: string;
  durationMs?: number;
  records?: number;
  bytes?: number;
  path?: string;
  errorCode?: string;
  [key: string]: unknown;
}

class EventEmitter {
  constructor(private readonly config: LogRuntimeConfig) {}

  emit(input: EmitInput): void {
    const ctx = getTelemetryContext();
    const { level, message, ...rest } = input;
    const baseEvent: AgentEvent = {
      ts: new Date().toISOString(),
      runId: this.config.runId,
      level,
      step: input.step ?? ctx.step,
      eventType: input.eventType ?? "step.lifecycle",
      message,
      split: ctx.split,
      ...rest,
    };

    const event = redactEvent(baseEvent);

    if (this.config.agentLogs) {
      this.writeTerminal(event);
    }

    if (this.config.eventFilePath) {
      this.writeFileLine(this.config.eventFilePath, JSON.stringify(event));
    }
  }

  private writeTerminal(event: AgentEvent): void {
    if (!shouldPrintToTerminal(event, this.config.verbose)) {
      return;
    }

    const line = this.renderTerminalLine(event);

    if (event.level === "error") {
      console.error(line);
      return;
    }
    if (event.level === "warn") {
      console.warn(line);
      return;
    }
    console.log(line);
  }

  private renderTerminalLine(event: AgentEvent): string {
    if (this.config.format === "json") {
      return JSON.stringify(event);
    }
    if (this.config.verbose) {
      return this.renderPretty(event);
    }
    return this.renderCondensed(event);
  }

  renderPretty(event: AgentEvent): string {
    const prefix = `${event.ts} [${event.step}] [${event.eventType}]`;
    const extras = Object.entries(event)
      .filter(([key]) => !PRETTY_HIDDEN_KEYS.has(key))
      .filter(([, value]) => value !== undefined && value !== null && value !== "")
      .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
      .join(" ");

    return `${prefix} ${event.message}${extras ? ` ${extras}` : ""}`;
  }

  renderCondensed(event: AgentEvent): string {
    const time = formatShortTime(event.ts);
    const phase = event.phase ? ` ${event.phase}` : "";
    const prefix = `[${time}] ${event.step}${phase}`;
    const extras = renderCondensedExtras(event);
    return `${prefix} ${event.message}${extras ? ` ${extras}` : ""}`;
  }

  private writeFileLine(path: string, line: string): void {
    ensureDir(dirname(path));
    appendFileSync(path, `${line}\n`);
  }
}

const PRETTY_HIDDEN_KEYS = new Set([
  "ts",
  "runId",
  "level",
  "step",
  "eventType",
  "message",
]);

let globalEmitter: EventEmitter | null = null;

export function initializeEventEmitter(config: LogRuntimeConfig): void {
  globalEmitter = new EventEmitter(config);
}

export function resetEventEmitter(): void {
  globalEmitter = null;
}

export function emitAgentEvent(input: EmitInput): void {
  if (!globalEmitter) {
    return;
  }
  globalEmitter.emit(input);
}

function redactEvent(event: AgentEvent): AgentEvent {
  const redacted: AgentEvent = { ...event };
  for (const [key, value] of Object.entries(event)) {
    redacted[key] = redactValue(key, value);
  }
  return redacted;
}

export function redactEventForTest(event: AgentEvent): AgentEvent {
  return redactEvent(event);
}

export function formatPrettyForTest(event: AgentEvent): string {
  const emitter = new EventEmitter({
    runId: event.runId,
    format: "pretty",
    verbose: true,
    agentLogs: false,
  });
  return emitter.renderPretty(event);
}

export function formatCondensedForTest(event: AgentEvent): string {
  const emitter = new EventEmitter({
    runId: event.runId,
    format: "pretty",
    verbose: false,
    agentLogs: false,
  });
  return emitter.renderCondensed(event);
}

export function shouldPrintToTerminalForTest(event: AgentEvent, verbose: boolean): boolean {
  return shouldPrintToTerminal(event, verbose);
}

function redactValue(key: string, value: unknown): unknown {
  if (value == null) {
    return value;
  }

  if (isSensitiveKey(key.toLowerCase())) {
    return "[REDACTED]";
  }

  if (typeof value === "string") {
    return truncate(value, 240);
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(key, item));
  }

  if (typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = redactValue(k, v);
    }
    return out;
  }

  return value;
}

function isSensitiveKey(key: string): boolean {
  return (
    key.includes("token") ||
    key.includes("apikey") ||
    key.includes("api_key") ||
    key.includes("secret") ||
    key.includes("password") ||
    key.includes("authorization")
  );
}

function truncate(value: string, max: number): string {
  if (value.length <= max) {
    return value;
  }
  return `${value.slice(0, max)}...[truncated]`;
}

function shouldPrintToTerminal(event: AgentEvent, verbose: boolean): boolean {
  if (verbose) {
    return true;
  }

  if (event.level === "error" || event.level === "warn") {
    return true;
  }

  if (event.level === "debug") {
    return false;
  }

  if (event.eventType === "file.read" || event.eventType === "file.write") {
    return false;
  }

  if (event.eventType === "standardize.split") {
    return event.phase === "end";
  }

  if (event.eventType === "step.lifecycle") {
    return event.phase !== "progress";
  }

  return true;
}

function renderCondensedExtras(event: AgentEvent): string {
  const keys: string[] = ["split", "records", "durationMs", "errorCode"];
  const out: string[] = [];
  for (const key of keys) {
    const value = event[key];
    if (value === undefined || value === null || value === "") {
      continue;
    }
    out.push(`${key}=${JSON.stringify(value)}`);
  }
  return out.join(" ");
}

function formatShortTime(ts: string): string {
  const match = ts.match(/T(\d{2}:\d{2}:\d{2})/);
  if (match) {
    return match[1];
  }
  return ts;
}
