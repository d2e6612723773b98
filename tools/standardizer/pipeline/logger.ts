import type { EventType, StepName } from "./types.js";
import { emitAgentEvent, type LogLevel } from "./events.js";

export interface LogMeta {
  step?: StepName | "system";
  eventType?: EventType;
  phase?: "start" | "end" | "fail" | "progress";
  action?: string;
  durationMs?: number;
  records?: number;
  path?: string;
  errorCode?: string;
  [key: string]: unknown;
}

/** Thin facade over the process-wide event emitter. */
export class Logger {
  constructor(private readonly defaults: LogMeta = {}) {}

  debug(message: string, meta: LogMeta = {}): void {
    this.emit("debug", message, meta);
  }

  info(message: string, meta: LogMeta = {}): void {
    this.emit("info", message, meta);
  }

  warn(message: string, meta: LogMeta = {}): void {
    this.emit("warn", message, meta);
  }

  error(message: string, meta: LogMeta = {}): void {
    this.emit("error", message, meta);
  }

  private emit(level: LogLevel, message: string, meta: LogMeta): void {
    const merged = { ...this.defaults, ...meta };
    emitAgentEvent({
      level,
      message,
      ...merged,
      eventType: merged.eventType ?? "step.lifecycle",
    });
  }
}
