import { AsyncLocalStorage } from "async_hooks";
import type { StepName } from "./types.js";

export interface TelemetryContextValue {
  step: StepName | "system";
  split?: string;
}

const storage = new AsyncLocalStorage<TelemetryContextValue>();

export function runWithTelemetryContext<T>(
  value: TelemetryContextValue,
  fn: () => Promise<T>
): Promise<T> {
  return storage.run(value, fn);
}

/** Tags every event emitted inside `fn` with the split being processed. */
export function withSplitContext<T>(split: string, fn: () => T): T {
  return storage.run({ ...getTelemetryContext(), split }, fn);
}

export function getTelemetryContext(): TelemetryContextValue {
  return storage.getStore() ?? { step: "system" };
}
