import { seededPermutation } from "../lib/rng.js";
import { SplitError } from "../pipeline/errors.js";
import { emitAgentEvent } from "../pipeline/events.js";
import type { DatasetSplits } from "../pipeline/types.js";

export const DEFAULT_SEED = 42;
export const TEST_FRACTION = 0.2;
export const VALIDATION_FRACTION = 0.1;

export interface TrainTestSplit<T> {
  train: T[];
  test: T[];
}

/**
 * Seeded train/test split. The test side takes `ceil(testSize * n)` records
 * from the front of the permutation and the train side the rest, both in
 * permutation order.
 */
export function trainTestSplit<T>(records: readonly T[], testSize: number, seed: number): TrainTestSplit<T> {
  const total = records.length;
  const testCount = Math.ceil(testSize * total);
  const trainCount = total - testCount;
  if (trainCount <= 0) {
    throw new SplitError(
      `With ${total} records and test size ${testSize} the resulting train split would be empty`
    );
  }
  const permutation = seededPermutation(total, seed);
  return {
    test: permutation.slice(0, testCount).map((index) => records[index]),
    train: permutation.slice(testCount).map((index) => records[index]),
  };
}

/**
 * Guarantees `train`, `validation` and `test` partitions. Without a `train`
 * split the first split is promoted and the others are dropped. When either
 * `validation` or `test` is missing, both are regenerated from `train`, and
 * any partially present one is discarded.
 */
export function ensureSplits<T>(dataset: DatasetSplits<T>, seed: number = DEFAULT_SEED): DatasetSplits<T> {
  let current = dataset;
  if (!current.has("train")) {
    const first = current.entries().next();
    if (first.done) {
      throw new SplitError("Dataset has no splits");
    }
    const [name, records] = first.value;
    emitAgentEvent({
      level: "info",
      eventType: "dataset.splits",
      message: "Promoting first split to train",
      action: "promote",
      from: name,
      dropped: [...current.keys()].filter((key) => key !== name),
    });
    current = new Map([["train", records]]);
  }

  if (current.has("validation") && current.has("test")) {
    return current;
  }

  const train = current.get("train") ?? [];
  const outer = trainTestSplit(train, TEST_FRACTION, seed);
  const inner = trainTestSplit(outer.train, VALIDATION_FRACTION, seed);
  const result: DatasetSplits<T> = new Map([
    ["train", inner.train],
    ["test", outer.test],
    ["validation", inner.test],
  ]);
  emitAgentEvent({
    level: "info",
    eventType: "dataset.splits",
    message: "Generated validation and test splits",
    action: "regenerate",
    seed,
    discarded: [...current.keys()].filter((key) => key !== "train"),
    train: inner.train.length,
    test: outer.test.length,
    validation: inner.test.length,
  });
  return result;
}
