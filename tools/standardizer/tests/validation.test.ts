import { describe, expect, test } from "vitest";
import { validateDataset } from "../lib/validation.js";
import type { DatasetInfo } from "../pipeline/types.js";

const info: DatasetInfo = {
  source: "demo/data",
  task: "binary",
  textField: "text",
  labelField: null,
  threshold: 0.5,
  joinConversationTurns: false,
  splits: { train: 2 },
  createdAt: "2026-01-02T03:04:05.000Z",
};

describe("validateDataset", () => {
  test("accepts well-formed output", () => {
    const splits = new Map([["train", [{ text: "a", label: 1 }, { text: "b" }]]]);
    expect(validateDataset(splits, info)).toEqual([]);
  });

  test("reports invalid records per split file", () => {
    const splits = new Map([
      ["train", [{ text: "ok" }, { label: 1 }, { text: "c", id: 5 }]],
      ["test", [{ text: "d", label: null }]],
    ]);
    expect(validateDataset(splits)).toEqual([
      {
        file: "train.jsonl",
        messages: ["[1]/ must have required property 'text'", "[2]/ must NOT have additional properties"],
      },
      { file: "test.jsonl", messages: ["[0]/label must NOT be valid"] },
    ]);
  });

  test("summarizes long failure lists", () => {
    const records = Array.from({ length: 25 }, () => ({ text: 1 }));
    const [issue] = validateDataset(new Map([["train", records]]));
    expect(issue.messages).toHaveLength(21);
    expect(issue.messages[20]).toBe("... 25 invalid records in total");
  });

  test("checks dataset info against its schema", () => {
    const splits = new Map([["train", [{ text: "a" }, { text: "b" }]]]);
    expect(validateDataset(splits, { ...info, createdAt: "yesterday" })).toEqual([
      { file: "dataset_info.json", messages: ['/createdAt must match format "date-time"'] },
    ]);
  });

  test("checks declared split sizes", () => {
    const splits = new Map([["train", [{ text: "a" }]]]);
    expect(validateDataset(splits, info)).toEqual([
      { file: "dataset_info.json", messages: ['split "train" declares 2 records but has 1'] },
    ]);
  });
});
