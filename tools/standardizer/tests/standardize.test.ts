import { describe, expect, test } from "vitest";
import type { ExtractionSpec, RawRecord } from "../pipeline/types.js";
import { emptySpec } from "../registry/registry.js";
import { buildDatasetInfo, sampleRecord, standardizeDataset } from "../standardize/standardize.js";

const toxicitySpec: ExtractionSpec = {
  ...emptySpec(),
  labelField: "toxicity",
  labelIsScore: true,
  threshold: 0.9,
};

function scored(): Map<string, RawRecord[]> {
  return new Map([
    [
      "train",
      [
        { text: "a", toxicity: 0.95, id: 1 },
        { text: "b", toxicity: 0.1, id: 2 },
      ],
    ],
    ["test", [{ text: "c", toxicity: 0.5, id: 3 }]],
  ]);
}

describe("standardizeDataset", () => {
  test("keeps only text and label", () => {
    const { dataset } = standardizeDataset(scored(), toxicitySpec, { task: "binary" });
    expect(dataset.get("train")).toEqual([
      { text: "a", label: 1 },
      { text: "b", label: 0 },
    ]);
    expect(dataset.get("test")).toEqual([{ text: "c", label: 0 }]);
  });

  test("lets an explicit threshold override the registered one", () => {
    const { dataset, labelOptions } = standardizeDataset(scored(), toxicitySpec, {
      task: "binary",
      threshold: 0.5,
    });
    expect(labelOptions.threshold).toBe(0.5);
    expect(dataset.get("test")).toEqual([{ text: "c", label: 1 }]);
  });

  test("omits the label key when no label is found", () => {
    const { dataset } = standardizeDataset(new Map([["train", [{ text: "x" }]]]), emptySpec(), {
      task: "binary",
    });
    const [record] = dataset.get("train") ?? [];
    expect(record).toEqual({ text: "x" });
    expect(Object.keys(record)).toEqual(["text"]);
    expect(Object.isFrozen(record)).toBe(true);
  });

  test("cleans text on request", () => {
    const { dataset } = standardizeDataset(
      new Map([["train", [{ text: "Hello<br/>world  http://x.y/z" }]]]),
      emptySpec(),
      { task: "binary", clean: true }
    );
    expect(dataset.get("train")).toEqual([{ text: "Hello world URL" }]);
  });

  test("resolves the text field once for every split", () => {
    const dataset = new Map<string, RawRecord[]>([
      ["train", [{ prompt: "p1" }]],
      ["test", [{ text: "t1" }]],
    ]);
    const result = standardizeDataset(dataset, emptySpec(), { task: "binary" });
    expect(result.resolved.textField).toBe("prompt");
    expect(result.dataset.get("test")).toEqual([{ text: "null" }]);
  });
});

describe("sampleRecord", () => {
  test("skips empty leading splits", () => {
    const sample = sampleRecord(
      new Map<string, RawRecord[]>([
        ["train", []],
        ["test", [{ text: "t" }]],
      ])
    );
    expect([...sample.keys()]).toEqual(["text"]);
  });

  test("is empty for a dataset without records", () => {
    expect(sampleRecord(new Map([["train", []]])).size).toBe(0);
  });
});

describe("buildDatasetInfo", () => {
  const createdAt = new Date("2026-01-02T03:04:05.000Z");

  test("describes a binary run", () => {
    const result = standardizeDataset(scored(), toxicitySpec, { task: "binary" });
    expect(buildDatasetInfo("demo/toxicity", result, createdAt)).toEqual({
      source: "demo/toxicity",
      task: "binary",
      textField: "text",
      labelField: "toxicity",
      threshold: 0.9,
      joinConversationTurns: false,
      splits: { train: 2, test: 1 },
      createdAt: "2026-01-02T03:04:05.000Z",
    });
  });

  test("falls back to the score field and drops the threshold outside binary tasks", () => {
    const result = standardizeDataset(scored(), emptySpec(), {
      task: "regression",
      scoreField: "toxicity",
    });
    expect(result.dataset.get("test")).toEqual([{ text: "c", label: 0.5 }]);
    expect(buildDatasetInfo("demo/toxicity", result, createdAt)).toMatchObject({
      task: "regression",
      labelField: "toxicity",
      threshold: null,
    });
  });
});
