import { describe, expect, test } from "vitest";
import { toTypedRecord } from "../lib/value.js";
import { LabelCoercionError } from "../pipeline/errors.js";
import type { ExtractionSpec, JsonValue, LabelOptions, RawRecord } from "../pipeline/types.js";
import { emptySpec } from "../registry/registry.js";
import { extractLabel, labelToJson } from "../standardize/label.js";
import { resolveSpec } from "../standardize/resolve.js";

function labelFor(
  record: RawRecord,
  overrides: Partial<ExtractionSpec>,
  options: LabelOptions
): JsonValue | undefined {
  const typed = toTypedRecord(record);
  const resolved = resolveSpec({ ...emptySpec(), ...overrides }, typed);
  const label = extractLabel(resolved, typed, options);
  return label === null ? undefined : labelToJson(label);
}

const binary = (threshold = 0.5): LabelOptions => ({ task: "binary", threshold });

describe("score thresholding", () => {
  test("thresholds a registered score field for binary tasks", () => {
    const spec = { labelField: "toxicity", labelIsScore: true };
    expect(labelFor({ toxicity: 0.82 }, spec, binary(0.5))).toBe(1);
    expect(labelFor({ toxicity: 0.82 }, spec, binary(0.9))).toBe(0);
  });

  test("treats the threshold as inclusive", () => {
    expect(labelFor({ toxicity: 0.5 }, { labelField: "toxicity", labelIsScore: true }, binary(0.5))).toBe(1);
  });

  test("parses numeric strings before comparing", () => {
    expect(labelFor({ toxicity: " 0.7 " }, { labelField: "toxicity", labelIsScore: true }, binary())).toBe(1);
  });

  test("fails on a score that is not numeric", () => {
    expect(() =>
      labelFor({ toxicity: "high" }, { labelField: "toxicity", labelIsScore: true }, binary())
    ).toThrow(LabelCoercionError);
  });

  test("thresholds numeric labels for binary tasks without the score flag", () => {
    expect(labelFor({ stars: 3 }, { labelField: "stars" }, binary(2.5))).toBe(1);
  });
});

describe("multilabel", () => {
  const fields = { toxicity: "toxicity", insult: "insult" };

  test("maps every declared field through the threshold", () => {
    expect(
      labelFor({ toxicity: 0.6, insult: 0.2 }, { multilabelFields: fields }, { task: "multilabel", threshold: 0.5 })
    ).toEqual({ toxicity: 1, insult: 0 });
  });

  test("omits declared fields missing from the record", () => {
    expect(
      labelFor(
        { toxicity: 0.5 },
        { multilabelFields: { toxicity: "toxicity", threat: "threat" } },
        { task: "multilabel", threshold: 0.5 }
      )
    ).toEqual({ toxicity: 1 });
  });

  test("falls through to other rules when no mapping is declared", () => {
    expect(labelFor({ label: 2.9 }, {}, { task: "multilabel", threshold: 0.5 })).toBe(2);
  });

  test("ignores the mapping for non-multilabel tasks", () => {
    expect(labelFor({ toxicity: 0.6, label: 0 }, { multilabelFields: fields }, binary())).toBe(0);
  });
});

describe("explicit label field", () => {
  test("passes categorical values through for binary tasks", () => {
    expect(labelFor({ sentiment: "positive" }, { labelField: "sentiment" }, binary())).toBe("positive");
  });

  test("keeps numeric values as floats for regression", () => {
    expect(labelFor({ score: 0.37 }, { labelField: "score" }, { task: "regression", threshold: 0.5 })).toBe(0.37);
  });

  test("passes numeric strings through untouched for regression", () => {
    expect(labelFor({ score: "0.37" }, { labelField: "score" }, { task: "regression", threshold: 0.5 })).toBe("0.37");
  });

  test("truncates numbers to integers for other tasks", () => {
    expect(labelFor({ rating: 2.9 }, { labelField: "rating" }, { task: "multilabel", threshold: 0.5 })).toBe(2);
  });

  test("stops the chain when the field holds null", () => {
    expect(labelFor({ rating: null, label: 1 }, { labelField: "rating" }, binary())).toBeUndefined();
  });

  test("takes precedence over the score hint", () => {
    expect(
      labelFor({ label_a: 0.1, tox: 0.9 }, { labelField: "label_a" }, { ...binary(), scoreField: "tox" })
    ).toBe(0);
  });
});

describe("score field hint", () => {
  test("thresholds for binary tasks", () => {
    expect(labelFor({ tox: 0.3 }, {}, { task: "binary", threshold: 0.25, scoreField: "tox" })).toBe(1);
  });

  test("returns the float for other tasks", () => {
    expect(labelFor({ tox: "0.3" }, {}, { task: "regression", threshold: 0.5, scoreField: "tox" })).toBe(0.3);
  });

  test("is skipped when the hinted field is absent", () => {
    expect(labelFor({ label: 1 }, {}, { task: "binary", threshold: 0.5, scoreField: "tox" })).toBe(1);
  });
});

describe("conventional label names", () => {
  test("uses the first name in list order", () => {
    expect(labelFor({ class: "spam", y: 1 }, {}, binary())).toBe(1);
  });

  test("coerces booleans to integers", () => {
    expect(labelFor({ target: true }, {}, binary())).toBe(1);
  });

  test("passes sequences through", () => {
    expect(labelFor({ labels: ["a", "b"] }, {}, binary())).toEqual(["a", "b"]);
  });

  test("yields no label when nothing applies", () => {
    expect(labelFor({ text: "only text" }, {}, binary())).toBeUndefined();
  });
});

describe("non-finite values", () => {
  test("rejects a NaN score for regression", () => {
    expect(() =>
      labelFor({ tox: "nan" }, {}, { task: "regression", threshold: 0.5, scoreField: "tox" })
    ).toThrow('label from field "tox" is not a finite number: NaN');
  });

  test("rejects an infinite label value", () => {
    expect(() =>
      labelFor({ score: Infinity }, { labelField: "score" }, { task: "regression", threshold: 0.5 })
    ).toThrow(LabelCoercionError);
    expect(() => labelFor({ label: -Infinity }, {}, { task: "multilabel", threshold: 0.5 })).toThrow(
      'label from field "label" is not a finite number: -Infinity'
    );
  });

  test("still thresholds an infinite score for binary tasks", () => {
    expect(labelFor({ tox: "inf" }, {}, { task: "binary", threshold: 0.5, scoreField: "tox" })).toBe(1);
  });
});

describe("boolean values", () => {
  test("count as 1 and 0", () => {
    expect(labelFor({ flag: true }, { labelField: "flag" }, binary())).toBe(1);
    expect(labelFor({ flag: false }, { labelField: "flag" }, { task: "regression", threshold: 0.5 })).toBe(0);
    expect(labelFor({ label: true }, {}, { task: "multilabel", threshold: 0.5 })).toBe(1);
  });
});
