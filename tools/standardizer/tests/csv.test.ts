import { describe, expect, test } from "vitest";
import { csvToRecords, parseCsv } from "../lib/csv.js";

describe("parseCsv", () => {
  test("strips the byte order mark and skips blank rows", () => {
    const parsed = parseCsv("\uFEFFtext,label\r\n\r\nhi,1\r\n");
    expect(parsed.headers).toEqual(["text", "label"]);
    expect(parsed.rows).toEqual([["hi", "1"]]);
  });

  test("keeps commas and escaped quotes inside quoted cells", () => {
    const parsed = parseCsv('text,label\n"a, ""b""",0\n');
    expect(parsed.rows).toEqual([['a, "b"', "0"]]);
  });
});

describe("csvToRecords", () => {
  test("infers numbers and nulls", () => {
    expect(csvToRecords("text,score,note\nhello,0.25,\nbye,-3\n")).toEqual([
      { text: "hello", score: 0.25, note: null },
      { text: "bye", score: -3, note: null },
    ]);
  });

  test("keeps non-numeric strings", () => {
    expect(csvToRecords("id,text\n007x,abc\n")).toEqual([{ id: "007x", text: "abc" }]);
  });
});
