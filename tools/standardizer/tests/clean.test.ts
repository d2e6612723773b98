import { describe, expect, test } from "vitest";
import { basicClean } from "../lib/clean.js";

describe("basicClean", () => {
  test("replaces line breaks and links", () => {
    expect(basicClean("Hello<br/>world  http://x.y/z")).toBe("Hello world URL");
  });

  test("handles www links and mixed case tags", () => {
    expect(basicClean("see www.example.org<BR >now")).toBe("see URL now");
  });

  test("collapses whitespace and trims", () => {
    expect(basicClean("  a \n\t b  ")).toBe("a b");
  });
});
