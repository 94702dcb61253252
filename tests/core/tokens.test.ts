import { describe, expect, it } from "vitest";
import { countTokens, formatBytes } from "../../src/core/tokens.js";

describe("countTokens", () => {
  it("is zero for empty text", () => {
    expect(countTokens("")).toBe(0);
  });

  it("grows with the text", () => {
    const short = countTokens("hello world");
    expect(short).toBeGreaterThan(0);
    expect(countTokens("hello world ".repeat(20))).toBeGreaterThan(short);
  });
});

describe("formatBytes", () => {
  it("picks a unit", () => {
    expect(formatBytes(0)).toBe("0 B");
    expect(formatBytes(512)).toBe("512 B");
    expect(formatBytes(1536)).toBe("1.5 KB");
    expect(formatBytes(10 * 1024)).toBe("10 KB");
    expect(formatBytes(5 * 1024 * 1024)).toBe("5.0 MB");
  });
});
