import { describe, expect, it } from "vitest";
import {
  hasAllowedExtension,
  isHiddenOrExcluded,
  parseExclusions,
  parseExtensions
} from "../../src/core/pathFilter.js";

describe("isHiddenOrExcluded", () => {
  it("keeps ordinary paths", () => {
    expect(isHiddenOrExcluded("src/app.ts", [])).toBe(false);
    expect(isHiddenOrExcluded("./src/app.ts", [])).toBe(false);
  });

  it("hides any dot-prefixed segment", () => {
    expect(isHiddenOrExcluded(".env", [])).toBe(true);
    expect(isHiddenOrExcluded("src/.cache/x.ts", [])).toBe(true);
  });

  it("excludes a token equal to a segment", () => {
    expect(isHiddenOrExcluded("node_modules/pkg/index.js", ["node_modules"])).toBe(true);
    expect(isHiddenOrExcluded("web/node_modules", ["node_modules"])).toBe(true);
  });

  it("excludes a token contained anywhere in the path", () => {
    expect(isHiddenOrExcluded("src/my_venv_copy/a.py", ["venv"])).toBe(true);
    expect(isHiddenOrExcluded("src/app.ts", ["venv"])).toBe(false);
  });

  it("works on backslash-separated paths", () => {
    expect(isHiddenOrExcluded("pkg\\build\\out.js", ["build"])).toBe(true);
  });

  it("ignores empty tokens", () => {
    expect(isHiddenOrExcluded("src/app.ts", [""])).toBe(false);
  });
});

describe("hasAllowedExtension", () => {
  it("matches suffixes case-insensitively", () => {
    expect(hasAllowedExtension("App.TS", [".ts"])).toBe(true);
    expect(hasAllowedExtension("notes.txt", [".ts", ".py"])).toBe(false);
    expect(hasAllowedExtension("a.ts", [])).toBe(false);
  });
});

describe("parseExtensions", () => {
  it("normalises, de-duplicates and keeps order", () => {
    expect(parseExtensions("ts, .JS, ,.ts, py")).toEqual([".ts", ".js", ".py"]);
  });

  it("returns nothing for blank text", () => {
    expect(parseExtensions(" , ")).toEqual([]);
  });
});

describe("parseExclusions", () => {
  it("trims, de-duplicates and sorts", () => {
    expect(parseExclusions(" venv, build , venv,, ")).toEqual(["build", "venv"]);
  });
});
