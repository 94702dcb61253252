import { describe, expect, it } from "vitest";
import {
  stripCommentsGeneric,
  stripHashComments,
  stripHtmlComments,
  transformContent
} from "../../src/core/transform.js";

const STRIP = { removeComments: true, minify: false };
const MINIFY = { removeComments: false, minify: true };

describe("comment stripping", () => {
  it("removes block and line comments", () => {
    expect(stripCommentsGeneric("/* doc */\nconst a = 1; // one\n")).toBe("\nconst a = 1; \n");
  });

  it("removes hash comments", () => {
    expect(stripHashComments("# header\nx = 1\n")).toBe("\nx = 1\n");
  });

  it("removes markup comments", () => {
    expect(stripHtmlComments("a<!-- hidden\nline -->b")).toBe("ab");
  });
});

describe("transformContent", () => {
  it("returns the text unchanged with no option set", async () => {
    const text = "// keep\nconst a = 1;";
    expect(await transformContent(text, ".ts", { removeComments: false, minify: false })).toBe(text);
  });

  it("picks the stripper by extension", async () => {
    expect(await transformContent("# c\nx = 1", ".PY", STRIP)).toBe("\nx = 1");
    expect(await transformContent("<!-- c -->text", ".md", STRIP)).toBe("text");
    expect(await transformContent("# not a comment", ".csv", STRIP)).toBe("# not a comment");
  });

  it("compacts JSON", async () => {
    expect(await transformContent('{\n  "a": [1, 2]\n}\n', ".json", MINIFY)).toBe('{"a":[1,2]}');
  });

  it("keeps invalid JSON as it was", async () => {
    expect(await transformContent("{ broken", ".json", MINIFY)).toBe("{ broken");
  });

  it("minifies stylesheets", async () => {
    expect(await transformContent("a {\n  color: red;\n}\n", ".css", MINIFY)).toBe("a{color:red}");
  });

  it("trims line ends for other text", async () => {
    expect(await transformContent("a  \nb\t\n", ".txt", MINIFY)).toBe("a\nb\n");
  });
});
