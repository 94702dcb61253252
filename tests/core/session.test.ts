import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { UserInputError } from "../../src/errors.js";
import { selectedPaths } from "../../src/core/selection.js";
import {
  applyParsedEdits,
  clearResponse,
  createSession,
  forgetProject,
  loadCandidates,
  resolveProjectRoot,
  setResponse,
  toggleApplyChoice
} from "../../src/core/session.js";

const RESPONSE = [
  "file: a.txt",
  "--- START CODE ---",
  "alpha",
  "--- END CODE ---",
  "file: b.txt",
  "--- START CODE ---",
  "beta",
  "--- END CODE ---"
].join("\n");

describe("resolveProjectRoot", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), "session-"));
    await fsp.writeFile(path.join(dir, "file.txt"), "x", "utf8");
  });

  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true });
  });

  it("accepts an existing directory", async () => {
    expect(await resolveProjectRoot(`  ${dir}  `)).toBe(dir);
  });

  it("rejects files, missing paths and blank input", async () => {
    for (const input of [path.join(dir, "file.txt"), path.join(dir, "missing"), "   ", null]) {
      await expect(resolveProjectRoot(input)).rejects.toThrow(UserInputError);
    }
    await expect(resolveProjectRoot(undefined)).rejects.toThrow("Invalid or missing folder path.");
  });
});

describe("session", () => {
  it("starts empty", () => {
    expect(createSession()).toEqual({
      rootDir: null,
      selection: new Map(),
      parsedEdits: [],
      applyChoices: new Map(),
      parseError: null,
      backups: []
    });
  });

  it("selects every new candidate", () => {
    const session = createSession();
    loadCandidates(session, "/proj", ["a.ts", "b.ts"]);
    expect(session.rootDir).toBe("/proj");
    expect(selectedPaths(session.selection)).toEqual(["a.ts", "b.ts"]);
  });

  it("checks every parsed edit for apply", () => {
    const session = createSession();
    setResponse(session, RESPONSE);
    expect(session.parseError).toBeNull();
    expect(session.parsedEdits.map(e => e.filename)).toEqual(["a.txt", "b.txt"]);
    expect([...session.applyChoices]).toEqual([
      ["a.txt", true],
      ["b.txt", true]
    ]);
  });

  it("reports a blank response", () => {
    const session = createSession();
    setResponse(session, "  \n ");
    expect(session.parseError).toBe("No response provided.");
  });

  it("reports a response without blocks", () => {
    const session = createSession();
    setResponse(session, "Sorry, I cannot help with that.");
    expect(session.parseError).toBe("No code blocks detected.");
    expect(session.parsedEdits).toEqual([]);
  });

  it("drops earlier edits when a new response is malformed", () => {
    const session = createSession();
    setResponse(session, RESPONSE);
    setResponse(session, "file: a.txt\nnot a delimiter");
    expect(session.parsedEdits).toEqual([]);
    expect(session.applyChoices.size).toBe(0);
    expect(session.parseError).toBe(
      "Expected '--- START CODE ---' after file line for file 'a.txt' but got 'not a delimiter' at line 2"
    );
  });

  it("toggles known apply choices only", () => {
    const session = createSession();
    setResponse(session, RESPONSE);
    toggleApplyChoice(session, "a.txt");
    toggleApplyChoice(session, "zzz.txt");
    expect(session.applyChoices.get("a.txt")).toBe(false);
    expect(session.applyChoices.has("zzz.txt")).toBe(false);
  });

  it("clears the parsed response", () => {
    const session = createSession();
    setResponse(session, "   ");
    clearResponse(session);
    expect(session.parseError).toBeNull();
    expect(session.parsedEdits).toEqual([]);
  });
});

describe("applyParsedEdits", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), "session-apply-"));
  });

  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true });
  });

  it("writes the checked edits into the project folder", async () => {
    const session = createSession();
    loadCandidates(session, dir, []);
    setResponse(session, "file: a.py\n--- START CODE ---\nprint(1)\n--- END CODE ---");

    expect(await applyParsedEdits(session)).toBe("Updated/created (old versions renamed to *.bak): a.py");
    expect(await fsp.readFile(path.join(dir, "a.py"), "utf8")).toBe("print(1)");
  });

  it("refuses a project folder that no longer exists", async () => {
    const missing = path.join(dir, "missing", "proj");
    const session = createSession();
    loadCandidates(session, missing, []);
    setResponse(session, "file: a.py\n--- START CODE ---\nprint(1)\n--- END CODE ---");

    expect(await applyParsedEdits(session)).toBe("Invalid or missing folder path.");
    await expect(fsp.access(path.join(dir, "missing"))).rejects.toThrow();
  });

  it("applies nothing after a failed scan", async () => {
    const session = createSession();
    loadCandidates(session, dir, ["a.py"]);
    setResponse(session, "file: a.py\n--- START CODE ---\nprint(1)\n--- END CODE ---");
    forgetProject(session);

    expect(session.rootDir).toBeNull();
    expect(session.selection.size).toBe(0);
    expect(await applyParsedEdits(session)).toBe("Invalid or missing folder path.");
    expect(await fsp.readdir(dir)).toEqual([]);
  });

  it("reports an empty response", async () => {
    const session = createSession();
    loadCandidates(session, dir, []);
    expect(await applyParsedEdits(session)).toBe("No changes to apply.");
  });
});
