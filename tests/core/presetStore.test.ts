import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  loadPresets,
  normalizePreset,
  removePreset,
  savePresets,
  upsertPreset,
  type Preset
} from "../../src/core/presetStore.js";

function preset(name: string, overrides: Partial<Preset> = {}): Preset {
  return {
    name,
    rootDir: "/proj",
    extensions: ".ts",
    exclusions: "node_modules",
    templateName: "Refactoring",
    problem: "p",
    constraints: "",
    outputFormat: "",
    additionalInfo: "",
    reflection: false,
    solutions: 1,
    selectedRelPaths: ["src/a.ts"],
    createdAt: "2024-01-01T00:00:00.000Z",
    ...overrides
  };
}

describe("presetStore", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), "presets-"));
    file = path.join(dir, "nested", "presets.json");
  });

  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true });
  });

  it("loads nothing when no file exists", () => {
    expect(loadPresets(file)).toEqual([]);
  });

  it("saves and reloads presets", () => {
    const list = [preset("alpha"), preset("beta", { reflection: true, solutions: 3 })];
    savePresets(file, list);
    expect(loadPresets(file)).toEqual(list);
  });

  it("accepts a wrapped list", async () => {
    await fsp.mkdir(path.dirname(file), { recursive: true });
    await fsp.writeFile(file, JSON.stringify({ presets: [preset("wrapped")] }), "utf8");
    expect(loadPresets(file).map(p => p.name)).toEqual(["wrapped"]);
  });

  it("treats malformed JSON as an empty list", async () => {
    await fsp.mkdir(path.dirname(file), { recursive: true });
    await fsp.writeFile(file, "{ not json", "utf8");
    expect(loadPresets(file)).toEqual([]);
  });

  it("fills missing fields and drops nameless entries", () => {
    expect(normalizePreset({ name: " x ", solutions: 2.7, selectedRelPaths: ["a", 3] })).toEqual({
      name: "x",
      rootDir: "",
      extensions: "",
      exclusions: "",
      templateName: "",
      problem: "",
      constraints: "",
      outputFormat: "",
      additionalInfo: "",
      reflection: false,
      solutions: 2,
      selectedRelPaths: ["a"],
      createdAt: ""
    });
    expect(normalizePreset({ problem: "no name" })).toBeNull();
    expect(normalizePreset("text")).toBeNull();
  });

  it("replaces presets by name and keeps them sorted", () => {
    const list = upsertPreset([preset("b"), preset("c")], preset("a"));
    const updated = upsertPreset(list, preset("b", { problem: "changed" }));
    expect(updated.map(p => p.name)).toEqual(["a", "b", "c"]);
    expect(updated[1]?.problem).toBe("changed");
  });

  it("removes by index", () => {
    expect(removePreset([preset("a"), preset("b")], 0).map(p => p.name)).toEqual(["b"]);
  });
});
