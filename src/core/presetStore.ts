import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../errors.js";
import { getLogger } from "../logger.js";

/* ---------- Saved presets ---------- */

export interface Preset {
  name: string;
  rootDir: string;
  extensions: string;
  exclusions: string;
  templateName: string;
  problem: string;
  constraints: string;
  outputFormat: string;
  additionalInfo: string;
  reflection: boolean;
  solutions: number;
  selectedRelPaths: string[];
  createdAt: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(value: unknown, fallback = ""): string {
  return typeof value === "string" ? value : fallback;
}

/** Returns null for entries without a name; fills any missing field. */
export function normalizePreset(raw: unknown): Preset | null {
  if (!isRecord(raw)) return null;
  const name = str(raw.name).trim();
  if (!name) return null;
  const solutions = typeof raw.solutions === "number" && raw.solutions >= 1 ? Math.floor(raw.solutions) : 1;
  return {
    name,
    rootDir: str(raw.rootDir),
    extensions: str(raw.extensions),
    exclusions: str(raw.exclusions),
    templateName: str(raw.templateName),
    problem: str(raw.problem),
    constraints: str(raw.constraints),
    outputFormat: str(raw.outputFormat),
    additionalInfo: str(raw.additionalInfo),
    reflection: raw.reflection === true,
    solutions,
    selectedRelPaths: Array.isArray(raw.selectedRelPaths)
      ? raw.selectedRelPaths.filter((p): p is string => typeof p === "string")
      : [],
    createdAt: str(raw.createdAt)
  };
}

export function loadPresets(file: string): Preset[] {
  let raw: string;
  try {
    raw = fs.readFileSync(file, "utf8");
  } catch {
    return []; // nothing saved yet
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    const list = Array.isArray(parsed)
      ? parsed
      : isRecord(parsed) && Array.isArray(parsed.presets)
      ? parsed.presets
      : [];
    return list.map(normalizePreset).filter((p): p is Preset => p !== null);
  } catch (err) {
    getLogger("presets").warn({ file, err: errorMessage(err) }, "ignoring unreadable preset file");
    return [];
  }
}

export function savePresets(file: string, presets: readonly Preset[]): void {
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify(presets, null, 2), "utf8");
  } catch (err) {
    getLogger("presets").error({ file, err: errorMessage(err) }, "could not save presets");
    throw err;
  }
}

/** Replaces any preset with the same name and keeps the list sorted by name. */
export function upsertPreset(presets: readonly Preset[], preset: Preset): Preset[] {
  return [...presets.filter(p => p.name !== preset.name), preset].sort((a, b) =>
    a.name.localeCompare(b.name)
  );
}

export function removePreset(presets: readonly Preset[], index: number): Preset[] {
  return presets.filter((_, i) => i !== index);
}
