import path from "node:path";
import { diffLines } from "diff";
import { isRegularFile, readFileText } from "./fileCollector.js";
import type { ParsedEdit } from "./updateParser.js";

/* ---------- Diff preview ---------- */

export type DiffLineType = "added" | "removed" | "context";

export interface DiffLine {
  type: DiffLineType;
  content: string;
}

export interface EditPreview {
  filename: string;
  exists: boolean;
  original: string;
  lines: DiffLine[];
  added: number;
  removed: number;
  note: string | null;
}

export function computeDiffLines(original: string, proposed: string): DiffLine[] {
  const lines: DiffLine[] = [];
  for (const change of diffLines(original, proposed)) {
    const lineList = change.value.split(/\r?\n/);
    if (lineList.length > 1 && lineList[lineList.length - 1] === "") lineList.pop();
    const type: DiffLineType = change.removed ? "removed" : change.added ? "added" : "context";
    for (const line of lineList) lines.push({ type, content: line });
  }
  return lines;
}

/** Read-only: compares the proposed content with what is on disk now. */
export async function previewEdit(rootDir: string, edit: ParsedEdit): Promise<EditPreview> {
  const absPath = path.join(rootDir, edit.filename);
  const exists = await isRegularFile(absPath);
  const original = exists ? await readFileText(absPath) : "";

  if (!original && !edit.newContent) {
    return {
      filename: edit.filename,
      exists,
      original,
      lines: [],
      added: 0,
      removed: 0,
      note: `File '${edit.filename}' is empty both before and after.`
    };
  }

  const lines = computeDiffLines(original, edit.newContent);
  return {
    filename: edit.filename,
    exists,
    original,
    lines,
    added: lines.filter(l => l.type === "added").length,
    removed: lines.filter(l => l.type === "removed").length,
    note: null
  };
}
