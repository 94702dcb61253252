import path from "node:path";
import { REFLECTION_INSTRUCTIONS } from "./catalog.js";
import type { SourceFile } from "./fileCollector.js";
import { countTokens } from "./tokens.js";

/* ---------- Types ---------- */

export interface PromptSections {
  problem: string;
  constraints: string;
  outputFormat: string;
  additionalInfo: string;
  template: string;
  reflection: boolean;
  solutions: number;
}

export interface PromptStats {
  bytes: number;
  lines: number;
  tokens: number;
}

export const EMPTY_SECTIONS: PromptSections = {
  problem: "",
  constraints: "",
  outputFormat: "",
  additionalInfo: "",
  template: "",
  reflection: false,
  solutions: 1
};

/* ---------- Language tags ---------- */

const LANGUAGE_TAGS: Record<string, string> = {
  ".py": "python",
  ".js": "javascript",
  ".jsx": "jsx",
  ".ts": "typescript",
  ".tsx": "tsx",
  ".java": "java",
  ".c": "c",
  ".cpp": "cpp",
  ".cs": "csharp",
  ".rb": "ruby",
  ".go": "go",
  ".php": "php",
  ".rs": "rust",
  ".html": "html",
  ".css": "css",
  ".json": "json",
  ".ipynb": "python",
  ".vue": "html",
  ".swift": "swift",
  ".kt": "kotlin",
  ".xml": "xml",
  ".r": "r",
  ".md": "markdown",
  ".yml": "yaml",
  ".yaml": "yaml",
  ".sh": "bash",
  ".sql": "sql"
};

/** Fence tag for a file name, or "" when the content goes in unfenced. */
export function languageForFile(filename: string): string {
  return LANGUAGE_TAGS[path.extname(filename).toLowerCase()] ?? "";
}

/* ---------- Assembly ---------- */

function wrap(name: string, body: string): string {
  return `##BEGIN-${name}\n${body}\n##END-${name}`;
}

function fileBlock(file: SourceFile): string {
  const language = languageForFile(file.filename);
  const body = language ? "```" + language + "\n" + file.content + "\n```" : file.content;
  return `###BEGIN-FILE: ${file.displayPath}\n${body}\n###END-FILE`;
}

export function solutionsRequest(count: number): string {
  return [
    `Provide ${count} alternative solutions, numbered 1 to ${count}.`,
    "For each one, give a short rationale and its trade-offs before the code,",
    "then say which solution you recommend and why."
  ].join("\n");
}

/**
 * Builds the prompt text. Empty text sections are left out; the relevant-code
 * section is always present.
 */
export function buildPrompt(sourceFiles: readonly SourceFile[], sections: PromptSections): string {
  const parts: string[] = [];

  const problem = sections.problem.trim();
  if (problem) parts.push(wrap("PROBLEM-STATEMENT", problem));

  const constraints = sections.constraints.trim();
  if (constraints) parts.push(wrap("CONSTRAINTS-WARNINGS", constraints));

  const outputFormat = sections.outputFormat.trim();
  if (outputFormat) parts.push(wrap("OUTPUT-FORMAT", outputFormat));

  const code = ["##BEGIN-RELEVANT-CODE", ...sourceFiles.map(fileBlock), "##END-RELEVANT-CODE"];
  parts.push(code.join("\n\n"));

  const additional = sections.additionalInfo.trim();
  if (additional) parts.push(wrap("ADDITIONAL-INFORMATION", additional));

  const template = sections.template.trim();
  if (template) parts.push(wrap("TEMPLATE", template));

  if (sections.reflection) parts.push(wrap("REFLECTION", REFLECTION_INSTRUCTIONS));

  if (sections.solutions > 1) parts.push(wrap("SOLUTIONS", solutionsRequest(sections.solutions)));

  return parts.join("\n\n").trim();
}

export function promptStats(text: string): PromptStats {
  return {
    bytes: Buffer.byteLength(text, "utf8"),
    lines: text ? text.split(/\r?\n/).length : 0,
    tokens: countTokens(text)
  };
}

/* ---------- Chunking ---------- */

/**
 * Splits a prompt that exceeds `maxUnits` (tokens by default) into numbered
 * parts at line boundaries. A single line longer than the limit becomes a
 * part of its own.
 */
export function chunkPrompt(
  text: string,
  maxUnits: number,
  measure: (s: string) => number = countTokens
): string[] {
  if (maxUnits <= 0 || measure(text) <= maxUnits) return [text];

  const bodies: string[] = [];
  let current: string[] = [];
  let size = 0;
  for (const line of text.split("\n")) {
    const lineSize = measure(line + "\n");
    if (current.length > 0 && size + lineSize > maxUnits) {
      bodies.push(current.join("\n"));
      current = [];
      size = 0;
    }
    current.push(line);
    size += lineSize;
  }
  if (current.length > 0) bodies.push(current.join("\n"));

  const total = bodies.length;
  return bodies.map((body, idx) => {
    const n = idx + 1;
    const head = `##PART ${n} OF ${total}\n${body}`;
    return n < total
      ? `${head}\n##END-PART ${n} OF ${total}: reply only with "OK" and wait for the next part.`
      : head;
  });
}
