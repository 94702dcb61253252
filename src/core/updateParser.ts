/* ---------- Model response grammar ---------- */
//
//   file: <relative/path>
//   --- START CODE ---
//   <raw lines>
//   --- END CODE ---

export const FILE_MARKER = "file:";
export const START_DELIMITER = "--- START CODE ---";
export const END_DELIMITER = "--- END CODE ---";

export interface ParsedEdit {
  filename: string;
  newContent: string;
}

export type ParseResult =
  | { ok: true; edits: ParsedEdit[] }
  | { ok: false; edits: []; error: string; line: number | null };

export type ParserState = "IDLE" | "EXPECT_START" | "IN_BLOCK";
export type LineKind = "file" | "start" | "end" | "other";

type Action =
  | { type: "open"; next: "EXPECT_START" }
  | { type: "begin"; next: "IN_BLOCK" }
  | { type: "append" }
  | { type: "close"; next: "IDLE" }
  | { type: "ignore" }
  | { type: "fail"; reason: "expected-start" | "missing-end" };

export const TRANSITIONS: Record<ParserState, Record<LineKind, Action>> = {
  IDLE: {
    file: { type: "open", next: "EXPECT_START" },
    start: { type: "ignore" },
    end: { type: "ignore" },
    other: { type: "ignore" }
  },
  EXPECT_START: {
    file: { type: "fail", reason: "expected-start" },
    start: { type: "begin", next: "IN_BLOCK" },
    end: { type: "fail", reason: "expected-start" },
    other: { type: "fail", reason: "expected-start" }
  },
  IN_BLOCK: {
    file: { type: "fail", reason: "missing-end" },
    start: { type: "append" },
    end: { type: "close", next: "IDLE" },
    other: { type: "append" }
  }
};

export function classifyLine(line: string): LineKind {
  const trimmed = line.trim();
  if (trimmed === START_DELIMITER) return "start";
  if (trimmed === END_DELIMITER) return "end";
  if (trimmed.toLowerCase().startsWith(FILE_MARKER)) return "file";
  return "other";
}

export function splitLines(text: string): string[] {
  if (!text) return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

function failure(error: string, line: number | null): ParseResult {
  return { ok: false, edits: [], error, line };
}

/**
 * Single pass over the response. The first grammar violation aborts the whole
 * parse; no partial edit list is ever returned.
 */
export function parseUpdateBlocks(text: string): ParseResult {
  const lines = splitLines(text);
  const edits: ParsedEdit[] = [];

  let state: ParserState = "IDLE";
  let currentFile = "";
  let buffer: string[] = [];

  for (const [idx, line] of lines.entries()) {
    const lineNo = idx + 1;
    const trimmed = line.trim();
    const action: Action = TRANSITIONS[state][classifyLine(line)];

    switch (action.type) {
      case "open": {
        const filename = trimmed.slice(trimmed.indexOf(":") + 1).trim();
        if (!filename) {
          return failure(`Invalid file line at line ${lineNo}: missing file path`, lineNo);
        }
        currentFile = filename;
        buffer = [];
        state = action.next;
        break;
      }
      case "begin":
        state = action.next;
        break;
      case "append":
        buffer.push(line);
        break;
      case "close":
        edits.push({ filename: currentFile, newContent: buffer.join("\n") });
        currentFile = "";
        buffer = [];
        state = action.next;
        break;
      case "ignore":
        break;
      case "fail":
        if (action.reason === "missing-end") {
          return failure(
            `Missing '${END_DELIMITER}' before starting new file block at line ${lineNo}`,
            lineNo
          );
        }
        return failure(
          `Expected '${START_DELIMITER}' after file line for file '${currentFile}' but got '${trimmed}' at line ${lineNo}`,
          lineNo
        );
    }
  }

  if (state === "IN_BLOCK") {
    return failure(`Missing '${END_DELIMITER}' for file '${currentFile}'`, null);
  }
  if (state === "EXPECT_START") {
    return failure(
      `Expected '${START_DELIMITER}' after file line for file '${currentFile}' but reached end of input`,
      null
    );
  }
  return { ok: true, edits };
}
