import fsp from "node:fs/promises";
import path from "node:path";
import { UserInputError, errorMessage } from "../errors.js";
import { getLogger } from "../logger.js";
import type { BackupRecord } from "./backups.js";
import { applyEdits, describeApplyOutcome } from "./patchApplicator.js";
import { createSelection, type Selection } from "./selection.js";
import { parseUpdateBlocks, type ParsedEdit } from "./updateParser.js";

/* ---------- Session state ---------- */

/**
 * Everything one interactive session mutates. Owned by the caller and passed
 * to each operation; nothing here is global.
 */
export interface Session {
  rootDir: string | null;
  selection: Selection;
  parsedEdits: ParsedEdit[];
  applyChoices: Map<string, boolean>;
  parseError: string | null;
  backups: BackupRecord[];
}

export function createSession(rootDir: string | null = null): Session {
  return {
    rootDir,
    selection: new Map(),
    parsedEdits: [],
    applyChoices: new Map(),
    parseError: null,
    backups: []
  };
}

export async function resolveProjectRoot(input: string | null | undefined): Promise<string> {
  const candidate = input?.trim();
  if (!candidate) throw new UserInputError("Invalid or missing folder path.");
  const resolved = path.resolve(candidate);
  const stat = await fsp.stat(resolved).catch(() => null);
  if (stat?.isDirectory()) return resolved;
  throw new UserInputError("Invalid or missing folder path.");
}

/** New candidate list: every file starts selected. */
export function loadCandidates(session: Session, rootDir: string, relPaths: readonly string[]): void {
  session.rootDir = rootDir;
  session.selection = createSelection(relPaths, true);
}

/** A failed scan leaves no project behind, so nothing can be applied to it. */
export function forgetProject(session: Session): void {
  session.rootDir = null;
  session.selection = new Map();
}

/**
 * Applies the checked edits to the session's project folder, which is
 * checked again first. Returns the status line to show.
 */
export async function applyParsedEdits(session: Session): Promise<string> {
  let root: string;
  try {
    root = await resolveProjectRoot(session.rootDir);
  } catch (err) {
    if (!(err instanceof UserInputError)) throw err;
    getLogger("session").warn({ root: session.rootDir, err: errorMessage(err) }, "apply refused");
    return err.message;
  }
  if (session.parsedEdits.length === 0) return "No changes to apply.";
  const outcome = await applyEdits(session, root, session.parsedEdits, session.applyChoices);
  return describeApplyOutcome(outcome);
}

/**
 * Parses a pasted model response. On success every edit starts checked for
 * apply; on failure the previous edits are discarded.
 */
export function setResponse(session: Session, text: string): void {
  const log = getLogger("session");
  if (!text.trim()) {
    session.parsedEdits = [];
    session.applyChoices = new Map();
    session.parseError = "No response provided.";
    return;
  }
  const result = parseUpdateBlocks(text);
  if (!result.ok) {
    session.parsedEdits = [];
    session.applyChoices = new Map();
    session.parseError = result.error;
    log.warn({ line: result.line, error: result.error }, "response rejected");
    return;
  }
  session.parsedEdits = result.edits;
  session.applyChoices = new Map(result.edits.map(e => [e.filename, true] as const));
  session.parseError = result.edits.length === 0 ? "No code blocks detected." : null;
  log.info({ edits: result.edits.length }, "response parsed");
}

export function toggleApplyChoice(session: Session, filename: string): void {
  if (!session.applyChoices.has(filename)) return;
  session.applyChoices.set(filename, !session.applyChoices.get(filename));
}

export function clearResponse(session: Session): void {
  session.parsedEdits = [];
  session.applyChoices = new Map();
  session.parseError = null;
}
