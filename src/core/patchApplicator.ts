import fsp from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../errors.js";
import { getLogger } from "../logger.js";
import { backupPathFor, type BackupLedger, type BackupRecord } from "./backups.js";
import { isRegularFile } from "./fileCollector.js";
import type { ParsedEdit } from "./updateParser.js";

/* ---------- Applying parsed edits ---------- */

export type ApplyOutcome =
  | { kind: "applied"; applied: string[]; backups: BackupRecord[] }
  | { kind: "nothing-selected" }
  | { kind: "failed"; filename: string; error: string; applied: string[]; backups: BackupRecord[] };

export function resolveTarget(baseDir: string, filename: string): string {
  const base = path.resolve(baseDir);
  const target = path.resolve(base, filename);
  const rel = path.relative(base, target);
  if (!rel || rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`path escapes the project folder: ${filename}`);
  }
  return target;
}

// The target is either the old file (moved to .bak beforehand), absent, or the
// complete new content; never a partial write.
async function writeWhole(target: string, content: string): Promise<void> {
  const tmp = `${target}.${process.pid}.tmp`;
  try {
    await fsp.writeFile(tmp, content, "utf8");
    await fsp.rename(tmp, target);
  } catch (err) {
    await fsp.rm(tmp, { force: true }).catch(rmErr => {
      getLogger("apply").warn({ tmp, err: errorMessage(rmErr) }, "could not remove temporary file");
    });
    throw err;
  }
}

/**
 * Writes every edit whose filename is checked in `choices`, in order. An
 * existing file is first renamed to `<file>.bak` and recorded in the ledger.
 * The first failure stops the batch; earlier files stay written.
 */
export async function applyEdits(
  ledger: BackupLedger,
  baseDir: string,
  edits: readonly ParsedEdit[],
  choices: ReadonlyMap<string, boolean>
): Promise<ApplyOutcome> {
  const log = getLogger("apply");
  const applied: string[] = [];
  const backups: BackupRecord[] = [];

  for (const edit of edits) {
    if (choices.get(edit.filename) !== true) continue;
    try {
      const target = resolveTarget(baseDir, edit.filename);
      if (await isRegularFile(target)) {
        const record: BackupRecord = { originalPath: target, backupPath: backupPathFor(target) };
        await fsp.rename(record.originalPath, record.backupPath);
        ledger.backups.push(record);
        backups.push(record);
        log.info({ file: target, backup: record.backupPath }, "backed up existing file");
      }
      await fsp.mkdir(path.dirname(target), { recursive: true });
      await writeWhole(target, edit.newContent);
      applied.push(edit.filename);
      log.info({ file: target, bytes: Buffer.byteLength(edit.newContent, "utf8") }, "applied edit");
    } catch (err) {
      log.error({ file: edit.filename, err: errorMessage(err) }, "apply aborted");
      return { kind: "failed", filename: edit.filename, error: errorMessage(err), applied, backups };
    }
  }

  if (applied.length === 0) return { kind: "nothing-selected" };
  return { kind: "applied", applied, backups };
}

export function describeApplyOutcome(outcome: ApplyOutcome): string {
  switch (outcome.kind) {
    case "applied":
      return `Updated/created (old versions renamed to *.bak): ${outcome.applied.join(", ")}`;
    case "nothing-selected":
      return "No files were selected to apply changes.";
    case "failed":
      return `Error applying changes to ${outcome.filename}: ${outcome.error}`;
  }
}
