import fsp from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../errors.js";
import { getLogger } from "../logger.js";

/* ---------- Backup records ---------- */

export const BACKUP_SUFFIX = ".bak";

export interface BackupRecord {
  originalPath: string; // absolute
  backupPath: string; // originalPath + ".bak"
}

/** Anything that holds the session's backup list (records are only ever appended). */
export interface BackupLedger {
  backups: BackupRecord[];
}

export interface BackupOption {
  label: string;
  value: string;
}

export type RestoreOutcome =
  | { ok: true; record: BackupRecord; message: string }
  | { ok: false; message: string };

export function backupPathFor(originalPath: string): string {
  return originalPath + BACKUP_SUFFIX;
}

export function listBackups(ledger: BackupLedger): BackupOption[] {
  return ledger.backups.map(bk => ({
    label: path.basename(bk.backupPath),
    value: bk.backupPath
  }));
}

/**
 * Puts a backup back in place of its original. The record stays in the
 * ledger afterwards, so restoring it a second time fails on the missing
 * backup file.
 */
export async function restoreBackup(
  ledger: BackupLedger,
  backupPath: string | null | undefined
): Promise<RestoreOutcome> {
  const log = getLogger("backups");
  if (!backupPath || ledger.backups.length === 0) {
    return { ok: false, message: "No backup selected or no backups available." };
  }
  const record = ledger.backups.find(bk => bk.backupPath === backupPath);
  if (!record) {
    return { ok: false, message: "Backup file not found in records." };
  }
  try {
    // replaces the current file in one step
    await fsp.rename(record.backupPath, record.originalPath);
  } catch (err) {
    log.error({ backup: record.backupPath, err: errorMessage(err) }, "restore failed");
    return { ok: false, message: `Error restoring backup: ${errorMessage(err)}` };
  }
  log.info({ backup: record.backupPath, original: record.originalPath }, "backup restored");
  return {
    ok: true,
    record,
    message: `Restored backup ${path.basename(record.backupPath)} → ${path.basename(record.originalPath)}`
  };
}
