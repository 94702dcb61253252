import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { backupPathFor, listBackups, restoreBackup, type BackupLedger } from "../../src/core/backups.js";
import { applyEdits } from "../../src/core/patchApplicator.js";

describe("backups", () => {
  let base: string;
  let ledger: BackupLedger;
  let original: string;

  beforeEach(async () => {
    base = await fsp.mkdtemp(path.join(os.tmpdir(), "restore-"));
    ledger = { backups: [] };
    original = path.join(base, "a.txt");
    await fsp.writeFile(original, "old", "utf8");
    await applyEdits(ledger, base, [{ filename: "a.txt", newContent: "new" }], new Map([["a.txt", true]]));
  });

  afterEach(async () => {
    await fsp.rm(base, { recursive: true, force: true });
  });

  it("appends the suffix to the original path", () => {
    expect(backupPathFor("/x/y.ts")).toBe("/x/y.ts.bak");
  });

  it("lists backups by file name", () => {
    expect(listBackups(ledger)).toEqual([{ label: "a.txt.bak", value: backupPathFor(original) }]);
  });

  it("puts the backup back over the edited file", async () => {
    const outcome = await restoreBackup(ledger, backupPathFor(original));
    expect(outcome).toEqual({
      ok: true,
      record: { originalPath: original, backupPath: backupPathFor(original) },
      message: "Restored backup a.txt.bak → a.txt"
    });
    expect(await fsp.readFile(original, "utf8")).toBe("old");
    await expect(fsp.access(backupPathFor(original))).rejects.toThrow();
  });

  it("restores when the edited file was removed", async () => {
    await fsp.unlink(original);
    const outcome = await restoreBackup(ledger, backupPathFor(original));
    expect(outcome.ok).toBe(true);
    expect(await fsp.readFile(original, "utf8")).toBe("old");
  });

  it("keeps the record, so a second restore fails", async () => {
    await restoreBackup(ledger, backupPathFor(original));
    expect(listBackups(ledger)).toHaveLength(1);

    const again = await restoreBackup(ledger, backupPathFor(original));
    expect(again.ok).toBe(false);
    expect(again.message.startsWith("Error restoring backup: ")).toBe(true);
    expect(await fsp.readFile(original, "utf8")).toBe("old");
  });

  it("needs a chosen backup and at least one record", async () => {
    expect(await restoreBackup(ledger, undefined)).toEqual({
      ok: false,
      message: "No backup selected or no backups available."
    });
    expect(await restoreBackup({ backups: [] }, backupPathFor(original))).toEqual({
      ok: false,
      message: "No backup selected or no backups available."
    });
  });

  it("rejects paths that were never recorded", async () => {
    expect(await restoreBackup(ledger, path.join(base, "other.txt.bak"))).toEqual({
      ok: false,
      message: "Backup file not found in records."
    });
  });
});
