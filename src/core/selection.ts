/* ---------- Selection state ---------- */

/** Relative file path → included flag. Keys are exactly the current candidates. */
export type Selection = Map<string, boolean>;

export function createSelection(relPaths: readonly string[], initial = true): Selection {
  return new Map(relPaths.map(p => [p, initial] as const));
}

export function isSelected(selection: Selection, relPath: string): boolean {
  return selection.get(relPath) === true;
}

export function toggleFile(selection: Selection, relPath: string): Selection {
  if (!selection.has(relPath)) return selection;
  const next = new Map(selection);
  next.set(relPath, !selection.get(relPath));
  return next;
}

function isUnder(folderRel: string, relPath: string): boolean {
  if (folderRel === "." || folderRel === "") return true;
  return relPath.startsWith(folderRel.replace(/\/+$/, "") + "/");
}

export function descendantsOf(selection: Selection, folderRel: string): string[] {
  return [...selection.keys()].filter(p => isUnder(folderRel, p));
}

export function setFolder(selection: Selection, folderRel: string, value: boolean): Selection {
  const next = new Map(selection);
  for (const p of descendantsOf(selection, folderRel)) next.set(p, value);
  return next;
}

export function isFolderChecked(selection: Selection, folderRel: string): boolean {
  const desc = descendantsOf(selection, folderRel);
  return desc.length > 0 && desc.every(p => selection.get(p) === true);
}

/** Checks every descendant unless all are already checked, then clears them. */
export function toggleFolder(selection: Selection, folderRel: string): Selection {
  return setFolder(selection, folderRel, !isFolderChecked(selection, folderRel));
}

export function selectedPaths(selection: Selection): string[] {
  return [...selection.entries()].filter(([, on]) => on).map(([p]) => p);
}

export function countSelected(selection: Selection): number {
  let n = 0;
  for (const on of selection.values()) if (on) n++;
  return n;
}

/** Checks exactly the given paths (those still present); clears the rest. */
export function selectOnly(selection: Selection, relPaths: readonly string[]): Selection {
  const wanted = new Set(relPaths);
  return new Map([...selection.keys()].map(p => [p, wanted.has(p)] as const));
}
