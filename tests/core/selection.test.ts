import { describe, expect, it } from "vitest";
import {
  countSelected,
  createSelection,
  descendantsOf,
  isFolderChecked,
  isSelected,
  selectOnly,
  selectedPaths,
  setFolder,
  toggleFile,
  toggleFolder
} from "../../src/core/selection.js";

const PATHS = ["src/a.ts", "src/lib/b.ts", "src-extra/c.ts", "README.md"];

describe("selection", () => {
  it("starts with every candidate checked", () => {
    const sel = createSelection(PATHS);
    expect(countSelected(sel)).toBe(4);
    expect(selectedPaths(sel)).toEqual(PATHS);
  });

  it("can start with nothing checked", () => {
    expect(countSelected(createSelection(PATHS, false))).toBe(0);
  });

  it("toggles a single file without touching the original map", () => {
    const sel = createSelection(PATHS);
    const next = toggleFile(sel, "src/a.ts");
    expect(isSelected(next, "src/a.ts")).toBe(false);
    expect(isSelected(sel, "src/a.ts")).toBe(true);
  });

  it("leaves unknown paths alone", () => {
    const sel = createSelection(PATHS);
    expect(toggleFile(sel, "missing.ts")).toBe(sel);
    expect(isSelected(sel, "missing.ts")).toBe(false);
  });

  it("finds descendants by folder prefix only", () => {
    const sel = createSelection(PATHS);
    expect(descendantsOf(sel, "src")).toEqual(["src/a.ts", "src/lib/b.ts"]);
    expect(descendantsOf(sel, "src/")).toEqual(["src/a.ts", "src/lib/b.ts"]);
    expect(descendantsOf(sel, ".")).toEqual(PATHS);
  });

  it("cascades a folder toggle to every descendant", () => {
    const sel = toggleFolder(createSelection(PATHS), "src");
    expect(selectedPaths(sel)).toEqual(["src-extra/c.ts", "README.md"]);
    expect(isFolderChecked(sel, "src")).toBe(false);

    const back = toggleFolder(sel, "src");
    expect(isFolderChecked(back, "src")).toBe(true);
  });

  it("checks a partially selected folder fully", () => {
    const partial = toggleFile(createSelection(PATHS), "src/lib/b.ts");
    expect(isFolderChecked(partial, "src")).toBe(false);
    expect(selectedPaths(toggleFolder(partial, "src"))).toEqual(PATHS);
  });

  it("reports an empty folder as unchecked", () => {
    expect(isFolderChecked(createSelection(PATHS), "docs")).toBe(false);
  });

  it("sets the whole tree through the root folder", () => {
    expect(countSelected(setFolder(createSelection(PATHS), ".", false))).toBe(0);
  });

  it("selects exactly the given paths that still exist", () => {
    const sel = selectOnly(createSelection(PATHS), ["README.md", "gone.ts"]);
    expect(selectedPaths(sel)).toEqual(["README.md"]);
    expect([...sel.keys()]).toEqual(PATHS);
  });
});
