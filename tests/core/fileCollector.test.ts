import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  isRegularFile,
  listCandidateFiles,
  readFileText,
  readSelectedFiles,
  scanProject
} from "../../src/core/fileCollector.js";
import type { PathFilter } from "../../src/core/pathFilter.js";

async function write(root: string, rel: string, content: string): Promise<void> {
  const abs = path.join(root, rel);
  await fsp.mkdir(path.dirname(abs), { recursive: true });
  await fsp.writeFile(abs, content, "utf8");
}

const FILTER: PathFilter = {
  extensions: [".ts", ".py", ".js"],
  exclusions: ["node_modules"],
  respectGitignore: true
};

describe("fileCollector", () => {
  let root: string;

  beforeEach(async () => {
    root = await fsp.mkdtemp(path.join(os.tmpdir(), "collector-"));
    await write(root, "src/b.ts", "// header\nconst b = 1;\n");
    await write(root, "src/a.ts", "a");
    await write(root, "src/deep/c.py", "print(1)");
    await write(root, "README.md", "# readme");
    await write(root, ".hidden/x.ts", "hidden");
    await write(root, "node_modules/m/index.js", "module.exports = 1;");
    await write(root, "empty/notes.txt", "not collected");
    await write(root, "ignored/y.ts", "ignored");
    await write(root, "blank.ts", "   \n");
    await write(root, ".gitignore", "# build output\nignored/\n");
  });

  afterEach(async () => {
    await fsp.rm(root, { recursive: true, force: true });
  });

  describe("scanProject", () => {
    it("lists directories first and prunes empty ones", async () => {
      const { root: tree, files } = await scanProject(root, FILTER);
      expect(files.map(f => f.relPath)).toEqual(["src/deep/c.py", "src/a.ts", "src/b.ts", "blank.ts"]);
      expect(tree.relPath).toBe(".");
      expect(tree.children?.map(c => c.name)).toEqual(["src", "blank.ts"]);
    });

    it("fills node metadata", async () => {
      const { files } = await scanProject(root, FILTER);
      const deep = files[0];
      expect(deep).toMatchObject({
        path: path.join(root, "src", "deep", "c.py"),
        name: "c.py",
        isDirectory: false,
        sizeBytes: 8,
        depth: 3,
        extension: ".py"
      });
    });

    it("includes gitignored paths when gitignore is off", async () => {
      const { files } = await scanProject(root, { ...FILTER, respectGitignore: false });
      expect(files.map(f => f.relPath)).toEqual([
        "ignored/y.ts",
        "src/deep/c.py",
        "src/a.ts",
        "src/b.ts",
        "blank.ts"
      ]);
    });

    it("applies nested gitignore files relative to their folder", async () => {
      await write(root, "src/.gitignore", "a.ts\n");
      const { files } = await scanProject(root, FILTER);
      expect(files.map(f => f.relPath)).toEqual(["src/deep/c.py", "src/b.ts", "blank.ts"]);
    });

    it("reports progress for every collected file", async () => {
      const seen: number[] = [];
      await scanProject(root, FILTER, info => seen.push(info.processedFiles));
      expect(seen).toEqual([1, 2, 3, 4]);
    });
  });

  it("lists candidate paths in scan order", async () => {
    expect(await listCandidateFiles(root, [".ts"], ["node_modules", "ignored"])).toEqual([
      "src/a.ts",
      "src/b.ts",
      "blank.ts"
    ]);
  });

  describe("readFileText", () => {
    it("truncates past the byte limit", async () => {
      await write(root, "long.txt", "abcdefghij");
      expect(await readFileText(path.join(root, "long.txt"), { maxBytes: 4 })).toBe(
        "abcd\n... [truncated 6 bytes]"
      );
    });

    it("cuts before a character that would be split", async () => {
      await write(root, "accent.txt", "abé");
      expect(await readFileText(path.join(root, "accent.txt"), { maxBytes: 3 })).toBe(
        "ab\n... [truncated 2 bytes]"
      );
    });

    it("keeps a character that ends exactly at the limit", async () => {
      await write(root, "accent.txt", "éxyz");
      expect(await readFileText(path.join(root, "accent.txt"), { maxBytes: 2 })).toBe(
        "é\n... [truncated 3 bytes]"
      );
    });

    it("returns a placeholder for unreadable files", async () => {
      const text = await readFileText(path.join(root, "missing.txt"));
      expect(text.startsWith("<!-- Could not read file: ")).toBe(true);
      expect(text.endsWith(" -->")).toBe(true);
    });
  });

  describe("readSelectedFiles", () => {
    it("skips blank files and prefixes the root folder name", async () => {
      const sources = await readSelectedFiles(root, ["src/a.ts", "blank.ts"]);
      expect(sources).toEqual([
        { filename: "src/a.ts", displayPath: `${path.basename(root)}/src/a.ts`, content: "a" }
      ]);
    });

    it("strips comments when asked", async () => {
      const [source] = await readSelectedFiles(root, ["src/b.ts"], {
        transform: { removeComments: true, minify: false }
      });
      expect(source?.content).toBe("\nconst b = 1;\n");
    });
  });

  it("tells regular files from directories", async () => {
    expect(await isRegularFile(path.join(root, "src", "a.ts"))).toBe(true);
    expect(await isRegularFile(path.join(root, "src"))).toBe(false);
    expect(await isRegularFile(path.join(root, "nope"))).toBe(false);
  });
});
