import type { Dirent } from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import ignore, { type Ignore } from "ignore";
import { errorMessage } from "../errors.js";
import { getLogger } from "../logger.js";
import { hasAllowedExtension, isHiddenOrExcluded, type PathFilter } from "./pathFilter.js";
import { transformContent, type TransformOptions } from "./transform.js";

/* ---------- Types ---------- */

export interface FileNode {
  path: string; // absolute
  relPath: string; // relative to root, "/" separated; "." for the root
  name: string;
  isDirectory: boolean;
  sizeBytes: number;
  depth: number;
  extension: string;
  children?: FileNode[];
}

export interface ScanResult {
  root: FileNode;
  files: FileNode[];
}

export interface SourceFile {
  filename: string;
  displayPath: string;
  content: string;
}

export interface ReadOptions {
  maxBytes?: number;
  transform?: TransformOptions;
}

export type ScanProgress = (info: { processedFiles: number; currentPath?: string }) => void;

/* ---------- Scanning ---------- */

function compareNodes(a: FileNode, b: FileNode): number {
  if (a.isDirectory === b.isDirectory) return a.name.localeCompare(b.name);
  return a.isDirectory ? -1 : 1;
}

async function addGitignore(ig: Ignore, dirAbs: string, relPrefix: string): Promise<void> {
  let content: string;
  try {
    content = await fsp.readFile(path.join(dirAbs, ".gitignore"), "utf8");
  } catch {
    return; // no .gitignore here
  }
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    if (!relPrefix) {
      ig.add(trimmed);
    } else if (trimmed.startsWith("!")) {
      ig.add("!" + path.posix.join(relPrefix, trimmed.slice(1)));
    } else {
      ig.add(path.posix.join(relPrefix, trimmed));
    }
  }
}

/**
 * Walks `rootDir` and keeps the files whose extension is allowed and whose
 * relative path is neither hidden nor excluded. Directories without any kept
 * file are dropped from the tree.
 */
export async function scanProject(
  rootDir: string,
  filter: PathFilter,
  onProgress?: ScanProgress
): Promise<ScanResult> {
  const log = getLogger("collector");
  const resolvedRoot = path.resolve(rootDir);
  const ig = filter.respectGitignore ? ignore() : null;

  const root: FileNode = {
    path: resolvedRoot,
    relPath: ".",
    name: path.basename(resolvedRoot),
    isDirectory: true,
    sizeBytes: 0,
    depth: 0,
    extension: "",
    children: []
  };

  const files: FileNode[] = [];

  async function walk(dirAbs: string, parent: FileNode, relDir: string): Promise<void> {
    if (ig) await addGitignore(ig, dirAbs, relDir);

    let entries: Dirent[];
    try {
      entries = await fsp.readdir(dirAbs, { withFileTypes: true });
    } catch (err) {
      log.warn({ dir: dirAbs, err: errorMessage(err) }, "skipping unreadable directory");
      return;
    }

    const children: FileNode[] = [];
    for (const entry of entries) {
      const relPath = relDir ? path.posix.join(relDir, entry.name) : entry.name;
      if (isHiddenOrExcluded(relPath, filter.exclusions)) continue;

      const absPath = path.join(dirAbs, entry.name);
      const depth = parent.depth + 1;

      if (entry.isDirectory()) {
        if (ig?.ignores(relPath + "/")) continue;
        const node: FileNode = {
          path: absPath,
          relPath,
          name: entry.name,
          isDirectory: true,
          sizeBytes: 0,
          depth,
          extension: "",
          children: []
        };
        await walk(absPath, node, relPath);
        if (node.children?.length) children.push(node);
      } else if (entry.isFile()) {
        if (!hasAllowedExtension(entry.name, filter.extensions)) continue;
        if (ig?.ignores(relPath)) continue;
        let sizeBytes = 0;
        try {
          sizeBytes = (await fsp.stat(absPath)).size;
        } catch (err) {
          log.debug({ file: absPath, err: errorMessage(err) }, "stat failed");
        }
        children.push({
          path: absPath,
          relPath,
          name: entry.name,
          isDirectory: false,
          sizeBytes,
          depth,
          extension: path.extname(entry.name).toLowerCase()
        });
      }
    }

    children.sort(compareNodes);
    parent.children = children;
  }

  await walk(resolvedRoot, root, "");

  const collect = (n: FileNode) => {
    for (const child of n.children ?? []) {
      if (child.isDirectory) {
        collect(child);
      } else {
        files.push(child);
        onProgress?.({ processedFiles: files.length, currentPath: child.relPath });
      }
    }
  };
  collect(root);

  log.info({ root: resolvedRoot, files: files.length }, "scan complete");
  return { root, files };
}

export async function listCandidateFiles(
  rootDir: string,
  extensions: string[],
  exclusions: string[],
  options: { respectGitignore?: boolean } = {}
): Promise<string[]> {
  const { files } = await scanProject(rootDir, {
    extensions,
    exclusions,
    respectGitignore: options.respectGitignore ?? false
  });
  return files.map(f => f.relPath);
}

/* ---------- Reading ---------- */

export async function isRegularFile(absPath: string): Promise<boolean> {
  try {
    return (await fsp.stat(absPath)).isFile();
  } catch {
    return false; // missing or unreachable
  }
}

// Backs off continuation bytes (10xxxxxx) so a cut never splits a character.
function utf8Boundary(buf: Buffer, limit: number): number {
  let end = Math.max(0, limit);
  while (end > 0 && end < buf.length && (buf[end] & 0xc0) === 0x80) end--;
  return end;
}

export async function readFileText(absPath: string, options: { maxBytes?: number } = {}): Promise<string> {
  try {
    const buf = await fsp.readFile(absPath);
    const { maxBytes } = options;
    if (maxBytes !== undefined && buf.length > maxBytes) {
      const end = utf8Boundary(buf, maxBytes);
      return buf.subarray(0, end).toString("utf8") + `\n... [truncated ${buf.length - end} bytes]`;
    }
    return buf.toString("utf8");
  } catch (err) {
    getLogger("collector").warn({ file: absPath, err: errorMessage(err) }, "could not read file");
    return `<!-- Could not read file: ${errorMessage(err)} -->`;
  }
}

export async function readSelectedFiles(
  rootDir: string,
  relPaths: string[],
  options: ReadOptions = {}
): Promise<SourceFile[]> {
  const baseName = path.basename(path.resolve(rootDir));
  const out: SourceFile[] = [];
  for (const relPath of relPaths) {
    const absPath = path.join(rootDir, relPath);
    let content = await readFileText(absPath, { maxBytes: options.maxBytes });
    if (!content.trim()) continue;
    if (options.transform) {
      content = await transformContent(content, path.extname(relPath), options.transform);
    }
    out.push({ filename: relPath, displayPath: `${baseName}/${relPath}`, content });
  }
  return out;
}
