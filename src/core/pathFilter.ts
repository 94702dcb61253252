import micromatch from "micromatch";

/* ---------- Path filtering ---------- */

export interface PathFilter {
  extensions: string[];
  exclusions: string[];
  respectGitignore: boolean;
}

function segments(relPath: string): string[] {
  return relPath.split(/[\\/]+/).filter(s => s && s !== ".");
}

/**
 * True when any segment of `relPath` is hidden (dot-prefixed), equals an
 * exclusion token, or the path contains a token (glob-aware, like `*token*`).
 */
export function isHiddenOrExcluded(relPath: string, exclusions: readonly string[]): boolean {
  const parts = segments(relPath);
  if (parts.some(s => s.startsWith("."))) return true;
  const posixPath = parts.join("/");
  for (const token of exclusions) {
    if (!token) continue;
    if (parts.includes(token)) return true;
    if (micromatch.contains(posixPath, token, { dot: true })) return true;
  }
  return false;
}

export function hasAllowedExtension(fileName: string, extensions: readonly string[]): boolean {
  const lower = fileName.toLowerCase();
  return extensions.some(ext => lower.endsWith(ext));
}

export function parseExtensions(text: string): string[] {
  const out: string[] = [];
  for (const raw of text.split(",")) {
    let ext = raw.trim().toLowerCase();
    if (ext && !ext.startsWith(".")) ext = "." + ext;
    if (ext && !out.includes(ext)) out.push(ext);
  }
  return out;
}

export function parseExclusions(text: string): string[] {
  const tokens = new Set<string>();
  for (const raw of text.split(",")) {
    const token = raw.trim();
    if (token) tokens.add(token);
  }
  return [...tokens].sort();
}
