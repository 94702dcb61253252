import { minify as terserMinify } from "terser";
import * as csso from "csso";
import { minify as htmlMinify } from "html-minifier-terser";
import { getLogger } from "../logger.js";

/* ---------- Minification & comment stripping ---------- */

export interface TransformOptions {
  removeComments: boolean;
  minify: boolean;
}

const SCRIPT_EXTENSIONS = new Set([".js", ".jsx", ".ts", ".tsx", ".mjs", ".cjs"]);
const C_STYLE_EXTENSIONS = new Set([
  ...SCRIPT_EXTENSIONS,
  ".java",
  ".go",
  ".rs",
  ".php",
  ".c",
  ".cpp",
  ".cs",
  ".h",
  ".hpp",
  ".kt",
  ".swift"
]);
const HASH_EXTENSIONS = new Set([".py", ".rb", ".sh", ".bash", ".r"]);
const MARKUP_EXTENSIONS = new Set([".md", ".mdx", ".markdown", ".html", ".htm", ".vue", ".xml"]);
const STYLE_EXTENSIONS = new Set([".css", ".scss", ".sass", ".less"]);

export function stripCommentsGeneric(content: string): string {
  return content
    .replace(/\/\*[\s\S]*?\*\//g, "")
    .replace(/(^|\s)\/\/.*$/gm, "$1");
}

export function stripHashComments(content: string): string {
  return content.replace(/(^|\s)#.*$/gm, "$1");
}

export function stripHtmlComments(content: string): string {
  return content.replace(/<!--[\s\S]*?-->/g, "");
}

function trimLineEnds(content: string): string {
  return content
    .split(/\r?\n/)
    .map(l => l.trimEnd())
    .join("\n");
}

async function minifyContent(text: string, ext: string): Promise<string> {
  const log = getLogger("transform");
  if (SCRIPT_EXTENSIONS.has(ext)) {
    try {
      const result = await terserMinify(text, {
        ecma: 2020,
        module: ext !== ".cjs",
        compress: true,
        mangle: true,
        format: { comments: false }
      });
      if (result.code) return result.code;
    } catch (err) {
      // terser has no TypeScript parser; typed sources land here
      log.debug({ err, ext }, "terser could not minify, keeping raw text");
    }
    return text;
  }
  if (STYLE_EXTENSIONS.has(ext)) {
    try {
      return csso.minify(text).css;
    } catch (err) {
      log.debug({ err, ext }, "csso could not minify, keeping raw text");
      return text;
    }
  }
  if (ext === ".html" || ext === ".htm") {
    try {
      return await htmlMinify(text, {
        collapseWhitespace: true,
        removeComments: true,
        removeRedundantAttributes: true,
        removeEmptyAttributes: true,
        minifyCSS: true,
        minifyJS: true
      });
    } catch (err) {
      log.debug({ err, ext }, "html-minifier-terser could not minify, keeping raw text");
      return text;
    }
  }
  if (ext === ".json") {
    try {
      return JSON.stringify(JSON.parse(text));
    } catch (err) {
      log.debug({ err, ext }, "invalid JSON, keeping raw text");
      return text;
    }
  }
  if (ext === ".md" || ext === ".mdx" || ext === ".markdown") {
    return trimLineEnds(stripHtmlComments(text));
  }
  return trimLineEnds(text);
}

export async function transformContent(
  content: string,
  extension: string,
  options: TransformOptions
): Promise<string> {
  const ext = extension.toLowerCase();
  if (options.minify) return minifyContent(content, ext);
  if (!options.removeComments) return content;
  if (C_STYLE_EXTENSIONS.has(ext)) return stripCommentsGeneric(content);
  if (HASH_EXTENSIONS.has(ext)) return stripHashComments(content);
  if (MARKUP_EXTENSIONS.has(ext)) return stripHtmlComments(content);
  return content;
}
