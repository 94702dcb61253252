import { encodingForModel, getEncoding, type Tiktoken } from "js-tiktoken";

/* ---------- Tokenizer setup ---------- */

let encoder: Tiktoken | null = null;
try {
  encoder = encodingForModel("gpt-4o-mini");
} catch {
  try {
    encoder = getEncoding("cl100k_base");
  } catch {
    encoder = null;
  }
}

export function countTokens(text: string): number {
  if (!text) return 0;
  if (!encoder) {
    const bytes = Buffer.byteLength(text, "utf8");
    return Math.ceil(bytes / 4);
  }
  return encoder.encode(text).length;
}

export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return "0 B";
  const units = ["B", "KB", "MB", "GB"];
  const k = 1024;
  const i = Math.min(units.length - 1, Math.floor(Math.log(bytes) / Math.log(k)));
  const value = bytes / Math.pow(k, i);
  const decimals = value >= 10 || i === 0 ? 0 : 1;
  return `${value.toFixed(decimals)} ${units[i]}`;
}
