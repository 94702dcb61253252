import clipboardy from "clipboardy";
import { errorMessage } from "./errors.js";
import { getLogger } from "./logger.js";

/* ---------- Clipboard ---------- */

export async function copyToClipboard(text: string): Promise<boolean> {
  try {
    await clipboardy.write(text);
    return true;
  } catch (err) {
    getLogger("clipboard").warn({ err: errorMessage(err) }, "clipboard write failed");
    return false;
  }
}

export async function readClipboard(): Promise<string | null> {
  try {
    return await clipboardy.read();
  } catch (err) {
    getLogger("clipboard").warn({ err: errorMessage(err) }, "clipboard read failed");
    return null;
  }
}
