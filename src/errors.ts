/* ---------- Errors ---------- */

/**
 * A problem with what the user asked for (missing folder, nothing selected,
 * unknown preset). Shown as a short status message; the action is skipped.
 */
export class UserInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UserInputError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === "string") return err;
  return String(err);
}
