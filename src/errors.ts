/**
 * CLI error-formatting helpers.
 *
 * Used by the CLI entry point to turn raw errors into one-line messages.
 */
import { ConfigError } from "./config.js";
import { CorpusError } from "./corpus/errors.js";

/**
 * Node.js system error shape (ENOENT, EACCES, EPERM, etc.).
 * Not all Error objects carry these, so we use a type guard.
 */
interface NodeSystemError extends Error {
  code: string;
  path?: string;
  syscall?: string;
}

export function isNodeSystemError(err: unknown): err is NodeSystemError {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

/**
 * Format an error into a user-facing CLI message.
 *
 * - corpus and config errors carry their own message
 * - ENOENT / EACCES / EPERM / EISDIR name the offending path
 * - anything else prints its message without a stack trace
 */
export function formatCliError(err: unknown): string {
  if (err instanceof CorpusError || err instanceof ConfigError) {
    return err.message;
  }

  if (isNodeSystemError(err)) {
    const filePath = err.path ? ` "${err.path}"` : "";
    switch (err.code) {
      case "ENOENT":
        return `File not found:${filePath}. Check the corpus path.`;
      case "EACCES":
      case "EPERM":
        return `Permission denied:${filePath}. Check file permissions.`;
      case "EISDIR":
        return `Expected a file but found a directory:${filePath}.`;
      default:
        return `System error (${err.code}):${filePath}: ${err.message}`;
    }
  }

  if (err instanceof Error) {
    return err.message;
  }

  return String(err);
}
