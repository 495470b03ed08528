import type { FieldError } from "./problem.js";
import { decodeCursor, type SearchQuery } from "./engine.js";

export const MAX_QUERY_CHARS = 4096;
export const DEFAULT_LIMIT = 20;
export const MAX_LIMIT = 100;

export type Checked<T> = { ok: true; value: T } | { ok: false; errors: FieldError[] };

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Length in code points, the unit the tokenizer slides over. */
export function charLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Validate a `POST /search` body: `{ query, limit?, page?: { cursor? } }`.
 * An empty or one-character query is valid; it simply matches nothing.
 */
export function checkSearchRequest(body: Record<string, unknown>): Checked<SearchQuery> {
  const errors: FieldError[] = [];

  const query = body.query;
  if (typeof query !== "string") {
    errors.push({ path: "$.query", message: "must be a string" });
  } else if (charLength(query) > MAX_QUERY_CHARS) {
    errors.push({ path: "$.query", message: `must be at most ${MAX_QUERY_CHARS} characters` });
  }

  let limit = DEFAULT_LIMIT;
  if (body.limit !== undefined) {
    const n = body.limit;
    if (typeof n !== "number" || !Number.isInteger(n) || n < 1 || n > MAX_LIMIT) {
      errors.push({ path: "$.limit", message: `must be an integer between 1 and ${MAX_LIMIT}` });
    } else {
      limit = n;
    }
  }

  let after: number | undefined;
  if (isRecord(body.page) && body.page.cursor != null) {
    const cursor = body.page.cursor;
    if (typeof cursor !== "string" || cursor.length === 0) {
      errors.push({ path: "$.page.cursor", message: "must be a string" });
    } else {
      try {
        after = decodeCursor(cursor).after;
      } catch {
        errors.push({ path: "$.page.cursor", message: "invalid cursor" });
      }
    }
  }

  if (errors.length || typeof query !== "string") return { ok: false, errors };
  return { ok: true, value: { query, limit, after } };
}
