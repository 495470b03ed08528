/** Shared core types used by module contracts. */

/** 0-based position of a record within its corpus snapshot. */
export type RecordId = number;

/** A fixed-width character n-gram. Compared by exact string equality. */
export type Token = string;

/** One row of the corpus. Fields may be missing; the schema is not uniform. */
export interface CorpusRecord {
  readonly id: RecordId;
  readonly fields: Readonly<Record<string, string>>;
}

/**
 * Schema-tolerant field accessor: a field the record does not carry reads as "".
 */
export function fieldText(record: CorpusRecord, field: string): string {
  return Object.hasOwn(record.fields, field) ? record.fields[field] ?? "" : "";
}
