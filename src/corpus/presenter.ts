import { fieldText, type CorpusRecord, type RecordId } from "../core/types.js";

export interface ResultView {
  id: RecordId;
  fields: Record<string, string>;
}

/** One display line: the display fields' values separated by single spaces. */
export function formatRecord(record: CorpusRecord, displayFields: readonly string[]): string {
  return displayFields.map((f) => fieldText(record, f)).join(" ");
}

export function toResultView(record: CorpusRecord, displayFields: readonly string[]): ResultView {
  const fields: Record<string, string> = {};
  for (const f of displayFields) fields[f] = fieldText(record, f);
  return { id: record.id, fields };
}
