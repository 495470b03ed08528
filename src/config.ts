import { z } from "zod";

/** Address columns whose text participates in indexing. Code columns are left out. */
export const DEFAULT_SEARCHABLE_FIELDS: readonly string[] = [
  "都道府県",
  "都道府県カナ",
  "市区町村",
  "市区町村カナ",
  "町域",
  "町域カナ",
  "町域補足",
  "補足",
  "事業所名",
  "事業所名カナ",
  "事業所住所",
];

/** Columns shown for each match: postal code, prefecture, city, town. */
export const DEFAULT_DISPLAY_FIELDS: readonly string[] = ["郵便番号", "都道府県", "市区町村", "町域"];

/** Tried in order until one decodes the corpus without error. */
export const DEFAULT_ENCODINGS: readonly string[] = ["utf-8", "shift_jis", "euc-jp", "iso-2022-jp"];

function commaList(defaults: readonly string[]) {
  return z
    .string()
    .optional()
    .transform((v) => (v === undefined ? [...defaults] : v.split(",").map((s) => s.trim()).filter(Boolean)))
    .refine((list) => list.length > 0, { message: "must name at least one entry" });
}

const flag = z
  .enum(["0", "1", "true", "false", ""])
  .optional()
  .transform((v) => v === "1" || v === "true");

const EnvSchema = z.object({
  PORT: z.preprocess(
    (v) => (v === "" ? undefined : v),
    z.coerce.number().int().min(0).max(65535).default(3000),
  ),
  METRICS_ENABLED: flag,
  CORPUS_FILE: z
    .string()
    .optional()
    .transform((v) => (v ? v : undefined)),
  SEARCHABLE_FIELDS: commaList(DEFAULT_SEARCHABLE_FIELDS),
  DISPLAY_FIELDS: commaList(DEFAULT_DISPLAY_FIELDS),
  CORPUS_ENCODINGS: commaList(DEFAULT_ENCODINGS),
});

export interface AppConfig {
  port: number;
  metricsEnabled: boolean;
  corpusFile?: string;
  searchableFields: string[];
  displayFields: string[];
  encodings: string[];
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }

  const c = parsed.data;
  return {
    port: c.PORT,
    metricsEnabled: c.METRICS_ENABLED,
    corpusFile: c.CORPUS_FILE,
    searchableFields: c.SEARCHABLE_FIELDS,
    displayFields: c.DISPLAY_FIELDS,
    encodings: c.CORPUS_ENCODINGS,
  };
}
