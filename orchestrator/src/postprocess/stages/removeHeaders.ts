import { z } from "zod";
import { elementFields, fieldText } from "@scrapeflow/shared";
import { parseStageConfig, Stage } from "../stage";

export const DEFAULT_HEADER_INDICATORS = [
  "date",
  "time",
  "generation",
  "demand",
  "mw",
  "column",
  "sl",
  "serial",
  "no.",
  "#",
  "header",
];

const HEADER_PATTERNS = [
  /^(column|col)_?\d+$/,
  /^[a-z_]+\([a-z]+\)$/,
  /^\w+\s+\([^)]+\)$/,
  /^sl\.?$|^no\.?$|^#$/,
];

const RemoveHeadersConfigSchema = z.object({
  header_indicators: z.array(z.string()).default(DEFAULT_HEADER_INDICATORS),
  keep_first: z.boolean().default(true),
  case_sensitive: z.boolean().default(false),
  exact_match: z.boolean().default(false),
});
type RemoveHeadersConfig = z.infer<typeof RemoveHeadersConfigSchema>;

export function isHeaderRow(values: string[], config: RemoveHeadersConfig): boolean {
  if (values.length === 0) {
    return false;
  }
  const normalize = (value: string) => (config.case_sensitive ? value : value.toLowerCase());
  const indicators = config.header_indicators.map(normalize);
  const normalized = values.map(normalize);

  const matched = config.exact_match
    ? indicators.some((indicator) => normalized.includes(indicator))
    : indicators.some((indicator) => normalized.join(" ").includes(indicator));
  if (matched) {
    return true;
  }

  // Column-name shaped rows: col_1, demand(mw), Generation (MW), No.
  if (values.length < 3) {
    return false;
  }
  const patterns = config.case_sensitive
    ? HEADER_PATTERNS
    : HEADER_PATTERNS.map((pattern) => new RegExp(pattern.source, "i"));
  const headerLike = normalized.filter((value) => patterns.some((pattern) => pattern.test(value))).length;
  return headerLike >= values.length * 0.6;
}

/** Drops header rows repeated across paginated tables, optionally keeping the first. */
export function createRemoveHeadersStage(raw: Record<string, unknown>): Stage {
  const config = parseStageConfig("remove_headers", RemoveHeadersConfigSchema, raw);

  return {
    type: "remove_headers",
    apply: (elements) => {
      let keptFirst = false;
      return elements.filter((element) => {
        const values = Object.values(elementFields(element))
          .map(fieldText)
          .filter((value) => value.trim() !== "");
        if (!isHeaderRow(values, config)) {
          return true;
        }
        if (config.keep_first && !keptFirst) {
          keptFirst = true;
          return true;
        }
        return false;
      });
    },
  };
}
