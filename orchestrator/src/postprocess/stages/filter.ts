import { z } from "zod";
import { elementFields, fieldText, hasField } from "@scrapeflow/shared";
import { parseStageConfig, Stage } from "../stage";

const FILTER_HEADER_INDICATORS = ["date", "time", "generation", "demand", "mw", "column"];

const FilterConfigSchema = z.object({
  required_fields: z.array(z.string()).default([]),
  min_length: z.number().int().min(0).default(0),
  excludes: z.string().default(""),
  exclude_empty: z.boolean().default(true),
  exclude_headers: z.boolean().default(false),
});

export function createFilterStage(raw: Record<string, unknown>): Stage {
  const config = parseStageConfig("filter", FilterConfigSchema, raw);
  const excludes = config.excludes.toLowerCase();

  return {
    type: "filter",
    apply: (elements) =>
      elements.filter((element) => {
        const fields = elementFields(element);
        const values = Object.values(fields);

        if (config.required_fields.some((field) => !hasField(fields, field))) {
          return false;
        }
        if (config.min_length > 0) {
          const longEnough = values.some((value) => typeof value === "string" && value.length >= config.min_length);
          if (!longEnough) {
            return false;
          }
        }
        const text = values.map(fieldText).join(" ");
        if (excludes && text.toLowerCase().includes(excludes)) {
          return false;
        }
        if (config.exclude_empty && values.every((value) => fieldText(value).trim() === "")) {
          return false;
        }
        if (config.exclude_headers) {
          const lowered = text.toLowerCase();
          if (FILTER_HEADER_INDICATORS.some((indicator) => lowered.includes(indicator))) {
            return false;
          }
        }
        return true;
      }),
  };
}
