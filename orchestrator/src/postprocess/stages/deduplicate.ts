import { z } from "zod";
import { elementFields, FieldMap, fieldText, fieldValue } from "@scrapeflow/shared";
import { parseStageConfig, Stage } from "../stage";

const DeduplicateConfigSchema = z.object({
  key: z
    .union([z.string(), z.array(z.string())])
    .default([])
    .transform((key) => (typeof key === "string" ? [key] : key)),
});

export function createDeduplicateStage(raw: Record<string, unknown>): Stage {
  const { key } = parseStageConfig("deduplicate", DeduplicateConfigSchema, raw);

  const keyOf = (fields: FieldMap): string => {
    if (key.length > 0) {
      return JSON.stringify(key.map((field) => fieldText(fieldValue(fields, field))));
    }
    return JSON.stringify(
      Object.entries(fields)
        .map(([name, value]) => `${name}:${fieldText(value)}`)
        .sort(),
    );
  };

  return {
    type: "deduplicate",
    apply: (elements) => {
      const seen = new Set<string>();
      return elements.filter((element) => {
        const identity = keyOf(elementFields(element));
        if (seen.has(identity)) {
          return false;
        }
        seen.add(identity);
        return true;
      });
    },
  };
}
