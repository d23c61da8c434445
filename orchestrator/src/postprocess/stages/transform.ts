import { z } from "zod";
import { elementFields, FieldMap, withFields } from "@scrapeflow/shared";
import { parseStageConfig, Stage } from "../stage";

const TransformConfigSchema = z.object({
  strip: z.boolean().default(true),
  replace: z.record(z.string()).default({}),
  lowercase: z.boolean().default(false),
});

export function createTransformStage(raw: Record<string, unknown>): Stage {
  const config = parseStageConfig("transform", TransformConfigSchema, raw);
  const replacements = Object.entries(config.replace);

  const clean = (value: string): string => {
    let next = config.strip ? value.trim() : value;
    for (const [from, to] of replacements) {
      if (from) {
        next = next.split(from).join(to);
      }
    }
    return config.lowercase ? next.toLowerCase() : next;
  };

  return {
    type: "transform",
    apply: (elements) =>
      elements.map((element) => {
        const fields: FieldMap = {};
        for (const [key, value] of Object.entries(elementFields(element))) {
          fields[key] = typeof value === "string" ? clean(value) : value;
        }
        return withFields(element, fields);
      }),
  };
}
