import { z } from "zod";
import { elementFields, ElementValue, fieldText, fieldValue } from "@scrapeflow/shared";
import { parseStageConfig, Stage } from "../stage";

const ValidateConfigSchema = z.object({
  required: z.boolean().default(false),
  min_length: z.number().int().min(0).default(0),
  data_types: z.record(z.enum(["float", "int"])).default({}),
});

const INTEGER = /^[+-]?\d+$/;

export function isFloatLike(value: ElementValue): boolean {
  if (typeof value === "number" || typeof value === "boolean") {
    return true;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed !== "" && !Number.isNaN(Number(trimmed));
  }
  return false;
}

export function isIntLike(value: ElementValue): boolean {
  if (typeof value === "number" || typeof value === "boolean") {
    return true;
  }
  return typeof value === "string" && INTEGER.test(value.trim());
}

export function createValidateStage(raw: Record<string, unknown>): Stage {
  const config = parseStageConfig("validate", ValidateConfigSchema, raw);
  const typeChecks = Object.entries(config.data_types);

  return {
    type: "validate",
    apply: (elements) =>
      elements.filter((element) => {
        const fields = elementFields(element);
        if (config.required && Object.keys(fields).length === 0) {
          return false;
        }
        if (config.min_length > 0) {
          const text = Object.values(fields).map(fieldText).join(" ").trim();
          if (text.length < config.min_length) {
            return false;
          }
        }
        return typeChecks.every(([field, expected]) => {
          const value = fieldValue(fields, field);
          if (value === undefined) {
            return true;
          }
          return expected === "float" ? isFloatLike(value) : isIntLike(value);
        });
      }),
  };
}
