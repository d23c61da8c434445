import { z } from "zod";
import { elementFields, ElementValue, toElementValue, withFields } from "@scrapeflow/shared";
import { parseStageConfig, Stage, StageContext } from "../stage";

// A column is either a literal or `{ value, type? }`; `type` is informational.
const AddColumnsConfigSchema = z.object({
  columns: z.record(z.unknown()).default({}),
});

function isColumnObject(value: unknown): value is { value?: unknown } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function resolvePlaceholder(value: ElementValue, now: Date, sourceUrl: string): ElementValue {
  switch (value) {
    case "{current_date}":
      return now.toISOString().slice(0, 10);
    case "{current_datetime}":
      return now.toISOString();
    case "{source_url}":
      return sourceUrl;
    default:
      return value;
  }
}

export function createAddColumnsStage(raw: Record<string, unknown>, context: StageContext): Stage {
  const { columns } = parseStageConfig("add_columns", AddColumnsConfigSchema, raw);
  const entries = Object.entries(columns).map(([name, column]): [string, ElementValue] => [
    name,
    isColumnObject(column) ? toElementValue(column.value ?? "") : String(column),
  ]);

  return {
    type: "add_columns",
    apply: (elements) => {
      if (entries.length === 0) {
        return elements;
      }
      const now = context.now();
      return elements.map((element) => {
        const source = element.metadata.source_url;
        const sourceUrl = typeof source === "string" ? source : "";
        const fields = { ...elementFields(element) };
        for (const [name, value] of entries) {
          fields[name] = resolvePlaceholder(value, now, sourceUrl);
        }
        return withFields(element, fields);
      });
    },
  };
}
