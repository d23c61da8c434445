import { DataElement, elementFields, fieldValue, SchemaDefinition, SchemaField } from "@scrapeflow/shared";

export type StoredRecord = Record<string, unknown>;

function defaultFor(type: SchemaField["type"]): unknown {
  switch (type) {
    case "string":
      return "";
    case "number":
      return 0;
    case "boolean":
      return false;
    case "date":
      return new Date().toISOString();
    case "json":
      return {};
  }
}

const TRUTHY = new Set(["true", "1", "yes", "on"]);

/** Coerces a value to a schema type; returns `undefined` when it cannot. */
export function coerceField(value: unknown, field: SchemaField): unknown {
  switch (field.type) {
    case "string": {
      const text = typeof value === "object" ? JSON.stringify(value) : String(value);
      return field.max_length !== undefined ? text.slice(0, field.max_length) : text;
    }
    case "number": {
      if (typeof value === "number") {
        return value;
      }
      const parsed = typeof value === "string" && value.trim() !== "" ? Number(value.replace(/,/g, "")) : Number.NaN;
      return Number.isNaN(parsed) ? undefined : parsed;
    }
    case "boolean":
      return typeof value === "string" ? TRUTHY.has(value.toLowerCase()) : Boolean(value);
    case "date":
      return value instanceof Date ? value.toISOString() : String(value);
    case "json":
      if (typeof value !== "string") {
        return value;
      }
      try {
        return JSON.parse(value);
      } catch {
        return value;
      }
  }
}

/**
 * Flattens an element into the record written by file storage. Fields the
 * schema declares are lifted from the element's field map and coerced.
 */
export function toStoredRecord(element: DataElement, schema: SchemaDefinition, storedAt: string): StoredRecord {
  const record: StoredRecord = {
    type: element.type,
    selector: element.selector,
    value: element.value,
    attributes: element.attributes,
    metadata: element.metadata,
    stored_at: storedAt,
  };
  const fields = elementFields(element);

  for (const [name, field] of Object.entries(schema.fields)) {
    const own = Object.hasOwn(record, name);
    const source = own ? record[name] : fieldValue(fields, name);
    if (source === undefined) {
      if (field.required) {
        record[name] = defaultFor(field.type);
      }
      continue;
    }
    if (source === null) {
      continue;
    }
    const coerced = coerceField(source, field);
    if (coerced !== undefined) {
      record[name] = coerced;
    } else if (!own) {
      record[name] = source;
    }
  }

  return record;
}
