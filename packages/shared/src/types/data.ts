export type ElementValue =
  | string
  | number
  | boolean
  | null
  | ElementValue[]
  | { [key: string]: ElementValue };

export type FieldMap = Record<string, ElementValue>;

export interface DataElement {
  type: string;
  selector: string;
  value: ElementValue;
  attributes: Record<string, string>;
  metadata: Record<string, unknown>;
}

export function createDataElement(
  init: Pick<DataElement, "type" | "selector" | "value"> & Partial<DataElement>,
): DataElement {
  return {
    type: init.type,
    selector: init.selector,
    value: init.value,
    attributes: init.attributes ?? {},
    metadata: init.metadata ?? {},
  };
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isFieldMap(value: ElementValue): value is FieldMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Field-map view used by post-processing: a map value as-is, anything else as `{ value }`. */
export function elementFields(element: DataElement): FieldMap {
  return isFieldMap(element.value) ? element.value : { value: element.value };
}

/** Writes a field map back in the element's original shape, returning a new element. */
export function withFields(element: DataElement, fields: FieldMap): DataElement {
  if (!isFieldMap(element.value)) {
    const keys = Object.keys(fields);
    if (keys.length === 1 && keys[0] === "value") {
      return { ...element, value: fields.value };
    }
  }
  return { ...element, value: { ...fields } };
}

export function hasField(fields: FieldMap, name: string): boolean {
  return Object.hasOwn(fields, name);
}

/** Own field lookup; inherited object members never count as fields. */
export function fieldValue(fields: FieldMap, name: string): ElementValue | undefined {
  return hasField(fields, name) ? fields[name] : undefined;
}

export function fieldText(value: ElementValue | undefined): string {
  if (value === undefined || value === null) {
    return "";
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

/** Narrows arbitrary JSON-ish input (e.g. stage config) to an element value. */
export function toElementValue(value: unknown): ElementValue {
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toElementValue);
  }
  if (typeof value === "object") {
    const entries: FieldMap = {};
    for (const [key, entry] of Object.entries(value)) {
      entries[key] = toElementValue(entry);
    }
    return entries;
  }
  return value === undefined ? null : String(value);
}
