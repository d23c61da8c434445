import { ElementValue } from "@scrapeflow/shared";

export type ValueTransform = "float" | "int";

const INTEGER = /^[+-]?\d+$/;

/** Numeric coercion for extracted text; anything unparsable becomes 0. */
export function applyTransform(value: string, transform?: ValueTransform): ElementValue {
  if (transform === "float") {
    const cleaned = value.replace(/[,$]/g, "").trim();
    const parsed = cleaned === "" ? Number.NaN : Number(cleaned);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  if (transform === "int") {
    const cleaned = value.replace(/,/g, "").trim();
    return INTEGER.test(cleaned) ? Number.parseInt(cleaned, 10) : 0;
  }
  return value;
}

export function delay(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}
