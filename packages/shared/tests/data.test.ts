import { describe, expect, it } from "vitest";
import { createDataElement, createPageContext, elementFields, fieldText, fieldValue, hasField, withFields } from "../src";

describe("data elements", () => {
  it("views scalar values as a single value field", () => {
    const element = createDataElement({ type: "title", selector: "h1", value: "Hello" });
    expect(elementFields(element)).toEqual({ value: "Hello" });
    expect(withFields(element, { value: "hello" }).value).toBe("hello");
    expect(element.value).toBe("Hello");
  });

  it("keeps map values as maps", () => {
    const element = createDataElement({ type: "row", selector: "tr", value: { a: "1" } });
    expect(withFields(element, { a: "1", b: "2" }).value).toEqual({ a: "1", b: "2" });
  });

  it("promotes scalars to maps when fields are added", () => {
    const element = createDataElement({ type: "cell", selector: "td", value: 4 });
    expect(withFields(element, { value: 4, source: "x" }).value).toEqual({ value: 4, source: "x" });
  });

  it("stringifies field values", () => {
    expect(fieldText(undefined)).toBe("");
    expect(fieldText(null)).toBe("");
    expect(fieldText(12.5)).toBe("12.5");
    expect(fieldText(["a"])).toBe('["a"]');
  });
});

describe("page context", () => {
  it("applies defaults and clamps the viewport", () => {
    const context = createPageContext({ url: "https://a.test", viewport: { width: 100, height: 5000 } });
    expect(context.user_agent).toBe("scrapeflow/1.0.0");
    expect(context.viewport).toEqual({ width: 320, height: 4320 });
    expect(context.navigation_history).toEqual([]);
  });
});

describe("fieldValue", () => {
  it("reads own fields only", () => {
    const fields = { name: "Lamp" };
    expect(hasField(fields, "name")).toBe(true);
    expect(hasField(fields, "constructor")).toBe(false);
    expect(fieldValue(fields, "name")).toBe("Lamp");
    expect(fieldValue(fields, "toString")).toBeUndefined();
  });
});
