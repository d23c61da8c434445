import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createDataElement } from "@scrapeflow/shared";
import { JsonStorage } from "../src/providers/storage/json";
import { CsvStorage, parseCsvLine, quoteCell } from "../src/providers/storage/csv";
import { coerceField, toStoredRecord } from "../src/providers/storage/records";
import { StorageError } from "../src/runtime/errors";
import { rowElement, textElements } from "./_helpers/fakes";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "scrapeflow-storage-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

const productSchema = {
  name: "products",
  fields: {
    price: { type: "number" as const, required: false, index: false },
    title: { type: "string" as const, required: true, index: false },
  },
  primary_key: [],
};

const valueSchema = {
  name: "values",
  fields: { value: { type: "string" as const, required: false, index: false } },
  primary_key: [],
};

describe("records", () => {
  it("lifts and coerces schema fields, defaulting required ones", () => {
    const record = toStoredRecord(rowElement({ price: "1,249.50" }), productSchema, "2024-05-06T00:00:00.000Z");
    expect(record).toEqual({
      type: "row",
      selector: "tr",
      value: { price: "1,249.50" },
      attributes: {},
      metadata: {},
      stored_at: "2024-05-06T00:00:00.000Z",
      price: 1249.5,
      title: "",
    });
  });

  it("coerces by field type", () => {
    expect(coerceField("abc", { type: "number", required: false, index: false })).toBeUndefined();
    expect(coerceField("Yes", { type: "boolean", required: false, index: false })).toBe(true);
    expect(coerceField('{"a":1}', { type: "json", required: false, index: false })).toEqual({ a: 1 });
    expect(coerceField("abcdef", { type: "string", required: false, index: false, max_length: 3 })).toBe("abc");
  });
});

describe("JsonStorage", () => {
  it("appends JSON lines", async () => {
    const file = path.join(dir, "out", "items.jsonl");
    const storage = new JsonStorage();
    await storage.connect({ file_path: file });

    await storage.store(textElements("title", ["a"]), valueSchema);
    await storage.store(textElements("title", ["b"]), valueSchema);

    const lines = (await fs.readFile(file, "utf-8")).trim().split("\n");
    expect(lines.map((line) => JSON.parse(line).value)).toEqual(["a", "b"]);
    expect(await storage.healthCheck()).toBe(true);
  });

  it("merges into an existing JSON array", async () => {
    const file = path.join(dir, "items.json");
    const storage = new JsonStorage();
    await storage.connect({ json: { file_path: file, format: "JSON", pretty_print: true } });

    await storage.store(textElements("title", ["a"]), valueSchema);
    await storage.store(textElements("title", ["b", "c"]), valueSchema);

    const saved: unknown = JSON.parse(await fs.readFile(file, "utf-8"));
    expect(Array.isArray(saved) ? saved.map((record) => record.value) : saved).toEqual(["a", "b", "c"]);
  });

  it("refuses to overwrite a corrupt array file", async () => {
    const file = path.join(dir, "items.json");
    await fs.writeFile(file, "[{not json", "utf-8");
    const storage = new JsonStorage();
    await storage.connect({ file_path: file, format: "json" });

    await expect(storage.store(textElements("title", ["a"]), valueSchema)).rejects.toBeInstanceOf(StorageError);
    expect(await fs.readFile(file, "utf-8")).toBe("[{not json");
  });

  it("requires a connection before storing", async () => {
    const storage = new JsonStorage();
    await expect(storage.store(textElements("title", ["a"]), valueSchema)).rejects.toThrow(
      "json storage: not connected",
    );
  });
});

describe("CsvStorage", () => {
  it("quotes cells that need it", () => {
    expect(quoteCell("plain", ",")).toBe("plain");
    expect(quoteCell('Say "hi"', ",")).toBe('"Say ""hi"""');
    expect(parseCsvLine('a,"b,c","d ""e"""', ",")).toEqual(["a", "b,c", 'd "e"']);
  });

  it("writes a header once and appends with the existing columns", async () => {
    const file = path.join(dir, "items.csv");
    const storage = new CsvStorage();
    await storage.connect({ file_path: file });

    await storage.store(textElements("title", ["Lamp, large", 'Say "hi"']), valueSchema);
    await storage.store(
      [createDataElement({ type: "title", selector: ".title", value: "Shelf", attributes: { href: "/x" } })],
      valueSchema,
    );

    expect(await fs.readFile(file, "utf-8")).toBe(
      [
        "type,selector,value,meta_index",
        'title,.title,"Lamp, large",0',
        'title,.title,"Say ""hi""",1',
        "title,.title,Shelf,",
        "",
      ].join("\n"),
    );
  });

  it("honours the delimiter and header settings", async () => {
    const file = path.join(dir, "items.csv");
    const storage = new CsvStorage();
    await storage.connect({ csv: { file_path: file, delimiter: ";", headers: false } });

    await storage.store(textElements("title", ["a;b"]), valueSchema);

    expect(await fs.readFile(file, "utf-8")).toBe('title;.title;"a;b";0\n');
  });

  it("rejects invalid config", async () => {
    await expect(new CsvStorage().connect({ file_path: path.join(dir, "x.csv"), delimiter: "::" })).rejects.toThrow(
      "csv storage: invalid config: delimiter: String must contain exactly 1 character(s)",
    );
  });
});
