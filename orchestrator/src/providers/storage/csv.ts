import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import {
  ConnectionConfig,
  DataElement,
  ProviderMetadata,
  SchemaDefinition,
  StorageProvider,
} from "@scrapeflow/shared";
import { describeError, StorageError } from "../../runtime/errors";
import { parseStorageConfig } from "./config";
import { assertWritableDirectory } from "./json";
import { toStoredRecord } from "./records";

export const CsvStorageConfigSchema = z.object({
  file_path: z.string().min(1).default("./scraped_data.csv"),
  delimiter: z.string().length(1).default(","),
  headers: z.boolean().default(true),
});
export type CsvStorageConfig = z.infer<typeof CsvStorageConfigSchema>;

type Row = Record<string, string>;

function cellText(value: unknown): string {
  if (value === undefined || value === null) {
    return "";
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

export function quoteCell(value: string, delimiter: string): string {
  if (value.includes('"') || value.includes(delimiter) || value.includes("\n") || value.includes("\r")) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function parseCsvLine(line: string, delimiter: string): string[] {
  const cells: string[] = [];
  let current = "";
  let quoted = false;
  for (let index = 0; index < line.length; index += 1) {
    const char = line[index];
    if (quoted) {
      if (char === '"' && line[index + 1] === '"') {
        current += '"';
        index += 1;
      } else if (char === '"') {
        quoted = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === delimiter) {
      cells.push(current);
      current = "";
    } else {
      current += char;
    }
  }
  cells.push(current);
  return cells;
}

const NESTED_KEYS = new Set(["attributes", "metadata", "stored_at"]);

/** Flattens an element to `type, selector, value, attr_*, meta_*` plus schema fields. */
export function toRow(element: DataElement, schema: SchemaDefinition, storedAt: string): Row {
  const row: Row = {};
  for (const [key, value] of Object.entries(toStoredRecord(element, schema, storedAt))) {
    if (!NESTED_KEYS.has(key)) {
      row[key] = cellText(value);
    }
  }
  for (const [name, value] of Object.entries(element.attributes)) {
    row[`attr_${name}`] = value;
  }
  for (const [name, value] of Object.entries(element.metadata)) {
    row[`meta_${name}`] = cellText(value);
  }
  return row;
}

export class CsvStorage implements StorageProvider {
  readonly metadata: ProviderMetadata = {
    name: "csv",
    version: "1.0.0",
    type: "storage",
    capabilities: ["csv", "append_mode", "flattened_attributes"],
    description: "Writes records as delimited rows with one column per attribute and metadata key",
  };

  private config: CsvStorageConfig | null = null;

  async connect(config: ConnectionConfig): Promise<void> {
    const parsed = parseStorageConfig("csv", CsvStorageConfigSchema, config);
    await assertWritableDirectory("csv", parsed.file_path);
    this.config = parsed;
  }

  async disconnect(): Promise<void> {
    this.config = null;
  }

  async healthCheck(): Promise<boolean> {
    return this.config !== null;
  }

  async store(elements: DataElement[], schema: SchemaDefinition): Promise<void> {
    const config = this.requireConfig();
    if (elements.length === 0) {
      return;
    }
    const storedAt = new Date().toISOString();
    const rows = elements.map((element) => toRow(element, schema, storedAt));

    try {
      const existing = await this.readExisting(config);
      if (existing !== null) {
        const columns = existing.length > 0 ? existing : this.columnsOf(rows);
        await fs.appendFile(config.file_path, this.formatLines(rows, columns, config), "utf-8");
        return;
      }
      const columns = this.columnsOf(rows);
      const header = config.headers
        ? `${columns.map((column) => quoteCell(column, config.delimiter)).join(config.delimiter)}\n`
        : "";
      await fs.writeFile(config.file_path, header + this.formatLines(rows, columns, config), "utf-8");
    } catch (error) {
      throw new StorageError("csv", `failed to write ${config.file_path}: ${describeError(error)}`);
    }
  }

  private formatLines(rows: Row[], columns: string[], config: CsvStorageConfig): string {
    return rows
      .map((row) => `${columns.map((column) => quoteCell(row[column] ?? "", config.delimiter)).join(config.delimiter)}\n`)
      .join("");
  }

  /** Column order follows first appearance across the batch. */
  private columnsOf(rows: Row[]): string[] {
    const columns: string[] = [];
    for (const row of rows) {
      for (const key of Object.keys(row)) {
        if (!columns.includes(key)) {
          columns.push(key);
        }
      }
    }
    return columns;
  }

  /**
   * `null` when there is nothing to append to. Otherwise the header columns of
   * the existing file, or an empty list when it was written without one.
   */
  private async readExisting(config: CsvStorageConfig): Promise<string[] | null> {
    let raw: string;
    try {
      raw = await fs.readFile(path.resolve(config.file_path), "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }
    const [first] = raw.split(/\r?\n/, 1);
    if (!first) {
      return null;
    }
    return config.headers ? parseCsvLine(first, config.delimiter) : [];
  }

  private requireConfig(): CsvStorageConfig {
    if (!this.config) {
      throw new StorageError("csv", "not connected");
    }
    return this.config;
  }
}
