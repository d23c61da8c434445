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
import { StoredRecord, toStoredRecord } from "./records";

export const JsonStorageConfigSchema = z.object({
  file_path: z.string().min(1).default("./scraped_data.jsonl"),
  format: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(["json", "jsonl"]))
    .default("jsonl"),
  pretty_print: z.boolean().default(false),
  append_mode: z.boolean().default(true),
});
export type JsonStorageConfig = z.infer<typeof JsonStorageConfigSchema>;

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

export async function assertWritableDirectory(provider: string, filePath: string): Promise<void> {
  const directory = path.dirname(path.resolve(filePath));
  try {
    await fs.mkdir(directory, { recursive: true });
    await fs.access(directory, fs.constants.W_OK);
  } catch (error) {
    throw new StorageError(provider, `cannot write to ${directory}: ${describeError(error)}`);
  }
}

export class JsonStorage implements StorageProvider {
  readonly metadata: ProviderMetadata = {
    name: "json",
    version: "1.0.0",
    type: "storage",
    capabilities: ["json", "jsonl", "append_mode", "pretty_print", "schema_coercion"],
    description: "Writes records to JSON or JSON Lines files",
  };

  private config: JsonStorageConfig | null = null;

  async connect(config: ConnectionConfig): Promise<void> {
    const parsed = parseStorageConfig("json", JsonStorageConfigSchema, config);
    await assertWritableDirectory("json", parsed.file_path);
    this.config = parsed;
  }

  async disconnect(): Promise<void> {
    this.config = null;
  }

  async healthCheck(): Promise<boolean> {
    if (!this.config) {
      return false;
    }
    try {
      await fs.access(path.dirname(path.resolve(this.config.file_path)), fs.constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }

  async store(elements: DataElement[], schema: SchemaDefinition): Promise<void> {
    const config = this.requireConfig();
    if (elements.length === 0) {
      return;
    }
    const storedAt = new Date().toISOString();
    const records = elements.map((element) => toStoredRecord(element, schema, storedAt));

    try {
      if (config.format === "jsonl") {
        await this.writeLines(config, records);
      } else {
        await this.writeArray(config, records);
      }
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      throw new StorageError("json", `failed to write ${config.file_path}: ${describeError(error)}`);
    }
  }

  private async writeLines(config: JsonStorageConfig, records: StoredRecord[]): Promise<void> {
    const payload = records.map((record) => `${JSON.stringify(record)}\n`).join("");
    if (config.append_mode) {
      await fs.appendFile(config.file_path, payload, "utf-8");
    } else {
      await fs.writeFile(config.file_path, payload, "utf-8");
    }
  }

  private async writeArray(config: JsonStorageConfig, records: StoredRecord[]): Promise<void> {
    let existing: unknown[] = [];
    if (config.append_mode && (await exists(config.file_path))) {
      const raw = await fs.readFile(config.file_path, "utf-8");
      try {
        const parsed: unknown = JSON.parse(raw);
        if (Array.isArray(parsed)) {
          existing = parsed;
        }
      } catch (error) {
        throw new StorageError("json", `existing file ${config.file_path} is not valid JSON: ${describeError(error)}`);
      }
    }
    const body = JSON.stringify([...existing, ...records], null, config.pretty_print ? 2 : undefined);
    await fs.writeFile(config.file_path, `${body}\n`, "utf-8");
  }

  private requireConfig(): JsonStorageConfig {
    if (!this.config) {
      throw new StorageError("json", "not connected");
    }
    return this.config;
  }
}
