import { DataElement } from "./types/data";
import { PageContext } from "./types/page";
import {
  DiscoverStepConfig,
  ExtractStepConfig,
  InitStepConfig,
  PaginateStepConfig,
  SchemaDefinition,
} from "./types/workflow";

export type ProviderKind = "scraping" | "storage";

export interface ProviderMetadata {
  name: string;
  version: string;
  type: ProviderKind;
  capabilities: string[];
  description?: string;
}

export type ConnectionConfig = Record<string, unknown>;

export interface ScrapingProvider {
  readonly metadata: ProviderMetadata;
  initialize(config: ConnectionConfig): Promise<void>;
  executeInit(config: InitStepConfig): Promise<PageContext>;
  executeDiscover(config: DiscoverStepConfig, context: PageContext): Promise<DataElement[]>;
  executeExtract(config: ExtractStepConfig, context: PageContext): Promise<DataElement[]>;
  /** Resolves to `null` when there are no further pages. */
  executePaginate(config: PaginateStepConfig, context: PageContext): Promise<PageContext | null>;
  cleanup(): Promise<void>;
  healthCheck(): Promise<boolean>;
}

export interface StorageProvider {
  readonly metadata: ProviderMetadata;
  connect(config: ConnectionConfig): Promise<void>;
  store(elements: DataElement[], schema: SchemaDefinition): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;
}

export interface ProviderInstances {
  scraping: ScrapingProvider;
  storage: StorageProvider;
}

export type ProviderConstructor<K extends ProviderKind> = new () => ProviderInstances[K];
