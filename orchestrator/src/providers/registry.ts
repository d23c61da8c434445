import {
  ConnectionConfig,
  ProviderConstructor,
  ProviderInstances,
  ProviderKind,
  ProviderMetadata,
} from "@scrapeflow/shared";
import { UnknownProviderError } from "../runtime/errors";
import { Logger, silentLogger } from "../logging/logger";

type Constructors = {
  [K in ProviderKind]: Map<string, ProviderConstructor<K>>;
};

const KINDS: readonly ProviderKind[] = ["scraping", "storage"];

/**
 * Maps `(kind, name)` to provider constructors. Each `create` call builds a
 * fresh instance, so concurrent runs never share provider state.
 */
export class ProviderRegistry {
  private constructors: Constructors = {
    scraping: new Map(),
    storage: new Map(),
  };
  private logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  register<K extends ProviderKind>(kind: K, name: string, ctor: ProviderConstructor<K>): this {
    const table: Map<string, ProviderConstructor<K>> = this.constructors[kind];
    table.set(name, ctor);
    this.logger.debug(`registered ${kind} provider '${name}'`);
    return this;
  }

  has(kind: ProviderKind, name: string): boolean {
    return this.constructors[kind].has(name);
  }

  names(kind: ProviderKind): string[] {
    return [...this.constructors[kind].keys()].sort();
  }

  create<K extends ProviderKind>(kind: K, name: string): ProviderInstances[K] {
    const table: Map<string, ProviderConstructor<K>> = this.constructors[kind];
    const ctor = table.get(name);
    if (!ctor) {
      throw new UnknownProviderError(kind, name, this.names(kind));
    }
    return new ctor();
  }

  list(kind?: ProviderKind): ProviderMetadata[] {
    const kinds = kind ? [kind] : KINDS;
    const entries: ProviderMetadata[] = [];
    for (const current of kinds) {
      for (const name of this.names(current)) {
        entries.push(this.describe(current, name));
      }
    }
    return entries;
  }

  /**
   * Instantiates the named provider (scraping first, then storage), connects it
   * with `config` and runs its health check. Any failure reports `false`.
   */
  async testConnection(name: string, config: ConnectionConfig = {}): Promise<boolean> {
    if (this.has("scraping", name)) {
      let provider: ProviderInstances["scraping"] | null = null;
      try {
        provider = this.create("scraping", name);
        await provider.initialize(config);
        return await provider.healthCheck();
      } catch (error) {
        this.logger.warn(`scraping provider '${name}' failed its connection test: ${String(error)}`);
        return false;
      } finally {
        await provider?.cleanup().catch((error: unknown) => {
          this.logger.debug(`ignoring cleanup failure for '${name}': ${String(error)}`);
        });
      }
    }

    if (this.has("storage", name)) {
      let provider: ProviderInstances["storage"] | null = null;
      try {
        provider = this.create("storage", name);
        await provider.connect(config);
        return await provider.healthCheck();
      } catch (error) {
        this.logger.warn(`storage provider '${name}' failed its connection test: ${String(error)}`);
        return false;
      } finally {
        await provider?.disconnect().catch((error: unknown) => {
          this.logger.debug(`ignoring disconnect failure for '${name}': ${String(error)}`);
        });
      }
    }

    this.logger.warn(`no provider named '${name}' is registered`);
    return false;
  }

  private describe(kind: ProviderKind, name: string): ProviderMetadata {
    try {
      return { ...this.create(kind, name).metadata };
    } catch (error) {
      this.logger.warn(`could not read metadata for ${kind} provider '${name}': ${String(error)}`);
      return { name, version: "unknown", type: kind, capabilities: [] };
    }
  }
}
