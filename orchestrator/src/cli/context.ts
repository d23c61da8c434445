import { loadConfig, ScrapeflowConfig } from "../config/defaults";
import { ConsoleLogger, Logger } from "../logging/logger";
import { createDefaultRegistry } from "../providers/builtin";
import { ProviderRegistry } from "../providers/registry";

/** Seams the commands take so tests can swap providers, logging and delays. */
export interface CommandDeps {
  registry?: ProviderRegistry;
  createLogger?: (scope: string) => Logger;
  sleep?: (ms: number) => Promise<void>;
  env?: NodeJS.ProcessEnv;
}

export interface CommandContext {
  config: ScrapeflowConfig;
  registry: ProviderRegistry;
}

export function commandContext(configPath: string | undefined, deps: CommandDeps): CommandContext {
  const config = loadConfig(configPath, deps.env ?? process.env);
  const registry =
    deps.registry ??
    createDefaultRegistry(deps.createLogger?.("registry") ?? new ConsoleLogger("registry", config.runtime.logLevel));
  return { config, registry };
}
