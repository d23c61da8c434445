import { z } from "zod";
import { ConnectionConfig, formatIssues, isPlainObject } from "@scrapeflow/shared";
import { StorageError } from "../../runtime/errors";

/** Storage configs may be flat or nested under the provider's own name. */
export function unwrapStorageConfig(provider: string, config: ConnectionConfig): ConnectionConfig {
  const nested = config[provider];
  if (isPlainObject(nested)) {
    return nested;
  }
  return config;
}

export function parseStorageConfig<T extends z.ZodTypeAny>(
  provider: string,
  schema: T,
  config: ConnectionConfig,
): z.infer<T> {
  const parsed = schema.safeParse(unwrapStorageConfig(provider, config));
  if (!parsed.success) {
    throw new StorageError(provider, `invalid config: ${formatIssues(parsed.error).join("; ")}`);
  }
  return parsed.data;
}
