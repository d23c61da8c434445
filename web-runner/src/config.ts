import { z } from "zod";
import { ConnectionConfig, DEFAULT_USER_AGENT, formatIssues } from "@scrapeflow/shared";

export const HtmlScraperOptionsSchema = z.object({
  user_agent: z.string().min(1).default(DEFAULT_USER_AGENT),
  timeout_ms: z.number().int().positive().default(30_000),
  headers: z.record(z.string()).default({}),
});
export type HtmlScraperOptions = z.infer<typeof HtmlScraperOptionsSchema>;

export const BrowserKindSchema = z.enum(["chromium", "firefox", "webkit"]);

export const PlaywrightScraperOptionsSchema = z.object({
  browser: BrowserKindSchema.default("chromium"),
  headless: z.boolean().default(true),
  attach_endpoint: z.string().min(1).optional(),
  timeout_ms: z.number().int().positive().default(30_000),
  user_agent: z.string().min(1).optional(),
  viewport: z
    .object({
      width: z.number().int().min(320).max(7680),
      height: z.number().int().min(240).max(4320),
    })
    .default({ width: 1920, height: 1080 }),
});
export type PlaywrightScraperOptions = z.infer<typeof PlaywrightScraperOptionsSchema>;

export function parseProviderOptions<T extends z.ZodTypeAny>(
  schema: T,
  provider: string,
  config: ConnectionConfig,
): z.infer<T> {
  const parsed = schema.safeParse(config);
  if (!parsed.success) {
    throw new Error(`Invalid ${provider} provider config: ${formatIssues(parsed.error).join("; ")}`);
  }
  return parsed.data;
}
