import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConnectionConfig, formatIssues } from "@scrapeflow/shared";
import { isLogLevel, LOG_LEVELS, LogLevel } from "../logging/logger";

export interface RuntimeConfig {
  retryDelayMs: number;
  logLevel: LogLevel;
}

export interface HtmlConfig {
  userAgent: string;
  timeoutMs: number;
  headers: Record<string, string>;
}

export interface PlaywrightConfig {
  browser: "chromium" | "firefox" | "webkit";
  headless: boolean;
  attachEndpoint?: string;
  timeoutMs: number;
  viewport: { width: number; height: number };
}

export interface ScrapeflowConfig {
  runtime: RuntimeConfig;
  html: HtmlConfig;
  playwright: PlaywrightConfig;
}

export const defaultConfig: ScrapeflowConfig = {
  runtime: {
    retryDelayMs: 1_000,
    logLevel: "info",
  },
  html: {
    userAgent: "scrapeflow/1.0.0",
    timeoutMs: 30_000,
    headers: {},
  },
  playwright: {
    browser: "chromium",
    headless: true,
    timeoutMs: 30_000,
    viewport: { width: 1920, height: 1080 },
  },
};

const ConfigFileSchema = z.object({
  runtime: z
    .object({
      retryDelayMs: z.number().int().min(0),
      logLevel: z.enum(LOG_LEVELS),
    })
    .partial()
    .optional(),
  html: z
    .object({
      userAgent: z.string().min(1),
      timeoutMs: z.number().int().positive(),
      headers: z.record(z.string()),
    })
    .partial()
    .optional(),
  playwright: z
    .object({
      browser: z.enum(["chromium", "firefox", "webkit"]),
      headless: z.boolean(),
      attachEndpoint: z.string().min(1),
      timeoutMs: z.number().int().positive(),
      viewport: z.object({ width: z.number().int(), height: z.number().int() }),
    })
    .partial()
    .optional(),
});
type ConfigFile = z.infer<typeof ConfigFileSchema>;

function readConfigFile(configPath: string): ConfigFile {
  const resolved = path.resolve(configPath);
  const raw = fs.readFileSync(resolved, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Failed to parse config: ${resolved} (${error instanceof Error ? error.message : error})`);
  }
  const parsed = ConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Invalid config ${resolved}: ${formatIssues(parsed.error).join("; ")}`);
  }
  return parsed.data;
}

function applyEnv(config: ScrapeflowConfig, env: NodeJS.ProcessEnv): ScrapeflowConfig {
  const runtime = { ...config.runtime };
  const level = env.SCRAPEFLOW_LOG_LEVEL;
  if (level) {
    if (!isLogLevel(level)) {
      throw new Error(`Invalid SCRAPEFLOW_LOG_LEVEL: ${level}`);
    }
    runtime.logLevel = level;
  }
  const delay = env.SCRAPEFLOW_RETRY_DELAY_MS;
  if (delay) {
    const parsed = Number(delay);
    if (!Number.isInteger(parsed) || parsed < 0) {
      throw new Error(`Invalid SCRAPEFLOW_RETRY_DELAY_MS: ${delay}`);
    }
    runtime.retryDelayMs = parsed;
  }
  return { ...config, runtime };
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): ScrapeflowConfig {
  if (!configPath) {
    return applyEnv(defaultConfig, env);
  }

  const parsed = readConfigFile(configPath);
  return applyEnv(
    {
      runtime: {
        ...defaultConfig.runtime,
        ...(parsed.runtime ?? {}),
      },
      html: {
        ...defaultConfig.html,
        ...(parsed.html ?? {}),
      },
      playwright: {
        ...defaultConfig.playwright,
        ...(parsed.playwright ?? {}),
      },
    },
    env,
  );
}

/** Connection defaults handed to each built-in scraping provider before the workflow's own config. */
export function providerDefaults(config: ScrapeflowConfig): Record<string, ConnectionConfig> {
  return {
    html: {
      user_agent: config.html.userAgent,
      timeout_ms: config.html.timeoutMs,
      headers: config.html.headers,
    },
    playwright: {
      browser: config.playwright.browser,
      headless: config.playwright.headless,
      attach_endpoint: config.playwright.attachEndpoint,
      timeout_ms: config.playwright.timeoutMs,
      viewport: config.playwright.viewport,
    },
  };
}
