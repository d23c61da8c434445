import { Browser, chromium, firefox, webkit } from "playwright";

export type BrowserKind = "chromium" | "firefox" | "webkit";

export interface LaunchOptions {
  browser?: BrowserKind;
  headless?: boolean;
  timeoutMs?: number;
}

export async function launchBrowser(options: LaunchOptions = {}): Promise<Browser> {
  const browser = options.browser ?? "chromium";
  const launchOptions = { headless: options.headless ?? true, timeout: options.timeoutMs };
  switch (browser) {
    case "chromium":
      return chromium.launch(launchOptions);
    case "firefox":
      return firefox.launch(launchOptions);
    case "webkit":
      return webkit.launch(launchOptions);
    default:
      throw new Error(`Unsupported browser: ${String(browser)}`);
  }
}
