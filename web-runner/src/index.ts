export { HtmlScraper } from "./html/scraper";
export { PlaywrightScraper } from "./playwright/scraper";
export {
  HtmlScraperOptionsSchema,
  PlaywrightScraperOptionsSchema,
  parseProviderOptions,
} from "./config";
export type { HtmlScraperOptions, PlaywrightScraperOptions } from "./config";
export { applyTransform, delay } from "./values";
export type { ValueTransform } from "./values";
export { launchBrowser } from "./browser/launch";
export type { BrowserKind, LaunchOptions } from "./browser/launch";
export { attachBrowser } from "./browser/attach";
