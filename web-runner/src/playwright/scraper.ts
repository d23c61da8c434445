import { Browser, BrowserContext, Page } from "playwright";
import {
  ConnectionConfig,
  createPageContext,
  DataElement,
  DiscoverStepConfig,
  ExtractStepConfig,
  InitStepConfig,
  PageContext,
  PaginateStepConfig,
  ProviderMetadata,
  ScrapingProvider,
} from "@scrapeflow/shared";
import { attachBrowser } from "../browser/attach";
import { launchBrowser } from "../browser/launch";
import { PlaywrightScraperOptions, PlaywrightScraperOptionsSchema, parseProviderOptions } from "../config";
import { navigateAction } from "../actions/navigate";
import { discoverAction, extractAction } from "../actions/query";
import { paginateAction } from "../actions/paginate";

export class PlaywrightScraper implements ScrapingProvider {
  readonly metadata: ProviderMetadata = {
    name: "playwright",
    version: "1.0.0",
    type: "scraping",
    capabilities: ["init", "discover", "extract", "paginate", "javascript", "cookies", "click-pagination"],
    description: "Drives a real browser through Playwright for script-rendered pages",
  };

  private options: PlaywrightScraperOptions | null = null;
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;

  async initialize(config: ConnectionConfig): Promise<void> {
    if (this.browser) {
      return;
    }
    const options = parseProviderOptions(PlaywrightScraperOptionsSchema, "playwright", config);
    this.options = options;
    if (options.attach_endpoint) {
      this.browser = await attachBrowser({
        endpoint: options.attach_endpoint,
        timeoutMs: options.timeout_ms,
      });
    } else {
      this.browser = await launchBrowser({
        browser: options.browser,
        headless: options.headless,
        timeoutMs: options.timeout_ms,
      });
    }
    this.context = await this.browser.newContext({
      viewport: options.viewport,
      userAgent: options.user_agent,
    });
    this.page = await this.context.newPage();
  }

  async cleanup(): Promise<void> {
    const { browser, context } = this;
    this.context = null;
    this.browser = null;
    this.page = null;
    try {
      await context?.close();
    } finally {
      await browser?.close();
    }
  }

  async healthCheck(): Promise<boolean> {
    return this.page !== null && !this.page.isClosed();
  }

  async executeInit(config: InitStepConfig): Promise<PageContext> {
    const { context, page, options } = this.requireSession();
    const result = await navigateAction(context, page, config, options.timeout_ms);
    return createPageContext({
      url: result.url,
      title: result.title,
      cookies: config.cookies,
      navigation_history: [result.url],
      viewport: options.viewport,
      user_agent: options.user_agent ?? (await page.evaluate(() => navigator.userAgent)),
      metadata: {
        status_code: result.status,
        content_type: result.contentType,
      },
    });
  }

  async executeDiscover(config: DiscoverStepConfig, context: PageContext): Promise<DataElement[]> {
    return discoverAction(this.requireSession().page, config, context.url);
  }

  async executeExtract(config: ExtractStepConfig, context: PageContext): Promise<DataElement[]> {
    return extractAction(this.requireSession().page, config, context.url);
  }

  async executePaginate(config: PaginateStepConfig, context: PageContext): Promise<PageContext | null> {
    const { page, options } = this.requireSession();
    const next = await paginateAction(page, config, context.navigation_history.length, options.timeout_ms);
    if (!next) {
      return null;
    }
    return createPageContext({
      ...context,
      url: next.url,
      title: next.title,
      navigation_history: [...context.navigation_history, next.url],
      metadata: { ...context.metadata, page_type: "paginated" },
    });
  }

  private requireSession(): { context: BrowserContext; page: Page; options: PlaywrightScraperOptions } {
    if (!this.context || !this.page || !this.options) {
      throw new Error("Playwright scraper is not initialized");
    }
    return { context: this.context, page: this.page, options: this.options };
  }
}
