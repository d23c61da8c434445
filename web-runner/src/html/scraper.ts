import { load, type CheerioAPI, type Cheerio } from "cheerio";
import type { AnyNode } from "domhandler";
import {
  ConnectionConfig,
  createDataElement,
  createPageContext,
  DataElement,
  DiscoverStepConfig,
  ExtractStepConfig,
  InitStepConfig,
  PageContext,
  PaginateStepConfig,
  ProviderMetadata,
  ScrapingProvider,
  StopCondition,
} from "@scrapeflow/shared";
import { HtmlScraperOptions, HtmlScraperOptionsSchema, parseProviderOptions } from "../config";
import { applyTransform, delay } from "../values";

interface LoadedPage {
  $: CheerioAPI;
  url: string;
  status: number;
  contentType: string;
}

/**
 * Static HTML scraping over `fetch` and cheerio. No scripts run, so pages that
 * render client-side need the playwright provider instead.
 */
export class HtmlScraper implements ScrapingProvider {
  readonly metadata: ProviderMetadata = {
    name: "html",
    version: "1.0.0",
    type: "scraping",
    capabilities: ["init", "discover", "extract", "paginate", "static-html", "css-selectors"],
    description: "Fetches pages over HTTP and queries them with CSS selectors",
  };

  private options: HtmlScraperOptions | null = null;
  private current: LoadedPage | null = null;

  async initialize(config: ConnectionConfig): Promise<void> {
    this.options = parseProviderOptions(HtmlScraperOptionsSchema, "html", config);
  }

  async cleanup(): Promise<void> {
    this.options = null;
    this.current = null;
  }

  async healthCheck(): Promise<boolean> {
    return this.options !== null;
  }

  async executeInit(config: InitStepConfig): Promise<PageContext> {
    const options = this.requireOptions();
    const headers: Record<string, string> = { ...config.headers };
    if (config.cookies.length > 0) {
      headers.Cookie = config.cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join("; ");
    }

    const response = await this.fetchPage(config.url, headers);
    if (!response.ok) {
      const body = await response.text();
      throw new Error(`HTTP ${response.status} for ${config.url}: ${body.slice(0, 200)}`);
    }
    const page = await this.readPage(response, config.url);

    if (typeof config.wait_for === "number") {
      await delay(config.wait_for);
    } else if (typeof config.wait_for === "string" && page.$(config.wait_for).length === 0) {
      throw new Error(`Wait selector not found: ${config.wait_for}`);
    }

    this.current = page;
    return createPageContext({
      url: page.url,
      title: page.$("title").first().text().trim(),
      cookies: config.cookies,
      navigation_history: [page.url],
      user_agent: options.user_agent,
      metadata: {
        status_code: page.status,
        content_type: page.contentType,
      },
    });
  }

  async executeDiscover(config: DiscoverStepConfig, context: PageContext): Promise<DataElement[]> {
    const { $ } = this.requirePage();
    const discovered: DataElement[] = [];

    for (const [elementType, selector] of Object.entries(config.selectors)) {
      $(selector)
        .toArray()
        .forEach((node, index) => {
          const element = $(node);
          discovered.push(
            createDataElement({
              type: elementType,
              selector,
              value: element.text().trim(),
              attributes: element.attr() ?? {},
              metadata: {
                tag_name: tagName(element),
                index,
                xpath: xpathFor($, element),
                source_url: context.url,
              },
            }),
          );
        });
    }

    return discovered;
  }

  async executeExtract(config: ExtractStepConfig, context: PageContext): Promise<DataElement[]> {
    const { $ } = this.requirePage();
    const extracted: DataElement[] = [];

    for (const [fieldName, spec] of Object.entries(config.elements)) {
      for (const node of $(spec.selector).toArray()) {
        const element = $(node);
        let raw: string;
        if (spec.type === "html") {
          raw = $.html(element);
        } else if (spec.type === "attribute" && spec.attribute) {
          raw = element.attr(spec.attribute) ?? "";
        } else {
          raw = element.text().trim();
        }

        extracted.push(
          createDataElement({
            type: fieldName,
            selector: spec.selector,
            value: applyTransform(raw, spec.transform),
            attributes: element.attr() ?? {},
            metadata: {
              extract_type: spec.type,
              transform: spec.transform ?? null,
              tag_name: tagName(element),
              source_url: context.url,
            },
          }),
        );
      }
    }

    return extracted;
  }

  async executePaginate(config: PaginateStepConfig, context: PageContext): Promise<PageContext | null> {
    const page = this.requirePage();

    if (config.max_pages !== undefined && context.navigation_history.length >= config.max_pages) {
      return null;
    }
    if (config.stop_condition && shouldStop(page.$, config.stop_condition)) {
      return null;
    }

    const link = page.$(config.next_page_selector).first();
    const href = link.attr("href");
    if (link.length === 0 || tagName(link) !== "a" || !href) {
      return null;
    }
    const nextUrl = new URL(href, page.url).toString();

    await delay(config.wait_after_click);

    const response = await this.fetchPage(nextUrl, {});
    if (!response.ok) {
      return null;
    }
    const next = await this.readPage(response, nextUrl);
    this.current = next;

    return createPageContext({
      ...context,
      url: next.url,
      title: next.$("title").first().text().trim(),
      navigation_history: [...context.navigation_history, next.url],
      metadata: {
        status_code: next.status,
        content_type: next.contentType,
        page_type: "paginated",
      },
    });
  }

  private async fetchPage(url: string, headers: Record<string, string>): Promise<Response> {
    const options = this.requireOptions();
    return fetch(url, {
      headers: {
        "User-Agent": options.user_agent,
        ...options.headers,
        ...headers,
      },
      signal: AbortSignal.timeout(options.timeout_ms),
    });
  }

  private async readPage(response: Response, requestedUrl: string): Promise<LoadedPage> {
    const html = await response.text();
    return {
      $: load(html),
      url: response.url || requestedUrl,
      status: response.status,
      contentType: response.headers.get("content-type") ?? "",
    };
  }

  private requireOptions(): HtmlScraperOptions {
    if (!this.options) {
      throw new Error("HTML scraper is not initialized");
    }
    return this.options;
  }

  private requirePage(): LoadedPage {
    if (!this.current) {
      throw new Error("No page loaded; run an init step first");
    }
    return this.current;
  }
}

function tagName(element: Cheerio<AnyNode>): string {
  return (element.prop("tagName") ?? "").toLowerCase();
}

function shouldStop($: CheerioAPI, condition: StopCondition): boolean {
  const present = $(condition.selector).length > 0;
  return condition.condition === "exists" ? present : !present;
}

function xpathFor($: CheerioAPI, element: Cheerio<AnyNode>): string {
  const chain = [...element.parents().toArray().reverse(), ...element.toArray()];
  const parts = chain.map((node) => {
    const current = $(node);
    const tag = tagName(current);
    const sameTagSiblings = current.siblings(tag).length;
    if (sameTagSiblings === 0) {
      return tag;
    }
    return `${tag}[${current.prevAll(tag).length + 1}]`;
  });
  return `/${parts.join("/")}`;
}
