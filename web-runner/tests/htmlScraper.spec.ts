import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  DiscoverStepConfigSchema,
  ExtractStepConfigSchema,
  InitStepConfigSchema,
  PageContext,
  PaginateStepConfigSchema,
} from "@scrapeflow/shared";
import { HtmlScraper } from "../src";
import { readFixture, stubPages } from "./_helpers/fixture";

const CATALOG = "https://shop.example.test/catalog";
const PAGE_TWO = "https://shop.example.test/catalog?page=2";

describe("HtmlScraper", () => {
  let scraper: HtmlScraper;

  beforeEach(async () => {
    scraper = new HtmlScraper();
    await scraper.initialize({});
  });

  afterEach(async () => {
    await scraper.cleanup();
    vi.unstubAllGlobals();
  });

  async function openCatalog(): Promise<PageContext> {
    return scraper.executeInit(InitStepConfigSchema.parse({ url: CATALOG }));
  }

  it("loads the first page with headers and cookies", async () => {
    const fetchMock = stubPages({ [CATALOG]: { body: readFixture("catalog-1.html") } });
    const context = await scraper.executeInit(
      InitStepConfigSchema.parse({
        url: CATALOG,
        headers: { "Accept-Language": "en" },
        cookies: [{ name: "session", value: "test-secret", domain: "shop.example.test", path: "/" }],
      }),
    );

    expect(context.url).toBe(CATALOG);
    expect(context.title).toBe("Catalog page 1");
    expect(context.navigation_history).toEqual([CATALOG]);
    expect(context.metadata).toEqual({ status_code: 200, content_type: "text/html; charset=utf-8" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({
      "User-Agent": "scrapeflow/1.0.0",
      "Accept-Language": "en",
      Cookie: "session=test-secret",
    });
  });

  it("fails init on a non-success status", async () => {
    stubPages({ [CATALOG]: { body: "maintenance", status: 503 } });
    await expect(openCatalog()).rejects.toThrow(`HTTP 503 for ${CATALOG}: maintenance`);
  });

  it("fails init when the wait selector is absent", async () => {
    stubPages({ [CATALOG]: { body: readFixture("catalog-1.html") } });
    await expect(
      scraper.executeInit(InitStepConfigSchema.parse({ url: CATALOG, wait_for: "#missing" })),
    ).rejects.toThrow("Wait selector not found: #missing");
  });

  it("discovers one element per match", async () => {
    stubPages({ [CATALOG]: { body: readFixture("catalog-1.html") } });
    const context = await openCatalog();
    const elements = await scraper.executeDiscover(
      DiscoverStepConfigSchema.parse({ selectors: { product: ".product" } }),
      context,
    );

    expect(elements).toHaveLength(2);
    expect(elements[0].value).toBe("Desk Lamp$1,249.5012");
    expect(elements[0].attributes).toEqual({ class: "product", "data-sku": "A1" });
    expect(elements[0].metadata).toMatchObject({ tag_name: "div", index: 0, xpath: "/html/body/div/div[1]" });
    expect(elements[1].metadata).toMatchObject({ index: 1, xpath: "/html/body/div/div[2]" });
  });

  it("extracts text, attributes and numeric transforms", async () => {
    stubPages({ [CATALOG]: { body: readFixture("catalog-1.html") } });
    const context = await openCatalog();
    const elements = await scraper.executeExtract(
      ExtractStepConfigSchema.parse({
        elements: {
          name: { selector: ".name" },
          price: { selector: ".price", transform: "float" },
          stock: { selector: ".stock", transform: "int" },
          sku: { selector: ".product", type: "attribute", attribute: "data-sku" },
        },
      }),
      context,
    );

    expect(elements.map((element) => [element.type, element.value])).toEqual([
      ["name", "Desk Lamp"],
      ["name", "Chair"],
      ["price", 1249.5],
      ["price", 0],
      ["stock", 12],
      ["stock", 0],
      ["sku", "A1"],
      ["sku", "B2"],
    ]);
    expect(elements[0].metadata.source_url).toBe(CATALOG);
  });

  it("extracts outer html", async () => {
    stubPages({ [CATALOG]: { body: readFixture("catalog-1.html") } });
    const context = await openCatalog();
    const [first] = await scraper.executeExtract(
      ExtractStepConfigSchema.parse({ elements: { name: { selector: ".name", type: "html" } } }),
      context,
    );
    expect(first.value).toBe('<h2 class="name">Desk Lamp</h2>');
  });

  it("follows next links until none remain", async () => {
    const fetchMock = stubPages({
      [CATALOG]: { body: readFixture("catalog-1.html") },
      [PAGE_TWO]: { body: readFixture("catalog-2.html") },
    });
    const config = PaginateStepConfigSchema.parse({ next_page_selector: "a.next", wait_after_click: 0 });
    const first = await openCatalog();

    const second = await scraper.executePaginate(config, first);
    expect(second?.url).toBe(PAGE_TWO);
    expect(second?.title).toBe("Catalog page 2");
    expect(second?.navigation_history).toEqual([CATALOG, PAGE_TWO]);
    expect(second?.metadata.page_type).toBe("paginated");
    expect(fetchMock.mock.calls[1][0]).toBe(PAGE_TWO);

    if (!second) {
      throw new Error("expected a second page");
    }
    expect(await scraper.executePaginate(config, second)).toBeNull();
  });

  it("stops at max_pages counting the first page", async () => {
    const fetchMock = stubPages({ [CATALOG]: { body: readFixture("catalog-1.html") } });
    const context = await openCatalog();
    const next = await scraper.executePaginate(
      PaginateStepConfigSchema.parse({ next_page_selector: "a.next", max_pages: 1, wait_after_click: 0 }),
      context,
    );
    expect(next).toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("honours the stop condition", async () => {
    stubPages({ [CATALOG]: { body: readFixture("catalog-1.html") } });
    const context = await openCatalog();
    const next = await scraper.executePaginate(
      PaginateStepConfigSchema.parse({
        next_page_selector: "a.next",
        wait_after_click: 0,
        stop_condition: { selector: "#products", condition: "exists" },
      }),
      context,
    );
    expect(next).toBeNull();
  });

  it("returns null when the next page is not reachable", async () => {
    stubPages({ [CATALOG]: { body: readFixture("catalog-1.html") } });
    const context = await openCatalog();
    const next = await scraper.executePaginate(
      PaginateStepConfigSchema.parse({ next_page_selector: "a.next", wait_after_click: 0 }),
      context,
    );
    expect(next).toBeNull();
  });

  it("reports health only while initialized", async () => {
    expect(await scraper.healthCheck()).toBe(true);
    await scraper.cleanup();
    expect(await scraper.healthCheck()).toBe(false);
    expect(await new HtmlScraper().healthCheck()).toBe(false);
  });

  it("requires a loaded page before querying", async () => {
    await expect(
      scraper.executeDiscover(DiscoverStepConfigSchema.parse({ selectors: { a: "a" } }), {
        url: CATALOG,
        title: "",
        cookies: [],
        navigation_history: [],
        viewport: { width: 1920, height: 1080 },
        user_agent: "scrapeflow/1.0.0",
        metadata: {},
      }),
    ).rejects.toThrow("No page loaded; run an init step first");
  });

  it("rejects invalid provider config", async () => {
    await expect(new HtmlScraper().initialize({ timeout_ms: -1 })).rejects.toThrow(
      "Invalid html provider config: timeout_ms: Number must be greater than 0",
    );
  });
});
