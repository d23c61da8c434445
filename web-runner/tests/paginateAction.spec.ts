import { describe, expect, it, vi } from "vitest";
import { PaginateStepConfigSchema } from "@scrapeflow/shared";
import { PaginationPage, paginateAction } from "../src/actions/paginate";

class FakePage implements PaginationPage {
  currentUrl = "https://shop.example.test/list?page=1";
  clicks = 0;
  present = new Set<string>(["a.next"]);
  waitForLoadState = vi.fn(async (_state: "networkidle", _options: { timeout: number }) => undefined);
  waitForTimeout = vi.fn(async (_ms: number) => undefined);

  async $(selector: string) {
    if (!this.present.has(selector)) {
      return null;
    }
    return {
      click: async () => {
        this.clicks += 1;
        this.currentUrl = `https://shop.example.test/list?page=${this.clicks + 1}`;
      },
    };
  }

  url(): string {
    return this.currentUrl;
  }

  async title(): Promise<string> {
    return `Page ${this.clicks + 1}`;
  }
}

const config = (raw: Record<string, unknown>) =>
  PaginateStepConfigSchema.parse({ next_page_selector: "a.next", ...raw });

describe("paginateAction", () => {
  it("clicks through to the next page", async () => {
    const page = new FakePage();
    const result = await paginateAction(page, config({}), 1, 5000);
    expect(result).toEqual({ url: "https://shop.example.test/list?page=2", title: "Page 2" });
    expect(page.waitForLoadState).toHaveBeenCalledWith("networkidle", { timeout: 5000 });
    expect(page.waitForTimeout).not.toHaveBeenCalled();
  });

  it("falls back to a fixed wait when the network never settles", async () => {
    const page = new FakePage();
    const timeout = new Error("Timeout 5000ms exceeded");
    timeout.name = "TimeoutError";
    page.waitForLoadState.mockRejectedValueOnce(timeout);

    await paginateAction(page, config({ wait_after_click: 250 }), 1, 5000);
    expect(page.waitForTimeout).toHaveBeenCalledWith(250);
  });

  it("stops once max_pages have been visited", async () => {
    const page = new FakePage();
    expect(await paginateAction(page, config({ max_pages: 2 }), 2, 5000)).toBeNull();
    expect(page.clicks).toBe(0);
  });

  it("stops when the stop marker is missing", async () => {
    const page = new FakePage();
    const result = await paginateAction(
      page,
      config({ stop_condition: { selector: ".results", condition: "not-exists" } }),
      1,
      5000,
    );
    expect(result).toBeNull();
  });

  it("returns null without a next control", async () => {
    const page = new FakePage();
    page.present.clear();
    expect(await paginateAction(page, config({}), 1, 5000)).toBeNull();
  });
});
