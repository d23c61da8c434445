import { PaginateStepConfig } from "@scrapeflow/shared";

/** The slice of a Playwright `Page` that pagination touches. */
export interface PaginationPage {
  $(selector: string): Promise<{ click(options: { timeout: number }): Promise<void> } | null>;
  waitForLoadState(state: "networkidle", options: { timeout: number }): Promise<void>;
  waitForTimeout(timeout: number): Promise<void>;
  url(): string;
  title(): Promise<string>;
}

export interface PaginateResult {
  url: string;
  title: string;
}

/** Clicks the next-page control; resolves to null when pagination should stop. */
export async function paginateAction(
  page: PaginationPage,
  config: PaginateStepConfig,
  pagesVisited: number,
  timeoutMs: number,
): Promise<PaginateResult | null> {
  if (config.max_pages !== undefined && pagesVisited >= config.max_pages) {
    return null;
  }
  if (config.stop_condition) {
    const present = (await page.$(config.stop_condition.selector)) !== null;
    const stop = config.stop_condition.condition === "exists" ? present : !present;
    if (stop) {
      return null;
    }
  }

  const next = await page.$(config.next_page_selector);
  if (!next) {
    return null;
  }
  await next.click({ timeout: timeoutMs });

  try {
    await page.waitForLoadState("networkidle", { timeout: timeoutMs });
  } catch (error) {
    if (!(error instanceof Error) || error.name !== "TimeoutError") {
      throw error;
    }
    await page.waitForTimeout(config.wait_after_click);
  }

  return { url: page.url(), title: await page.title() };
}
