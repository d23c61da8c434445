import { BrowserContext, Page } from "playwright";
import { InitStepConfig } from "@scrapeflow/shared";

export interface NavigateResult {
  url: string;
  title: string;
  status: number | null;
  contentType: string;
}

export async function navigateAction(
  context: BrowserContext,
  page: Page,
  config: InitStepConfig,
  timeoutMs: number,
): Promise<NavigateResult> {
  if (config.cookies.length > 0) {
    await context.addCookies(
      config.cookies.map((cookie) => ({
        name: cookie.name,
        value: cookie.value,
        domain: cookie.domain,
        path: cookie.path,
        expires: cookie.expires,
        httpOnly: cookie.http_only,
        secure: cookie.secure,
      })),
    );
  }
  if (Object.keys(config.headers).length > 0) {
    await page.setExtraHTTPHeaders(config.headers);
  }

  const response = await page.goto(config.url, {
    waitUntil: "domcontentloaded",
    timeout: timeoutMs,
  });
  if (response && !response.ok()) {
    throw new Error(`HTTP ${response.status()} for ${config.url}`);
  }

  if (typeof config.wait_for === "string") {
    await page.waitForSelector(config.wait_for, { timeout: timeoutMs });
  } else if (typeof config.wait_for === "number") {
    await page.waitForTimeout(config.wait_for);
  }

  return {
    url: page.url(),
    title: await page.title(),
    status: response ? response.status() : null,
    contentType: response ? (await response.headerValue("content-type")) ?? "" : "",
  };
}
