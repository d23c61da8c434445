import { Browser, chromium } from "playwright";

export interface AttachOptions {
  endpoint: string;
  timeoutMs?: number;
}

/** Connects to an already running Chromium over CDP instead of launching one. */
export async function attachBrowser(options: AttachOptions): Promise<Browser> {
  if (!options.endpoint) {
    throw new Error("Missing attach endpoint");
  }
  return chromium.connectOverCDP(options.endpoint, { timeout: options.timeoutMs });
}
