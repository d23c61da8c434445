import fs from "fs";
import path from "path";
import { vi } from "vitest";

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, "..", "fixtures", name), "utf-8");
}

export interface StubPage {
  body: string;
  status?: number;
}

/** Replaces the global fetch with one that serves the given pages by URL. */
export function stubPages(pages: Record<string, StubPage>) {
  const fetchMock = vi.fn(async (input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
    const page = pages[url];
    if (!page) {
      return new Response("not found", { status: 404 });
    }
    return new Response(page.body, {
      status: page.status ?? 200,
      headers: { "content-type": "text/html; charset=utf-8" },
    });
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}
