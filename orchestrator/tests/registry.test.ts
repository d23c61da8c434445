import { describe, expect, it } from "vitest";
import { ProviderRegistry } from "../src/providers/registry";
import { createDefaultRegistry } from "../src/providers/builtin";
import { UnknownProviderError } from "../src/runtime/errors";
import { FakeScraper, scraperClass, storageClass } from "./_helpers/fakes";

describe("ProviderRegistry", () => {
  it("creates a fresh instance per call", () => {
    const registry = new ProviderRegistry().register("scraping", "fake", FakeScraper);
    const first = registry.create("scraping", "fake");
    expect(first).toBeInstanceOf(FakeScraper);
    expect(registry.create("scraping", "fake")).not.toBe(first);
  });

  it("reports unknown providers with the available names", () => {
    const registry = new ProviderRegistry().register("storage", "memory", storageClass());
    expect(() => registry.create("storage", "s3")).toThrow(UnknownProviderError);
    expect(() => registry.create("storage", "s3")).toThrow("Unknown storage provider 's3' (available: memory)");
    expect(() => registry.create("scraping", "html")).toThrow("Unknown scraping provider 'html' (available: none)");
  });

  it("lists built-in providers by kind", () => {
    const registry = createDefaultRegistry();
    expect(registry.names("scraping")).toEqual(["html", "playwright"]);
    expect(registry.names("storage")).toEqual(["csv", "json"]);
    expect(registry.list("storage").map((entry) => [entry.name, entry.type])).toEqual([
      ["csv", "storage"],
      ["json", "storage"],
    ]);
  });

  it("lists a placeholder when a provider cannot be constructed", () => {
    class Broken extends FakeScraper {
      constructor() {
        super();
        throw new Error("missing native module");
      }
    }
    const registry = new ProviderRegistry().register("scraping", "broken", Broken);
    expect(registry.list()).toEqual([{ name: "broken", version: "unknown", type: "scraping", capabilities: [] }]);
  });

  it("tests connections and always releases the instance", async () => {
    const healthy: FakeScraper[] = [];
    const registry = new ProviderRegistry()
      .register("scraping", "fake", scraperClass({}, healthy))
      .register(
        "scraping",
        "flaky",
        scraperClass({
          initialize: async () => {
            throw new Error("no browser");
          },
        }),
      );

    expect(await registry.testConnection("fake", { timeout_ms: 5 })).toBe(true);
    expect(healthy[0].calls).toEqual(["initialize", "cleanup"]);
    expect(await registry.testConnection("flaky")).toBe(false);
    expect(await registry.testConnection("nothing")).toBe(false);
  });
});
