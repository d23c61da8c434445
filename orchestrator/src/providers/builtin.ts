import { HtmlScraper, PlaywrightScraper } from "@scrapeflow/web-runner";
import { Logger, silentLogger } from "../logging/logger";
import { ProviderRegistry } from "./registry";
import { CsvStorage } from "./storage/csv";
import { JsonStorage } from "./storage/json";

export function createDefaultRegistry(logger: Logger = silentLogger): ProviderRegistry {
  return new ProviderRegistry(logger)
    .register("scraping", "html", HtmlScraper)
    .register("scraping", "playwright", PlaywrightScraper)
    .register("storage", "json", JsonStorage)
    .register("storage", "csv", CsvStorage);
}
