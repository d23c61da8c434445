import { ElementHandle, Page } from "playwright";
import {
  createDataElement,
  DataElement,
  DiscoverStepConfig,
  ExtractStepConfig,
} from "@scrapeflow/shared";
import { applyTransform } from "../values";

async function readAttributes(handle: ElementHandle): Promise<Record<string, string>> {
  return handle.evaluate((node) =>
    node instanceof Element
      ? Object.fromEntries(Array.from(node.attributes, (attr): [string, string] => [attr.name, attr.value]))
      : {},
  );
}

async function readTagName(handle: ElementHandle): Promise<string> {
  return handle.evaluate((node) => (node instanceof Element ? node.tagName.toLowerCase() : ""));
}

export async function discoverAction(
  page: Page,
  config: DiscoverStepConfig,
  sourceUrl: string,
): Promise<DataElement[]> {
  const discovered: DataElement[] = [];
  for (const [elementType, selector] of Object.entries(config.selectors)) {
    const handles = await page.$$(selector);
    for (const [index, handle] of handles.entries()) {
      discovered.push(
        createDataElement({
          type: elementType,
          selector,
          value: ((await handle.textContent()) ?? "").trim(),
          attributes: await readAttributes(handle),
          metadata: {
            tag_name: await readTagName(handle),
            index,
            source_url: sourceUrl,
          },
        }),
      );
    }
  }
  return discovered;
}

export async function extractAction(
  page: Page,
  config: ExtractStepConfig,
  sourceUrl: string,
): Promise<DataElement[]> {
  const extracted: DataElement[] = [];
  for (const [fieldName, spec] of Object.entries(config.elements)) {
    const handles = await page.$$(spec.selector);
    for (const handle of handles) {
      let raw: string;
      if (spec.type === "html") {
        raw = await handle.evaluate((node) => (node instanceof Element ? node.outerHTML : ""));
      } else if (spec.type === "attribute" && spec.attribute) {
        raw = (await handle.getAttribute(spec.attribute)) ?? "";
      } else {
        raw = ((await handle.textContent()) ?? "").trim();
      }
      extracted.push(
        createDataElement({
          type: fieldName,
          selector: spec.selector,
          value: applyTransform(raw, spec.transform),
          attributes: await readAttributes(handle),
          metadata: {
            extract_type: spec.type,
            transform: spec.transform ?? null,
            tag_name: await readTagName(handle),
            source_url: sourceUrl,
          },
        }),
      );
    }
  }
  return extracted;
}
