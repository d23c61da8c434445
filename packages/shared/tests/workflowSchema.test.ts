import { describe, expect, it } from "vitest";
import {
  ExtractStepConfigSchema,
  parseWorkflow,
  safeParseWorkflow,
  withContinueOnError,
  WorkflowParseError,
} from "../src";

const baseWorkflow = () => ({
  version: "1.0.0",
  metadata: {
    name: "Product listing",
    description: "Collects product cards",
    author: "data-team",
    target_site: "https://shop.example.test",
  },
  scraping: { provider: "html" },
  storage: { provider: "json", config: { file_path: "out.jsonl" } },
  steps: [
    { id: "open", command: "init", config: { url: "https://shop.example.test" } },
    { id: "cards", command: "extract", config: { elements: { title: { selector: "h2" } } } },
  ],
});

describe("workflow schema", () => {
  it("fills step defaults", () => {
    const workflow = parseWorkflow(baseWorkflow());
    const step = workflow.steps[0];
    expect(step.retries).toBe(3);
    expect(step.timeout).toBe(30_000);
    expect(step.continue_on_error).toBe(false);
    expect(workflow.scraping.config).toEqual({});
    expect(workflow.metadata.tags).toEqual([]);
  });

  it("rejects malformed step ids and versions with every issue listed", () => {
    const raw = baseWorkflow();
    raw.version = "v1";
    raw.steps[0].id = "open page";
    const result = safeParseWorkflow(raw);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues).toEqual([
        "version: version must look like 1.0.0",
        "steps.0.id: step id may only contain letters, digits, '_' and '-'",
      ]);
    }
  });

  it("throws a parse error naming the source", () => {
    const raw = { ...baseWorkflow(), steps: [] };
    expect(() => parseWorkflow(raw, "flow.json")).toThrowError(WorkflowParseError);
    expect(() => parseWorkflow(raw, "flow.json")).toThrowError(
      "Invalid workflow (flow.json): steps: at least one step is required",
    );
  });

  it("bounds retries and timeout", () => {
    const raw = baseWorkflow();
    const steps = [{ ...raw.steps[0], retries: 11, timeout: 0 }];
    const result = safeParseWorkflow({ ...raw, steps });
    expect(result.success).toBe(false);
  });

  it("accepts unknown post-processing types", () => {
    const workflow = parseWorkflow({
      ...baseWorkflow(),
      post_processing: [{ type: "sparkle" }],
    });
    expect(workflow.post_processing).toEqual([{ type: "sparkle", config: {} }]);
  });

  it("requires at least one extract element", () => {
    expect(ExtractStepConfigSchema.safeParse({ elements: {} }).success).toBe(false);
    const parsed = ExtractStepConfigSchema.parse({ elements: { price: { selector: ".price", transform: "float" } } });
    expect(parsed.elements.price.type).toBe("text");
  });

  it("forces continue_on_error without touching the loaded workflow", () => {
    const workflow = parseWorkflow(baseWorkflow());
    const forced = withContinueOnError(workflow);
    expect(forced.steps.every((step) => step.continue_on_error)).toBe(true);
    expect(workflow.steps.every((step) => !step.continue_on_error)).toBe(true);
  });
});
