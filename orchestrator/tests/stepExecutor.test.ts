import { describe, expect, it, vi } from "vitest";
import { createPageContext, WorkflowStepSchema } from "@scrapeflow/shared";
import { StepExecutor } from "../src/runtime/stepExecutor";
import {
  MissingContextError,
  StepConfigError,
  StepExecutionError,
  StepTimeoutError,
} from "../src/runtime/errors";
import { FakeScraper, textElements } from "./_helpers/fakes";

const initStep = (overrides: Record<string, unknown> = {}) =>
  WorkflowStepSchema.parse({ id: "open", command: "init", config: { url: "https://a.test" }, ...overrides });

const context = createPageContext({ url: "https://a.test" });

describe("StepExecutor", () => {
  it("attempts a failing step retries + 1 times with a delay between attempts", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const executor = new StepExecutor({ sleep });
    const provider = new FakeScraper({
      init: async () => {
        throw new Error("connection reset");
      },
    });

    const outcome = await executor.execute(initStep({ retries: 2 }), provider, null);

    expect(provider.calls).toEqual(["init", "init", "init"]);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000);
    expect(outcome.kind).toBe("failed");
    expect(outcome.attempts).toBe(3);
    if (outcome.kind === "failed") {
      expect(outcome.error).toBeInstanceOf(StepExecutionError);
      expect(outcome.error.message).toBe("Step open failed after 3 attempts: connection reset");
    }
  });

  it("retries timeouts immediately and reports a timeout error", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const executor = new StepExecutor({ sleep });
    const provider = new FakeScraper({ init: () => new Promise(() => undefined) });

    const outcome = await executor.execute(initStep({ retries: 1, timeout: 5 }), provider, null);

    expect(provider.calls).toEqual(["init", "init"]);
    expect(sleep).not.toHaveBeenCalled();
    expect(outcome.kind).toBe("failed");
    if (outcome.kind === "failed") {
      expect(outcome.error).toBeInstanceOf(StepTimeoutError);
      expect(outcome.error.code).toBe("STEP_TIMEOUT");
    }
  });

  it("recovers when a later attempt succeeds", async () => {
    let failures = 1;
    const executor = new StepExecutor({ sleep: async () => undefined });
    const provider = new FakeScraper({
      extract: async () => {
        if (failures > 0) {
          failures -= 1;
          throw new Error("flaky");
        }
        return textElements("title", ["a", "b"]);
      },
    });
    const step = WorkflowStepSchema.parse({
      id: "grab",
      command: "extract",
      config: { elements: { title: { selector: "h1" } } },
    });

    const outcome = await executor.execute(step, provider, context);

    expect(outcome).toMatchObject({ kind: "ok", attempts: 2 });
    if (outcome.kind === "ok" && outcome.value.command === "extract") {
      expect(outcome.value.elements).toHaveLength(2);
    }
  });

  it("fails fast without a page context", async () => {
    const executor = new StepExecutor({ sleep: async () => undefined });
    const provider = new FakeScraper();
    const step = WorkflowStepSchema.parse({ id: "find", command: "discover", config: { selectors: { a: "a" } } });

    const outcome = await executor.execute(step, provider, null);

    expect(provider.calls).toEqual([]);
    expect(outcome).toMatchObject({ kind: "failed", attempts: 0 });
    if (outcome.kind === "failed") {
      expect(outcome.error).toBeInstanceOf(MissingContextError);
    }
  });

  it("treats an invalid step config as fatal", async () => {
    const executor = new StepExecutor({ sleep: async () => undefined });
    const provider = new FakeScraper();
    const step = WorkflowStepSchema.parse({ id: "grab", command: "extract", config: {} });

    const outcome = await executor.execute(step, provider, context);

    expect(provider.calls).toEqual([]);
    if (outcome.kind !== "failed") {
      throw new Error("expected a failure");
    }
    expect(outcome.error).toBeInstanceOf(StepConfigError);
    expect(outcome.error.message).toBe("Invalid config for step grab: elements: Required");
  });

  it("passes null through when pagination ends", async () => {
    const executor = new StepExecutor();
    const provider = new FakeScraper();
    const step = WorkflowStepSchema.parse({ id: "next", command: "paginate", config: { next_page_selector: "a" } });

    const outcome = await executor.execute(step, provider, context);
    expect(outcome).toEqual({ kind: "ok", value: { command: "paginate", context: null }, attempts: 1 });
  });
});
