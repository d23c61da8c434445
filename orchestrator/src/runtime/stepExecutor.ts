import { z } from "zod";
import {
  DataElement,
  DiscoverStepConfigSchema,
  ExtractStepConfigSchema,
  formatIssues,
  InitStepConfigSchema,
  PageContext,
  PaginateStepConfigSchema,
  ScrapingProvider,
  WorkflowStep,
} from "@scrapeflow/shared";
import {
  describeError,
  MissingContextError,
  ScrapeflowError,
  StepConfigError,
  StepExecutionError,
  StepTimeoutError,
} from "./errors";
import { DeadlineExceededError, sleep, withTimeout } from "./timeout";
import { Logger, silentLogger } from "../logging/logger";

export type StepResult =
  | { command: "init"; context: PageContext }
  | { command: "discover" | "extract"; elements: DataElement[] }
  | { command: "paginate"; context: PageContext | null };

export type StepOutcome =
  | { kind: "ok"; value: StepResult; attempts: number }
  | { kind: "failed"; error: ScrapeflowError; attempts: number };

type AttemptResult =
  | { kind: "ok"; value: StepResult }
  | { kind: "retryable"; error: unknown; timedOut: boolean }
  | { kind: "fatal"; error: ScrapeflowError };

export interface StepExecutorOptions {
  retryDelayMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_DELAY_MS = 1_000;

function parseStepConfig<T extends z.ZodTypeAny>(step: WorkflowStep, schema: T): z.infer<T> {
  const parsed = schema.safeParse(step.config);
  if (!parsed.success) {
    throw new StepConfigError(step.id, formatIssues(parsed.error));
  }
  return parsed.data;
}

function requireContext(step: WorkflowStep, context: PageContext | null): PageContext {
  if (!context) {
    throw new MissingContextError(step.id, step.command);
  }
  return context;
}

/** Binds a step to its provider call; throws for problems no retry can fix. */
export function prepareStep(
  step: WorkflowStep,
  provider: ScrapingProvider,
  context: PageContext | null,
): () => Promise<StepResult> {
  switch (step.command) {
    case "init": {
      const config = parseStepConfig(step, InitStepConfigSchema);
      return async () => ({ command: "init", context: await provider.executeInit(config) });
    }
    case "discover": {
      const current = requireContext(step, context);
      const config = parseStepConfig(step, DiscoverStepConfigSchema);
      return async () => ({
        command: "discover",
        elements: await provider.executeDiscover(config, current),
      });
    }
    case "extract": {
      const current = requireContext(step, context);
      const config = parseStepConfig(step, ExtractStepConfigSchema);
      return async () => ({
        command: "extract",
        elements: await provider.executeExtract(config, current),
      });
    }
    case "paginate": {
      const current = requireContext(step, context);
      const config = parseStepConfig(step, PaginateStepConfigSchema);
      return async () => ({
        command: "paginate",
        context: await provider.executePaginate(config, current),
      });
    }
  }
}

export class StepExecutor {
  private retryDelayMs: number;
  private logger: Logger;
  private sleep: (ms: number) => Promise<void>;

  constructor(options: StepExecutorOptions = {}) {
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? sleep;
  }

  async execute(
    step: WorkflowStep,
    provider: ScrapingProvider,
    context: PageContext | null,
  ): Promise<StepOutcome> {
    const maxAttempts = step.retries + 1;
    let run: () => Promise<StepResult>;
    try {
      run = prepareStep(step, provider, context);
    } catch (error) {
      return { kind: "failed", error: this.classifyPrepareError(error), attempts: 0 };
    }

    for (let attempt = 1; ; attempt += 1) {
      const result = await this.attempt(run, step.timeout);
      if (result.kind === "ok") {
        return { kind: "ok", value: result.value, attempts: attempt };
      }
      if (result.kind === "fatal") {
        return { kind: "failed", error: result.error, attempts: attempt };
      }

      const remaining = maxAttempts - attempt;
      this.logger.warn(
        `step ${step.id} attempt ${attempt}/${maxAttempts} ${result.timedOut ? "timed out" : "failed"}: ${describeError(result.error)}`,
      );

      if (remaining === 0) {
        const error = result.timedOut
          ? new StepTimeoutError(step.id, attempt, step.timeout)
          : new StepExecutionError(step.id, attempt, result.error);
        return { kind: "failed", error, attempts: attempt };
      }
      if (!result.timedOut) {
        await this.sleep(this.retryDelayMs);
      }
    }
  }

  private async attempt(run: () => Promise<StepResult>, timeoutMs: number): Promise<AttemptResult> {
    try {
      return { kind: "ok", value: await withTimeout(run, timeoutMs) };
    } catch (error) {
      if (error instanceof StepConfigError || error instanceof MissingContextError) {
        return { kind: "fatal", error };
      }
      return { kind: "retryable", error, timedOut: error instanceof DeadlineExceededError };
    }
  }

  private classifyPrepareError(error: unknown): ScrapeflowError {
    if (error instanceof StepConfigError || error instanceof MissingContextError) {
      return error;
    }
    throw error;
  }
}
