import {
  ConnectionConfig,
  DataElement,
  PageContext,
  ScrapingProvider,
  StorageProvider,
  Workflow,
} from "@scrapeflow/shared";
import { ProviderRegistry } from "../providers/registry";
import { PostProcessingPipeline } from "../postprocess/pipeline";
import { ConsoleLogger, Logger, LogLevel } from "../logging/logger";
import { RunState, StepErrorRecord, WorkflowResult } from "../types/workflow";
import { describeError, errorTypeOf, ProviderSetupError } from "./errors";
import { DEFAULT_RETRY_DELAY_MS, StepExecutor } from "./stepExecutor";
import { assertValidWorkflow } from "./validator";

export interface WorkflowOrchestratorOptions {
  registry: ProviderRegistry;
  retryDelayMs?: number;
  logLevel?: LogLevel;
  createLogger?: (scope: string) => Logger;
  /** Per-provider connection defaults; the workflow's own config wins on conflicts. */
  providerDefaults?: Record<string, ConnectionConfig>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

interface RunProviders {
  scraping: ScrapingProvider;
  storage: StorageProvider;
}

/**
 * Runs workflows against freshly created providers. Each `execute` call owns
 * its providers, page context and element buffer, so runs may overlap.
 */
export class WorkflowOrchestrator {
  private registry: ProviderRegistry;
  private retryDelayMs: number;
  private createLogger: (scope: string) => Logger;
  private providerDefaults: Record<string, ConnectionConfig>;
  private sleep?: (ms: number) => Promise<void>;
  private now: () => Date;

  constructor(options: WorkflowOrchestratorOptions) {
    this.registry = options.registry;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    const level = options.logLevel ?? "info";
    this.createLogger = options.createLogger ?? ((scope) => new ConsoleLogger(scope, level));
    this.providerDefaults = options.providerDefaults ?? {};
    this.sleep = options.sleep;
    this.now = options.now ?? (() => new Date());
  }

  async execute(workflow: Workflow): Promise<WorkflowResult> {
    const startedAt = Date.now();
    const log = this.createLogger(`run:${workflow.metadata.name}`);
    let state: RunState = "created";
    const transition = (next: RunState) => {
      log.info(`state ${state} -> ${next}`);
      state = next;
    };

    transition("validating");
    assertValidWorkflow(workflow, this.registry);

    transition("initializing");
    const providers = await this.acquireProviders(workflow, log);

    try {
      transition("running");
      const executor = new StepExecutor({
        retryDelayMs: this.retryDelayMs,
        logger: log,
        sleep: this.sleep,
      });
      const elements: DataElement[] = [];
      const errors: StepErrorRecord[] = [];
      let context: PageContext | null = null;
      let completedSteps = 0;
      let failedSteps = 0;
      let abortedAt: string | undefined;

      for (const step of workflow.steps) {
        log.info(`step ${step.id} (${step.command})`);
        const outcome = await executor.execute(step, providers.scraping, context);

        if (outcome.kind === "ok") {
          completedSteps += 1;
          const result = outcome.value;
          if (result.command === "init") {
            context = result.context;
          } else if (result.command === "paginate") {
            if (result.context) {
              context = result.context;
            } else {
              log.info(`step ${step.id}: no further pages`);
            }
          } else {
            elements.push(...result.elements);
            log.info(`step ${step.id}: ${result.elements.length} elements`);
          }
          continue;
        }

        failedSteps += 1;
        errors.push({ step_id: step.id, error_type: outcome.error.name, message: outcome.error.message });
        log.error(`step ${step.id} failed: ${outcome.error.message}`);
        if (!step.continue_on_error) {
          abortedAt = step.id;
          log.warn(`aborting remaining steps after ${step.id}`);
          break;
        }
      }

      let storageFailed = false;
      const schema = workflow.storage.schema;
      if (elements.length > 0 && schema) {
        transition("storing");
        try {
          await providers.storage.store([...elements], schema);
          log.info(`stored ${elements.length} elements via ${workflow.storage.provider}`);
        } catch (error) {
          storageFailed = true;
          errors.push({ step_id: "storage", error_type: errorTypeOf(error), message: describeError(error) });
          log.error(`storage failed: ${describeError(error)}`);
        }
      }

      let processed = elements;
      if (workflow.post_processing && workflow.post_processing.length > 0) {
        transition("post_processing");
        const pipeline = new PostProcessingPipeline(workflow.post_processing, {
          logger: this.createLogger("pipeline"),
          now: this.now,
        });
        processed = pipeline.run(elements);
      }

      const success = failedSteps === 0 && !storageFailed;
      transition(success ? "completed" : "failed");

      const metadata: Record<string, unknown> = {
        workflow_name: workflow.metadata.name,
        workflow_version: workflow.version,
        scraping_provider: workflow.scraping.provider,
        storage_provider: workflow.storage.provider,
        elements_before_post_processing: elements.length,
        final_state: state,
      };
      if (abortedAt) {
        metadata.aborted_at = abortedAt;
      }

      const result: WorkflowResult = {
        success,
        total_steps: workflow.steps.length,
        completed_steps: completedSteps,
        failed_steps: failedSteps,
        extracted_data: processed,
        errors,
        execution_time: (Date.now() - startedAt) / 1000,
        metadata,
      };
      log.info(
        `${success ? "completed" : "failed"}: ${completedSteps}/${workflow.steps.length} steps, ${processed.length} elements`,
      );
      return result;
    } catch (error) {
      transition("failed");
      throw error;
    } finally {
      await this.releaseProviders(providers, log);
    }
  }

  private async acquireProviders(workflow: Workflow, log: Logger): Promise<RunProviders> {
    const scraping = await this.setUpScraping(workflow, log);
    const storageName = workflow.storage.provider;
    let storage: StorageProvider | null = null;
    try {
      storage = this.registry.create("storage", storageName);
      await storage.connect({ ...this.providerDefaults[storageName], ...workflow.storage.config });
      log.debug(`providers ready: ${workflow.scraping.provider} -> ${storageName}`);
      return { scraping, storage };
    } catch (error) {
      const acquired = storage;
      if (acquired) {
        await this.safely(log, `disconnect of ${storageName}`, () => acquired.disconnect());
      }
      await this.safely(log, `cleanup of ${workflow.scraping.provider}`, () => scraping.cleanup());
      throw new ProviderSetupError("storage", storageName, error);
    }
  }

  private async setUpScraping(workflow: Workflow, log: Logger): Promise<ScrapingProvider> {
    const name = workflow.scraping.provider;
    let scraping: ScrapingProvider | null = null;
    try {
      scraping = this.registry.create("scraping", name);
      await scraping.initialize({ ...this.providerDefaults[name], ...workflow.scraping.config });
      return scraping;
    } catch (error) {
      const acquired = scraping;
      if (acquired) {
        await this.safely(log, `cleanup of ${name}`, () => acquired.cleanup());
      }
      throw new ProviderSetupError("scraping", name, error);
    }
  }

  private async releaseProviders(providers: RunProviders, log: Logger): Promise<void> {
    await this.safely(log, "scraping provider cleanup", () => providers.scraping.cleanup());
    await this.safely(log, "storage provider disconnect", () => providers.storage.disconnect());
  }

  private async safely(log: Logger, label: string, task: () => Promise<void>): Promise<void> {
    try {
      await task();
    } catch (error) {
      log.warn(`${label} failed: ${describeError(error)}`);
    }
  }
}
