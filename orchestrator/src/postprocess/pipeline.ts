import { DataElement, PostProcessingStep } from "@scrapeflow/shared";
import { describeError } from "../runtime/errors";
import { Logger, silentLogger } from "../logging/logger";
import { Stage, StageContext, StageFactory } from "./stage";
import { builtinStages } from "./stages";

export interface PipelineOptions {
  logger?: Logger;
  now?: () => Date;
  stages?: Record<string, StageFactory>;
}

/**
 * Ordered chain of element transforms. Unknown or failing stages are logged
 * and skipped so one bad stage never discards the data collected so far.
 */
export class PostProcessingPipeline {
  private steps: PostProcessingStep[];
  private logger: Logger;
  private context: StageContext;
  private factories: Record<string, StageFactory>;

  constructor(steps: PostProcessingStep[], options: PipelineOptions = {}) {
    this.steps = steps;
    this.logger = options.logger ?? silentLogger;
    this.context = { now: options.now ?? (() => new Date()) };
    this.factories = options.stages ?? builtinStages;
  }

  run(elements: DataElement[]): DataElement[] {
    let current = elements;
    this.steps.forEach((step, index) => {
      const label = `${index + 1}/${this.steps.length} ${step.type}`;
      const factory = Object.hasOwn(this.factories, step.type) ? this.factories[step.type] : undefined;
      if (!factory) {
        this.logger.warn(`skipping unknown post-processing stage ${label}`);
        return;
      }

      let stage: Stage;
      try {
        stage = factory(step.config, this.context);
      } catch (error) {
        this.logger.warn(`skipping stage ${label}: ${describeError(error)}`);
        return;
      }

      try {
        const next = stage.apply(current);
        this.logger.info(`stage ${label}: ${current.length} -> ${next.length} elements`);
        current = next;
      } catch (error) {
        this.logger.warn(`stage ${label} failed and was skipped: ${describeError(error)}`);
      }
    });
    return current;
  }
}
