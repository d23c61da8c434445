import { formatIssues, StepConfigSchemas, Workflow } from "@scrapeflow/shared";
import { ProviderRegistry } from "../providers/registry";
import { ValidationIssue, WorkflowValidationError } from "./errors";

export interface ValidationReport {
  valid: boolean;
  errors: ValidationIssue[];
}

/**
 * Structural checks that the schema alone cannot express: step ordering,
 * unique ids, per-command config shape and provider availability.
 */
export function validateWorkflow(workflow: Workflow, registry: ProviderRegistry): ValidationReport {
  const errors: ValidationIssue[] = [];

  if (workflow.steps.length === 0) {
    errors.push({ field: "steps", message: "workflow must contain at least one step" });
  } else if (workflow.steps[0].command !== "init") {
    errors.push({
      field: "steps.0.command",
      message: `first step must be 'init', found '${workflow.steps[0].command}'`,
    });
  }

  let initialized = false;
  const seen = new Set<string>();
  workflow.steps.forEach((step, index) => {
    if (step.command === "init") {
      initialized = true;
    } else if (!initialized && index > 0) {
      errors.push({
        field: `steps.${index}.command`,
        message: `'${step.command}' step ${step.id} runs before any 'init' step`,
      });
    }

    if (seen.has(step.id)) {
      errors.push({ field: `steps.${index}.id`, message: `duplicate step id '${step.id}'` });
    }
    seen.add(step.id);

    const parsed = StepConfigSchemas[step.command].safeParse(step.config);
    if (!parsed.success) {
      for (const issue of formatIssues(parsed.error)) {
        errors.push({ field: `steps.${index}.config`, message: issue });
      }
    }
  });

  if (!registry.has("scraping", workflow.scraping.provider)) {
    errors.push({
      field: "scraping.provider",
      message: `unknown scraping provider '${workflow.scraping.provider}' (available: ${registry.names("scraping").join(", ") || "none"})`,
    });
  }
  if (!registry.has("storage", workflow.storage.provider)) {
    errors.push({
      field: "storage.provider",
      message: `unknown storage provider '${workflow.storage.provider}' (available: ${registry.names("storage").join(", ") || "none"})`,
    });
  }

  return { valid: errors.length === 0, errors };
}

export function assertValidWorkflow(workflow: Workflow, registry: ProviderRegistry): void {
  const report = validateWorkflow(workflow, registry);
  if (!report.valid) {
    throw new WorkflowValidationError(report.errors);
  }
}
