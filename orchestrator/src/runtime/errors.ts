import { ScrapeflowError } from "@scrapeflow/shared";
import type { ProviderKind } from "@scrapeflow/shared";

export { ScrapeflowError, WorkflowParseError } from "@scrapeflow/shared";

export interface ValidationIssue {
  field: string;
  message: string;
}

export class WorkflowValidationError extends ScrapeflowError {
  issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(
      "WORKFLOW_VALIDATION",
      `Workflow validation failed: ${issues.map((issue) => `${issue.field}: ${issue.message}`).join("; ")}`,
    );
    this.issues = issues;
  }
}

export class UnknownProviderError extends ScrapeflowError {
  kind: ProviderKind;
  provider: string;

  constructor(kind: ProviderKind, provider: string, available: string[]) {
    const known = available.length > 0 ? available.join(", ") : "none";
    super("UNKNOWN_PROVIDER", `Unknown ${kind} provider '${provider}' (available: ${known})`);
    this.kind = kind;
    this.provider = provider;
  }
}

export class ProviderSetupError extends ScrapeflowError {
  kind: ProviderKind;
  provider: string;
  cause: unknown;

  constructor(kind: ProviderKind, provider: string, cause: unknown) {
    super("PROVIDER_SETUP", `Failed to set up ${kind} provider '${provider}': ${describeError(cause)}`);
    this.kind = kind;
    this.provider = provider;
    this.cause = cause;
  }
}

export class StepConfigError extends ScrapeflowError {
  stepId: string;
  issues: string[];

  constructor(stepId: string, issues: string[]) {
    super("STEP_CONFIG", `Invalid config for step ${stepId}: ${issues.join("; ")}`);
    this.stepId = stepId;
    this.issues = issues;
  }
}

export class MissingContextError extends ScrapeflowError {
  stepId: string;

  constructor(stepId: string, command: string) {
    super("MISSING_CONTEXT", `Step ${stepId} (${command}) needs a page context; run an init step first`);
    this.stepId = stepId;
  }
}

export class StepTimeoutError extends ScrapeflowError {
  stepId: string;
  attempts: number;

  constructor(stepId: string, attempts: number, timeoutMs: number) {
    super("STEP_TIMEOUT", `Step ${stepId} timed out after ${attempts} attempts (${timeoutMs}ms each)`);
    this.stepId = stepId;
    this.attempts = attempts;
  }
}

export class StepExecutionError extends ScrapeflowError {
  stepId: string;
  attempts: number;
  cause: unknown;

  constructor(stepId: string, attempts: number, cause: unknown) {
    super("STEP_EXECUTION", `Step ${stepId} failed after ${attempts} attempts: ${describeError(cause)}`);
    this.stepId = stepId;
    this.attempts = attempts;
    this.cause = cause;
  }
}

export class StorageError extends ScrapeflowError {
  provider: string;

  constructor(provider: string, message: string) {
    super("STORAGE", `${provider} storage: ${message}`);
    this.provider = provider;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorTypeOf(error: unknown): string {
  return error instanceof Error ? error.name : typeof error;
}
