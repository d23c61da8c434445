import { z } from "zod";
import { WorkflowParseError } from "./errors";
import { Workflow, WorkflowSchema, WorkflowStep } from "./types/workflow";

export type SafeParseResult<T> =
  | { success: true; data: T }
  | { success: false; issues: string[] };

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

export function safeParseWorkflow(raw: unknown): SafeParseResult<Workflow> {
  const parsed = WorkflowSchema.safeParse(raw);
  if (!parsed.success) {
    return { success: false, issues: formatIssues(parsed.error) };
  }
  return { success: true, data: parsed.data };
}

export function parseWorkflow(raw: unknown, source?: string): Workflow {
  const parsed = safeParseWorkflow(raw);
  if (!parsed.success) {
    throw new WorkflowParseError(parsed.issues, source);
  }
  return parsed.data;
}

export function withContinueOnError(workflow: Workflow): Workflow {
  const steps: WorkflowStep[] = workflow.steps.map((step) => ({
    ...step,
    continue_on_error: true,
  }));
  return { ...workflow, steps };
}
