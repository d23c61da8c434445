import { ResultSummary, WorkflowResult } from "../types/workflow";

export function toResultSummary(result: WorkflowResult): ResultSummary {
  return {
    success: result.success,
    total_steps: result.total_steps,
    completed_steps: result.completed_steps,
    failed_steps: result.failed_steps,
    extracted_data_count: result.extracted_data.length,
    execution_time: result.execution_time,
    error_count: result.errors.length,
    errors: result.errors.map((error) => ({ ...error })),
    metadata: { ...result.metadata },
  };
}
