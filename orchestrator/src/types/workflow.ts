import { DataElement } from "@scrapeflow/shared";

export type {
  Workflow,
  WorkflowStep,
  StepCommand,
  PostProcessingStep,
  SchemaDefinition,
} from "@scrapeflow/shared";

export type RunState =
  | "created"
  | "validating"
  | "initializing"
  | "running"
  | "storing"
  | "post_processing"
  | "completed"
  | "failed";

export interface StepErrorRecord {
  step_id: string;
  error_type: string;
  message: string;
}

export interface WorkflowResult {
  success: boolean;
  total_steps: number;
  completed_steps: number;
  failed_steps: number;
  extracted_data: DataElement[];
  errors: StepErrorRecord[];
  /** Wall-clock seconds. */
  execution_time: number;
  metadata: Record<string, unknown>;
}

export interface ResultSummary {
  success: boolean;
  total_steps: number;
  completed_steps: number;
  failed_steps: number;
  extracted_data_count: number;
  execution_time: number;
  error_count: number;
  errors: StepErrorRecord[];
  metadata: Record<string, unknown>;
}
