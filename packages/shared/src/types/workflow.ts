import { z } from "zod";

export const STEP_COMMANDS = ["init", "discover", "extract", "paginate"] as const;
export type StepCommand = (typeof STEP_COMMANDS)[number];

export const POST_PROCESSING_TYPES = [
  "filter",
  "transform",
  "validate",
  "deduplicate",
  "remove_headers",
  "add_columns",
] as const;
export type PostProcessingType = (typeof POST_PROCESSING_TYPES)[number];

const nonEmptyRecord = <T extends z.ZodTypeAny>(value: T, label: string) =>
  z.record(value).refine((entries) => Object.keys(entries).length > 0, {
    message: `at least one ${label} is required`,
  });

export const CookieSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
  domain: z.string().min(1),
  path: z.string().min(1),
  expires: z.number().int().min(0).optional(),
  http_only: z.boolean().default(false),
  secure: z.boolean().default(false),
});
export type Cookie = z.infer<typeof CookieSchema>;

export const InitStepConfigSchema = z.object({
  url: z.string().min(1),
  wait_for: z.union([z.string().min(1), z.number().int().min(0)]).optional(),
  cookies: z.array(CookieSchema).default([]),
  headers: z.record(z.string()).default({}),
});
export type InitStepConfig = z.infer<typeof InitStepConfigSchema>;

export const DiscoverStepConfigSchema = z.object({
  selectors: nonEmptyRecord(z.string().min(1), "selector"),
  pagination: z.record(z.unknown()).optional(),
});
export type DiscoverStepConfig = z.infer<typeof DiscoverStepConfigSchema>;

export const ExtractElementSchema = z.object({
  selector: z.string().min(1),
  type: z.enum(["text", "attribute", "html"]).default("text"),
  attribute: z.string().min(1).optional(),
  transform: z.enum(["float", "int"]).optional(),
});
export type ExtractElement = z.infer<typeof ExtractElementSchema>;

export const ExtractStepConfigSchema = z.object({
  elements: nonEmptyRecord(ExtractElementSchema, "element"),
});
export type ExtractStepConfig = z.infer<typeof ExtractStepConfigSchema>;

export const StopConditionSchema = z.object({
  selector: z.string().min(1),
  condition: z.enum(["exists", "not-exists"]),
});
export type StopCondition = z.infer<typeof StopConditionSchema>;

export const PaginateStepConfigSchema = z.object({
  next_page_selector: z.string().min(1),
  max_pages: z.number().int().min(1).optional(),
  wait_after_click: z.number().int().min(0).default(1000),
  stop_condition: StopConditionSchema.optional(),
});
export type PaginateStepConfig = z.infer<typeof PaginateStepConfigSchema>;

export const StepConfigSchemas = {
  init: InitStepConfigSchema,
  discover: DiscoverStepConfigSchema,
  extract: ExtractStepConfigSchema,
  paginate: PaginateStepConfigSchema,
} as const;

export type StepConfigFor<C extends StepCommand> = z.infer<(typeof StepConfigSchemas)[C]>;

export const WorkflowStepSchema = z.object({
  id: z.string().regex(/^[a-zA-Z0-9_-]+$/, "step id may only contain letters, digits, '_' and '-'"),
  command: z.enum(STEP_COMMANDS),
  config: z.record(z.unknown()).default({}),
  retries: z.number().int().min(0).max(10).default(3),
  timeout: z.number().int().min(1).max(300_000).default(30_000),
  continue_on_error: z.boolean().default(false),
});
export type WorkflowStep = z.infer<typeof WorkflowStepSchema>;

export const SchemaFieldSchema = z.object({
  type: z.enum(["string", "number", "boolean", "date", "json"]),
  required: z.boolean().default(false),
  max_length: z.number().int().min(1).optional(),
  index: z.boolean().default(false),
});
export type SchemaField = z.infer<typeof SchemaFieldSchema>;

export const SchemaDefinitionSchema = z.object({
  name: z.string().min(1).max(100),
  fields: z.record(SchemaFieldSchema),
  primary_key: z.array(z.string()).default([]),
});
export type SchemaDefinition = z.infer<typeof SchemaDefinitionSchema>;

export const WorkflowMetadataSchema = z.object({
  name: z.string().min(1).max(100),
  description: z.string().min(1).max(500),
  author: z.string().min(1),
  target_site: z.string().min(1),
  tags: z.array(z.string()).default([]),
  created: z.string().datetime({ offset: true }).optional(),
});
export type WorkflowMetadata = z.infer<typeof WorkflowMetadataSchema>;

export const ScrapingConfigSchema = z.object({
  provider: z.string().min(1),
  config: z.record(z.unknown()).default({}),
});
export type ScrapingConfig = z.infer<typeof ScrapingConfigSchema>;

export const StorageConfigSchema = z.object({
  provider: z.string().min(1),
  config: z.record(z.unknown()).default({}),
  schema: SchemaDefinitionSchema.optional(),
});
export type StorageConfig = z.infer<typeof StorageConfigSchema>;

// Unknown stage types are accepted here; the pipeline skips them at run time.
export const PostProcessingStepSchema = z.object({
  type: z.string().min(1),
  config: z.record(z.unknown()).default({}),
});
export type PostProcessingStep = z.infer<typeof PostProcessingStepSchema>;

export const WorkflowSchema = z.object({
  version: z.string().regex(/^\d+\.\d+\.\d+$/, "version must look like 1.0.0"),
  metadata: WorkflowMetadataSchema,
  scraping: ScrapingConfigSchema,
  storage: StorageConfigSchema,
  steps: z.array(WorkflowStepSchema).min(1, "at least one step is required"),
  post_processing: z.array(PostProcessingStepSchema).optional(),
});
export type Workflow = z.infer<typeof WorkflowSchema>;
export type WorkflowInput = z.input<typeof WorkflowSchema>;
