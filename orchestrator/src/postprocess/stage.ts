import { z } from "zod";
import { DataElement, formatIssues } from "@scrapeflow/shared";

export interface Stage {
  readonly type: string;
  apply(elements: DataElement[]): DataElement[];
}

export interface StageContext {
  now: () => Date;
}

export type StageFactory = (config: Record<string, unknown>, context: StageContext) => Stage;

export function parseStageConfig<T extends z.ZodTypeAny>(
  type: string,
  schema: T,
  config: Record<string, unknown>,
): z.infer<T> {
  const parsed = schema.safeParse(config);
  if (!parsed.success) {
    throw new Error(`Invalid ${type} config: ${formatIssues(parsed.error).join("; ")}`);
  }
  return parsed.data;
}
