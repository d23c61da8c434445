import fs from "fs/promises";
import path from "path";
import { parseWorkflow, Workflow, WorkflowParseError } from "@scrapeflow/shared";

export async function readJsonFile(filePath: string): Promise<unknown> {
  const resolved = path.resolve(filePath);
  const raw = await fs.readFile(resolved, "utf-8");
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new Error(`Failed to parse JSON: ${resolved} (${error instanceof Error ? error.message : String(error)})`);
  }
}

export async function loadWorkflowFile(filePath: string): Promise<Workflow> {
  const resolved = path.resolve(filePath);
  let raw: unknown;
  try {
    raw = await readJsonFile(resolved);
  } catch (error) {
    throw new WorkflowParseError([error instanceof Error ? error.message : String(error)], resolved);
  }
  return parseWorkflow(raw, resolved);
}
