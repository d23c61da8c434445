import { DataElement, fieldText, Workflow } from "@scrapeflow/shared";
import { ValidationReport } from "../runtime/validator";
import { ResultSummary } from "../types/workflow";

const RULE = "=".repeat(60);

function truncate(value: string, width: number): string {
  return value.length > width ? `${value.slice(0, width - 3)}...` : value;
}

export function formatWorkflowInfo(workflow: Workflow): string[] {
  return [
    `Workflow: ${workflow.metadata.name} (v${workflow.version})`,
    `  Description: ${workflow.metadata.description}`,
    `  Author: ${workflow.metadata.author}`,
    `  Target: ${workflow.metadata.target_site}`,
    `  Steps: ${workflow.steps.length}`,
    `  Scraping: ${workflow.scraping.provider}  Storage: ${workflow.storage.provider}`,
  ];
}

export function formatSummary(summary: ResultSummary, preview: DataElement[]): string[] {
  const lines = [
    RULE,
    "Execution Summary",
    RULE,
    `Status: ${summary.success ? "SUCCESS" : "FAILED"}`,
    `Execution Time: ${summary.execution_time.toFixed(2)}s`,
    `Steps: ${summary.completed_steps}/${summary.total_steps} completed`,
  ];
  if (summary.failed_steps > 0) {
    lines.push(`Failed Steps: ${summary.failed_steps}`);
  }
  lines.push(`Data Elements: ${summary.extracted_data_count}`);

  if (summary.errors.length > 0) {
    lines.push("", "Errors:");
    for (const error of summary.errors) {
      lines.push(`  - ${error.step_id} [${error.error_type}]: ${error.message}`);
    }
  }

  if (preview.length > 0) {
    lines.push("", `Data Preview (first ${preview.length} items):`);
    lines.push(...formatTable(["Type", "Selector", "Value"], preview.map((element) => [
      element.type,
      truncate(element.selector, 30),
      truncate(fieldText(element.value), 50),
    ])));
  }
  return lines;
}

export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? "").length)),
  );
  const line = (cells: string[]) =>
    cells
      .map((cell, column) => cell.padEnd(widths[column]))
      .join("  ")
      .trimEnd();
  return [line(headers), line(widths.map((width) => "-".repeat(width))), ...rows.map(line)];
}

export function formatValidation(report: ValidationReport): string[] {
  if (report.valid) {
    return ["Workflow is valid"];
  }
  return [
    `Workflow is invalid (${report.errors.length} issue${report.errors.length === 1 ? "" : "s"}):`,
    ...report.errors.map((issue) => `  - ${issue.field}: ${issue.message}`),
  ];
}
