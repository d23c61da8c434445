import { safeParseWorkflow } from "@scrapeflow/shared";
import { CliArgs, parseFormat, requirePositional } from "./args";
import { commandContext, CommandDeps } from "./context";
import { formatValidation, formatWorkflowInfo } from "./format";
import { CliIO } from "./io";
import { readJsonFile } from "../loader";
import { validateWorkflow, ValidationReport } from "../runtime/validator";

function issueToField(issue: string) {
  const separator = issue.indexOf(": ");
  return separator === -1
    ? { field: "(root)", message: issue }
    : { field: issue.slice(0, separator), message: issue.slice(separator + 2) };
}

export async function validateCommand(args: CliArgs, io: CliIO, deps: CommandDeps = {}): Promise<number> {
  const workflowPath = requirePositional(args, 0, "workflow");
  const format = parseFormat(args.format);
  const { registry } = commandContext(args.config, deps);

  const parsed = safeParseWorkflow(await readJsonFile(workflowPath));
  let report: ValidationReport;
  if (!parsed.success) {
    report = { valid: false, errors: parsed.issues.map(issueToField) };
  } else {
    report = validateWorkflow(parsed.data, registry);
    if (format === "table") {
      formatWorkflowInfo(parsed.data).forEach((line) => io.out(line));
    }
  }

  if (format === "json") {
    io.out(JSON.stringify(report, null, 2));
  } else {
    formatValidation(report).forEach((line) => (report.valid ? io.out(line) : io.err(line)));
  }
  return report.valid ? 0 : 1;
}
