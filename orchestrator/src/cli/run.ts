import { isPlainObject, withContinueOnError, Workflow } from "@scrapeflow/shared";
import { CliArgs, parseFormat, requirePositional } from "./args";
import { commandContext, CommandDeps } from "./context";
import { formatSummary, formatValidation, formatWorkflowInfo } from "./format";
import { CliIO } from "./io";
import { providerDefaults } from "../config/defaults";
import { loadWorkflowFile } from "../loader";
import { ConsoleLogger, LogLevel } from "../logging/logger";
import { WorkflowOrchestrator } from "../runtime/engine";
import { toResultSummary } from "../runtime/result";
import { validateWorkflow } from "../runtime/validator";

const PREVIEW_SIZE = 10;

/** Points the storage provider at `filePath`, whether its config is flat or nested. */
export function withStorageOutput(workflow: Workflow, filePath: string): Workflow {
  const { provider, config } = workflow.storage;
  const nested = config[provider];
  const next = isPlainObject(nested)
    ? { ...config, [provider]: { ...nested, file_path: filePath } }
    : { ...config, file_path: filePath };
  return { ...workflow, storage: { ...workflow.storage, config: next } };
}

export async function runCommand(args: CliArgs, io: CliIO, deps: CommandDeps = {}): Promise<number> {
  const workflowPath = requirePositional(args, 0, "workflow");
  const format = parseFormat(args.format);
  const { config, registry } = commandContext(args.config, deps);

  let workflow = await loadWorkflowFile(workflowPath);
  if (args.output) {
    workflow = withStorageOutput(workflow, args.output);
  }
  if (args.continueOnError) {
    workflow = withContinueOnError(workflow);
  }

  if (format === "table") {
    formatWorkflowInfo(workflow).forEach((line) => io.out(line));
  }

  if (args.dryRun) {
    const report = validateWorkflow(workflow, registry);
    if (format === "json") {
      io.out(JSON.stringify(report, null, 2));
    } else {
      formatValidation(report).forEach((line) => io.out(line));
    }
    return report.valid ? 0 : 1;
  }

  // Keep stdout parseable when the summary is printed as JSON.
  const logLevel: LogLevel =
    format === "json" && (config.runtime.logLevel === "info" || config.runtime.logLevel === "debug")
      ? "warn"
      : config.runtime.logLevel;
  const orchestrator = new WorkflowOrchestrator({
    registry,
    retryDelayMs: config.runtime.retryDelayMs,
    createLogger: deps.createLogger ?? ((scope) => new ConsoleLogger(scope, logLevel)),
    providerDefaults: providerDefaults(config),
    sleep: deps.sleep,
  });

  const result = await orchestrator.execute(workflow);
  const summary = toResultSummary(result);
  if (format === "json") {
    io.out(JSON.stringify(summary, null, 2));
  } else {
    formatSummary(summary, result.extracted_data.slice(0, PREVIEW_SIZE)).forEach((line) => io.out(line));
  }
  return result.success ? 0 : 1;
}
