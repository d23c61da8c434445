export class ScrapeflowError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class WorkflowParseError extends ScrapeflowError {
  issues: string[];

  constructor(issues: string[], source?: string) {
    const where = source ? ` (${source})` : "";
    super("WORKFLOW_PARSE", `Invalid workflow${where}: ${issues.join("; ")}`);
    this.issues = issues;
  }
}
