import fs from "fs";
import path from "path";
import { parseArgs } from "./args";
import { CommandDeps } from "./context";
import { initCommand } from "./init";
import { CliIO, processIO } from "./io";
import { providersCommand } from "./providers";
import { runCommand } from "./run";
import { validateCommand } from "./validate";

export const USAGE = [
  "Usage: scrapeflow <command> [options]",
  "",
  "Commands:",
  "  run <workflow.json>        Execute a workflow",
  "      --config <file>         Runtime config (JSON)",
  "      --output <file>         Override the storage file path",
  "      --format table|json     Summary format (default: table)",
  "      --dry-run               Validate only",
  "      --continue-on-error     Keep going after failed steps",
  "  validate <workflow.json>   Check a workflow without running it",
  "  providers list [--type scraping|storage]",
  "  providers test <name> [--config provider-config.json]",
  "  init [--output workflow.json] [--force]",
  "  version",
];

function readVersion(): string {
  const manifest: unknown = JSON.parse(
    fs.readFileSync(path.resolve(__dirname, "..", "..", "package.json"), "utf-8"),
  );
  if (typeof manifest === "object" && manifest !== null && "version" in manifest && typeof manifest.version === "string") {
    return manifest.version;
  }
  return "unknown";
}

export async function runCli(argv: string[], io: CliIO = processIO, deps: CommandDeps = {}): Promise<number> {
  const [command, ...rest] = argv;
  switch (command) {
    case "run":
      return runCommand(parseArgs(rest), io, deps);
    case "validate":
      return validateCommand(parseArgs(rest), io, deps);
    case "providers":
      return providersCommand(parseArgs(rest), io, deps);
    case "init":
      return initCommand(parseArgs(rest), io);
    case "version":
    case "--version":
      io.out(`scrapeflow ${readVersion()}`);
      return 0;
    case undefined:
    case "help":
    case "--help":
      USAGE.forEach((line) => io.out(line));
      return 0;
    default:
      io.err(`Unknown command: ${command}`);
      USAGE.forEach((line) => io.err(line));
      return 1;
  }
}
