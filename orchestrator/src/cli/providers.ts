import { isPlainObject, ProviderKind } from "@scrapeflow/shared";
import { CliArgs, parseFormat, requirePositional } from "./args";
import { commandContext, CommandDeps } from "./context";
import { formatTable } from "./format";
import { CliIO } from "./io";
import { readJsonFile } from "../loader";

function parseKind(value: string | undefined): ProviderKind | undefined {
  if (value === undefined || value === "scraping" || value === "storage") {
    return value;
  }
  throw new Error(`Unsupported provider type: ${value} (expected scraping or storage)`);
}

export async function providersCommand(args: CliArgs, io: CliIO, deps: CommandDeps = {}): Promise<number> {
  const subcommand = requirePositional(args, 0, "list|test");

  if (subcommand === "list") {
    const { registry } = commandContext(undefined, deps);
    const entries = registry.list(parseKind(args.type));
    if (parseFormat(args.format) === "json") {
      io.out(JSON.stringify(entries, null, 2));
      return 0;
    }
    formatTable(
      ["Name", "Type", "Version", "Capabilities"],
      entries.map((entry) => [entry.name, entry.type, entry.version, entry.capabilities.join(", ")]),
    ).forEach((line) => io.out(line));
    return 0;
  }

  if (subcommand === "test") {
    const name = requirePositional(args, 1, "name");
    const { registry } = commandContext(undefined, deps);
    const raw = args.config ? await readJsonFile(args.config) : {};
    if (!isPlainObject(raw)) {
      throw new Error(`Provider config must be a JSON object: ${args.config}`);
    }
    const healthy = await registry.testConnection(name, raw);
    if (healthy) {
      io.out(`Provider ${name}: healthy`);
      return 0;
    }
    io.err(`Provider ${name}: unavailable`);
    return 1;
  }

  throw new Error(`Unknown providers subcommand: ${subcommand}`);
}
