export interface CliArgs {
  positionals: string[];
  config?: string;
  output?: string;
  format?: string;
  type?: string;
  dryRun: boolean;
  continueOnError: boolean;
  force: boolean;
  help: boolean;
}

const VALUE_FLAGS = {
  config: "config",
  output: "output",
  format: "format",
  type: "type",
} as const;

const BOOLEAN_FLAGS = {
  "dry-run": "dryRun",
  "continue-on-error": "continueOnError",
  force: "force",
  help: "help",
} as const;

function isKey<T extends object>(table: T, key: string): key is Extract<keyof T, string> {
  return Object.prototype.hasOwnProperty.call(table, key);
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    positionals: [],
    dryRun: false,
    continueOnError: false,
    force: false,
    help: false,
  };
  let index = 0;

  while (index < argv.length) {
    const token = argv[index];
    if (!token.startsWith("--")) {
      args.positionals.push(token);
      index += 1;
      continue;
    }

    const key = token.slice(2);
    if (isKey(BOOLEAN_FLAGS, key)) {
      args[BOOLEAN_FLAGS[key]] = true;
      index += 1;
      continue;
    }

    if (isKey(VALUE_FLAGS, key)) {
      const value = argv[index + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new Error(`Missing value for --${key}`);
      }
      args[VALUE_FLAGS[key]] = value;
      index += 2;
      continue;
    }

    throw new Error(`Unknown option: ${token}`);
  }

  return args;
}

export function requirePositional(args: CliArgs, position: number, name: string): string {
  const value = args.positionals[position];
  if (!value) {
    throw new Error(`Missing required argument: <${name}>`);
  }
  return value;
}

export function parseFormat(value: string | undefined): "table" | "json" {
  if (value === undefined || value === "table" || value === "json") {
    return value ?? "table";
  }
  throw new Error(`Unsupported format: ${value} (expected table or json)`);
}
