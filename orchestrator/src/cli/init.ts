import fs from "fs/promises";
import path from "path";
import { CliArgs } from "./args";
import { CliIO } from "./io";

export const TEMPLATE_PATH = path.resolve(__dirname, "..", "..", "templates", "workflow.template.json");

export async function initCommand(args: CliArgs, io: CliIO): Promise<number> {
  const target = path.resolve(args.output ?? "workflow.json");

  if (!args.force) {
    try {
      await fs.access(target);
      io.err(`Refusing to overwrite ${target} (pass --force to replace it)`);
      return 1;
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
        throw error;
      }
    }
  }

  const template = await fs.readFile(TEMPLATE_PATH, "utf-8");
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, template, "utf-8");
  io.out(`Created workflow template at ${target}`);
  return 0;
}
