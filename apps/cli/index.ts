#!/usr/bin/env tsx
import { readFileSync } from "fs";
import { Command } from "commander";
import { registerInitCommand } from "./src/commands/init.ts";
import { registerSubmitCommand } from "./src/commands/submit.ts";
import { registerStatusCommand } from "./src/commands/status.ts";
import { registerLogsCommand } from "./src/commands/logs.ts";
import { registerCancelCommand } from "./src/commands/cancel.ts";
import { registerListCommand } from "./src/commands/list.ts";
import { registerNodesCommand } from "./src/commands/nodes.ts";

const pkg: unknown = JSON.parse(
  readFileSync(new URL("./package.json", import.meta.url), "utf-8"),
);
const version =
  typeof pkg === "object" &&
  pkg !== null &&
  "version" in pkg &&
  typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";

async function main() {
  const program = new Command();

  program
    .version(version)
    .name("myjob")
    .description("submit and track git-pinned Slurm jobs over SSH");

  registerInitCommand(program);
  registerSubmitCommand(program);
  registerStatusCommand(program);
  registerLogsCommand(program);
  registerCancelCommand(program);
  registerListCommand(program);
  registerNodesCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
