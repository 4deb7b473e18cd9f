import type { Command } from "commander";
import { basename, relative } from "path";
import { confirm, input } from "@inquirer/prompts";
import { existingProjectFiles, initProject } from "@/core/initializer.ts";
import { reportError } from "@/lib/report.ts";
import { formatCommand, theme } from "@/lib/theme.ts";

interface InitOptions {
  host?: string;
  user?: string;
  name?: string;
  force?: boolean;
}

export function registerInitCommand(program: Command) {
  program
    .command("init")
    .description("Write a starter myjob.yaml and secret.yaml here")
    .option("--host <host>", "cluster login host")
    .option("--user <user>", "username on the cluster")
    .option("--name <name>", "job name (default: directory name)")
    .option("--force", "overwrite existing files without asking")
    .action(async (options: InitOptions) => {
      try {
        await runInit(options);
      } catch (error) {
        if (
          error instanceof Error &&
          error.message.includes("User force closed")
        ) {
          console.log("\n");
          process.exit(0);
        }
        reportError(error);
      }
    });
}

function defaultName(cwd: string): string {
  return basename(cwd).replace(/[^A-Za-z0-9_.-]/g, "-") || "myjob";
}

async function runInit(options: InitOptions) {
  const cwd = process.cwd();

  let overwrite = !!options.force;
  const existing = existingProjectFiles(cwd);
  if (existing.length > 0 && !overwrite) {
    console.log(theme.warning("\nFound existing project files:"));
    for (const path of existing) {
      console.log(theme.muted(`  ${relative(cwd, path)}`));
    }
    overwrite = await confirm({
      message: "Overwrite them?",
      default: false,
    });
  }

  const host =
    options.host ??
    (await input({
      message: "Cluster login host:",
      validate: (value) => (value.trim() ? true : "Host is required"),
    }));
  const user =
    options.user ??
    (await input({ message: "Username on the cluster (optional):" }));
  const name = options.name ?? defaultName(cwd);

  const result = initProject({
    cwd,
    name,
    host: host.trim(),
    user: user.trim() || undefined,
    overwrite,
  });

  console.log();
  for (const path of result.written) {
    console.log(theme.success(`  ✓ wrote ${relative(cwd, path)}`));
  }
  for (const path of result.skipped) {
    console.log(theme.muted(`  - kept ${relative(cwd, path)}`));
  }
  if (result.gitignoreUpdated) {
    console.log(theme.success("  ✓ added secret.yaml to .gitignore"));
  }

  console.log(theme.muted("\n  Edit myjob.yaml, then:"));
  console.log(formatCommand("myjob submit --dry-run"));
  console.log(formatCommand("myjob submit"));
}
