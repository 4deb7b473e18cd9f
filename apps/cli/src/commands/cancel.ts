import type { Command } from "commander";
import ora from "ora";
import { confirm } from "@inquirer/prompts";
import type { JobRecord } from "@myjob/shared";
import { JobRecordStore } from "@/core/job-store.ts";
import { StatusReconciler } from "@/core/status.ts";
import { reportError } from "@/lib/report.ts";
import { ConfigError } from "@/lib/errors.ts";
import { formatCommand, theme } from "@/lib/theme.ts";

interface CancelOptions {
  force?: boolean;
  yes?: boolean;
  json?: boolean;
}

export function registerCancelCommand(program: Command) {
  program
    .command("cancel")
    .description("Cancel a submitted job")
    .argument("<jobId>", "local id, unique prefix, or Slurm job id")
    .option("-f, --force", "send SIGKILL to every step instead of SIGTERM")
    .option("-y, --yes", "skip the confirmation prompt")
    .option("--json", "output as JSON (requires --yes)")
    .action(async (jobId: string, options: CancelOptions) => {
      try {
        await runCancel(jobId, options);
      } catch (error) {
        if (
          error instanceof Error &&
          error.message.includes("User force closed")
        ) {
          console.log("\n");
          process.exit(0);
        }
        reportError(error, { json: options.json });
      }
    });
}

type Ask = (options: { message: string; default: boolean }) => Promise<boolean>;

/** Ask before cancelling unless --yes was given. */
export async function confirmCancel(
  record: JobRecord,
  options: CancelOptions,
  ask: Ask = confirm,
): Promise<boolean> {
  if (options.yes) return true;
  if (options.json) {
    throw new ConfigError("--json cannot prompt; pass --yes to cancel");
  }
  return ask({
    message: `Cancel ${record.localId} "${record.name}" (Slurm job ${record.schedulerJobId})${options.force ? " with SIGKILL" : ""}?`,
    default: false,
  });
}

async function runCancel(jobId: string, options: CancelOptions) {
  const store = new JobRecordStore();
  const target = store.resolve(jobId);

  if (!(await confirmCancel(target, options))) {
    console.log(theme.muted("Nothing cancelled."));
    return;
  }

  const reconciler = new StatusReconciler(store);
  const spinner = options.json
    ? null
    : ora(`Cancelling ${target.localId}...`).start();

  const record = await reconciler
    .cancel(target.localId, { force: options.force })
    .catch((error: unknown) => {
      spinner?.fail("Cancel failed");
      throw error;
    });

  if (options.json) {
    console.log(JSON.stringify({ record }, null, 2));
    return;
  }

  spinner?.succeed(
    `Cancelled ${theme.emphasis(record.localId)} (Slurm job ${record.schedulerJobId})`,
  );
  console.log(
    theme.muted("\n  Confirm with ") +
      formatCommand(`myjob status ${record.localId}`),
  );
}
