import type { Command } from "commander";
import ora from "ora";
import { resolve } from "path";
import type { JobRecord, JobStatus } from "@myjob/shared";
import { JobRecordStore } from "@/core/job-store.ts";
import { StatusReconciler } from "@/core/status.ts";
import { reportError, formatAge } from "@/lib/report.ts";
import { OUTPUTS_DIR } from "@/lib/constants.ts";
import { formatDetail, stateColor, theme } from "@/lib/theme.ts";

interface StatusOptions {
  fetch?: boolean;
  to?: string;
  json?: boolean;
}

export function registerStatusCommand(program: Command) {
  program
    .command("status")
    .description("Show the scheduler's view of a job")
    .argument("<jobId>", "local id, unique prefix, or Slurm job id")
    .option("--fetch", "download output.fetch paths once the job has finished")
    .option("--to <dir>", "directory for fetched outputs", OUTPUTS_DIR)
    .option("--json", "output as JSON")
    .action(async (jobId: string, options: StatusOptions) => {
      try {
        await runStatus(jobId, options);
      } catch (error) {
        reportError(error, { json: options.json });
      }
    });
}

function printStatus(record: JobRecord, status: JobStatus) {
  const color = stateColor(status.state);
  console.log(
    `\n  ${theme.emphasis(record.localId)}  ${record.name}  ${color(status.state)}` +
      (status.rawState && status.rawState !== status.state
        ? theme.muted(` (${status.rawState})`)
        : ""),
  );
  console.log(formatDetail("Slurm job", record.schedulerJobId));
  console.log(formatDetail("Host", record.host));
  if (status.elapsed) console.log(formatDetail("Elapsed", status.elapsed));
  if (status.node) console.log(formatDetail("Node", status.node));
  if (status.reason) console.log(formatDetail("Reason", status.reason));
  if (status.exitCode !== undefined) {
    console.log(formatDetail("Exit code", String(status.exitCode)));
  }
  console.log(
    formatDetail(
      "Code",
      `${record.codeVersion.branch}@${record.codeVersion.commit.slice(0, 8)} ${record.codeVersion.message}`.trimEnd(),
    ),
  );
  console.log(formatDetail("Workspace", record.workspace));
  console.log(formatDetail("Submitted", formatAge(record.submittedAt)));
  if (status.source === "none") {
    console.log(
      theme.warning(
        "  Neither squeue nor sacct knows this job; it may have aged out of accounting.",
      ),
    );
  }
}

async function runStatus(jobId: string, options: StatusOptions) {
  const reconciler = new StatusReconciler(new JobRecordStore());

  if (!options.fetch) {
    const spinner = options.json ? null : ora("Querying scheduler...").start();
    const { record, status } = await reconciler
      .getStatus(jobId)
      .finally(() => spinner?.stop());
    if (options.json) {
      console.log(JSON.stringify({ record, status }, null, 2));
    } else {
      printStatus(record, status);
    }
    return;
  }

  const targetDir = resolve(options.to ?? OUTPUTS_DIR);
  const spinner = options.json ? null : ora("Fetching outputs...").start();
  const { record, status, fetched, cleaned } = await reconciler
    .fetchOutputs(jobId, targetDir)
    .finally(() => spinner?.stop());

  if (options.json) {
    console.log(JSON.stringify({ record, status, fetched, cleaned }, null, 2));
    return;
  }

  printStatus(record, status);
  console.log(theme.info("\n  Outputs:"));
  if (fetched.length === 0) {
    console.log(theme.muted("  output.fetch is empty; nothing to download."));
  }
  for (const result of fetched) {
    if (result.error) {
      console.log(theme.error(`  ✗ ${result.remotePath}: ${result.error}`));
    } else {
      console.log(
        theme.success(`  ✓ ${result.remotePath}`) +
          theme.muted(` -> ${result.localPath}`),
      );
    }
  }
  if (cleaned) {
    console.log(
      theme.muted(`\n  Removed remote workspace ${record.workspace}`),
    );
  }
}
