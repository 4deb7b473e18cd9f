import type { Command } from "commander";
import ora from "ora";
import { JobRecordStore } from "@/core/job-store.ts";
import { CodeSynchronizer } from "@/core/code-sync.ts";
import { LocalGit } from "@/core/git.ts";
import { configOverridesFromFlags, type OverrideFlags } from "@/core/config.ts";
import { SubmitPipeline, type PipelinePhase } from "@/core/pipeline.ts";
import { reportError } from "@/lib/report.ts";
import {
  formatCommand,
  formatDetail,
  formatSectionHeader,
  stateColor,
  theme,
} from "@/lib/theme.ts";

interface SubmitOptions extends OverrideFlags {
  config?: string;
  force?: boolean;
  dryRun?: boolean;
  json?: boolean;
}

const PHASE_TEXT: Record<PipelinePhase, string> = {
  config: "Resolving configuration...",
  sync: "Checking working tree...",
  connect: "Connecting...",
  environment: "Checking remote environment...",
  stage: "Staging code on the cluster...",
  submit: "Submitting job...",
  record: "Saving job record...",
  status: "Querying initial status...",
};

export function registerSubmitCommand(program: Command) {
  program
    .command("submit")
    .description("Stage the current commit on the cluster and submit it")
    .option("-c, --config <path>", "project config (default: ./myjob.yaml)")
    .option("-f, --force", "submit even if the working tree is dirty")
    .option("--dry-run", "print the rendered scripts without submitting")
    .option("-H, --host <host>", "cluster login host (overrides config)")
    .option("-u, --user <user>", "ssh user (overrides config)")
    .option("--name <name>", "job name")
    .option("-p, --partition <partition>", "Slurm partition")
    .option("-A, --account <account>", "Slurm account")
    .option("--qos <qos>", "Slurm QOS")
    .option("-t, --time <time>", "wall time, e.g. 2:00:00")
    .option("--memory <memory>", "memory, e.g. 32G")
    .option("-N, --nodes <n>", "node count")
    .option("--cpus <n>", "CPUs per task")
    .option("-g, --gpus <n>", "GPU count")
    .option("--gpu-type <type>", "GPU type, e.g. a100")
    .option("--command <command>", "command to run (replaces execution.script)")
    .option("--script <path>", "script to run (replaces execution.command)")
    .option("--branch <branch>", "branch to clone")
    .option("--commit <hash>", "commit to check out")
    .option("--json", "output as JSON")
    .action(async (options: SubmitOptions) => {
      try {
        await runSubmit(options);
      } catch (error) {
        reportError(error, { json: options.json });
      }
    });
}

async function runSubmit(options: SubmitOptions) {
  const pipeline = new SubmitPipeline({
    store: new JobRecordStore(),
    sync: new CodeSynchronizer(new LocalGit(process.cwd())),
  });
  const spinner = options.json ? null : ora().start();
  const request = {
    configOptions: {
      configPath: options.config,
      overrides: configOverridesFromFlags(options),
    },
    force: options.force,
    onPhase: (phase: PipelinePhase) => {
      if (spinner) spinner.text = PHASE_TEXT[phase];
    },
  };

  if (options.dryRun) {
    const outcome = await pipeline
      .dryRun(request)
      .finally(() => spinner?.stop());
    if (options.json) {
      console.log(JSON.stringify(outcome, null, 2));
      return;
    }
    console.log(formatSectionHeader("job.sh"));
    console.log(outcome.scripts.jobScript);
    console.log(formatSectionHeader("env.sh"));
    console.log(outcome.scripts.envScript);
    console.log(
      theme.muted(
        `Dry run: ${outcome.codeVersion.branch}@${outcome.codeVersion.commit.slice(0, 8)}, nothing submitted.`,
      ),
    );
    return;
  }

  const outcome = await pipeline.submit(request).catch((error: unknown) => {
    spinner?.fail("Submission failed");
    throw error;
  });

  const { record, status } = outcome;
  if (options.json) {
    console.log(JSON.stringify({ record, status }, null, 2));
    return;
  }

  spinner?.succeed(
    `Submitted ${theme.emphasis(record.localId)} (Slurm job ${record.schedulerJobId})`,
  );
  console.log(formatDetail("Name", record.name));
  console.log(formatDetail("Host", record.host));
  console.log(
    formatDetail(
      "Code",
      `${record.codeVersion.branch}@${record.codeVersion.commit.slice(0, 8)}${record.codeVersion.dirty ? " (uncommitted changes not included)" : ""}`,
    ),
  );
  console.log(formatDetail("Workspace", record.workspace));
  console.log(formatDetail("Status", stateColor(status.state)(status.state)));
  if (outcome.statusError) {
    console.log(theme.warning(`  Status query failed: ${outcome.statusError}`));
  }

  console.log(formatSectionHeader("Next"));
  console.log(formatCommand(`myjob status ${record.localId}`));
  console.log(formatCommand(`myjob logs ${record.localId} -f`));
}
