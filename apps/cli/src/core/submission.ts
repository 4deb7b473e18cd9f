import type { ResolvedConfig } from "@myjob/shared";
import { PATHS } from "@myjob/shared";
import type { RemoteSession } from "./session.ts";
import { renderJobScript } from "@/templates/job-script.ts";
import { renderEnvScript } from "@/templates/env-script.ts";
import { parseSubmittedJobId } from "@/parsers/sbatch.ts";
import { shellQuote } from "@/lib/shell-quote.ts";
import { RemoteCommandError, SubmitError } from "@/lib/errors.ts";

export interface RenderedScripts {
  jobScript: string;
  envScript: string;
}

export function renderScripts(
  config: ResolvedConfig,
  workspace: string,
): RenderedScripts {
  return {
    jobScript: renderJobScript(config, workspace),
    envScript: renderEnvScript(config.execution.env_vars),
  };
}

/**
 * Upload job.sh and env.sh into the workspace and hand job.sh to sbatch.
 * On failure the uploaded scripts are left in place for debugging.
 */
export async function submitJob(
  session: RemoteSession,
  config: ResolvedConfig,
  workspace: string,
): Promise<string> {
  const scripts = renderScripts(config, workspace);
  const jobPath = PATHS.jobScript(workspace);
  const envPath = PATHS.envScript(workspace);

  await session.runChecked(
    `mkdir -p ${shellQuote(PATHS.logs(workspace))}`,
    "submit",
  );
  await session.writeFile(jobPath, scripts.jobScript);
  await session.writeFile(envPath, scripts.envScript);

  const command = `cd ${shellQuote(workspace)} && chmod +x job.sh && sbatch job.sh`;
  const result = await session.run(command);
  if (result.exitCode !== 0) {
    throw new SubmitError(
      `sbatch rejected the job (exit ${result.exitCode}): ${result.stderr.trim() || result.stdout.trim()}\nScripts kept at ${jobPath}`,
    );
  }

  const jobId = parseSubmittedJobId(result.stdout);
  if (!jobId) {
    throw new SubmitError(
      `Unexpected sbatch output: "${result.stdout.trim()}"\nScripts kept at ${jobPath}`,
    );
  }
  return jobId;
}

/** `scancel <id>`, or SIGKILL to every step when forced. */
export async function cancelJob(
  session: RemoteSession,
  schedulerJobId: string,
  options: { force?: boolean } = {},
): Promise<void> {
  const command = options.force
    ? `scancel --signal=KILL --full ${shellQuote(schedulerJobId)}`
    : `scancel ${shellQuote(schedulerJobId)}`;
  const result = await session.run(command);
  if (result.exitCode !== 0) {
    throw new RemoteCommandError(
      command,
      result.exitCode,
      result.stderr.trim(),
      "cancel",
    );
  }
}
