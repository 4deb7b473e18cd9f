import type { ResolvedConfig } from "@myjob/shared";
import { PATHS } from "@myjob/shared";
import { shellQuote } from "@/lib/shell-quote.ts";

/** Exit code of the main command, preserved across the teardown hook. */
const EXIT_VAR = "_myjob_exit";

/** Anchor a relative output template at the workspace. */
export function resolveOutputPath(template: string, workspace: string): string {
  if (template.startsWith("/")) return template;
  return `${workspace}/${template.replace(/^\.\//, "")}`;
}

/** `gpu:<type>:<n>`, `gpu:<n>`, or null when no GPUs are requested. */
export function formatGres(gpus: number, gpuType?: string): string | null {
  if (gpus <= 0) return null;
  return gpuType ? `gpu:${gpuType}:${gpus}` : `gpu:${gpus}`;
}

/**
 * SBATCH directives in a fixed order: name, nodes, cpus, memory, time,
 * gres, partition, account, qos, constraint, array, dependency, output
 * paths, then extra options verbatim.
 */
export function renderDirectives(
  config: ResolvedConfig,
  workspace: string,
): string[] {
  const { resources, slurm, output } = config;
  const lines: string[] = [];

  lines.push(`#SBATCH --job-name=${config.name}`);
  lines.push(`#SBATCH --nodes=${resources.nodes}`);
  lines.push(`#SBATCH --cpus-per-task=${resources.cpus_per_task}`);
  lines.push(`#SBATCH --mem=${resources.memory}`);
  lines.push(`#SBATCH --time=${resources.time}`);

  const gres = formatGres(resources.gpus, resources.gpu_type);
  if (gres) lines.push(`#SBATCH --gres=${gres}`);

  if (slurm.partition) lines.push(`#SBATCH --partition=${slurm.partition}`);
  if (slurm.account) lines.push(`#SBATCH --account=${slurm.account}`);
  if (slurm.qos) lines.push(`#SBATCH --qos=${slurm.qos}`);
  if (slurm.constraint) lines.push(`#SBATCH --constraint=${slurm.constraint}`);
  if (slurm.array) lines.push(`#SBATCH --array=${slurm.array}`);
  if (slurm.dependency) lines.push(`#SBATCH --dependency=${slurm.dependency}`);

  lines.push(`#SBATCH --output=${resolveOutputPath(output.stdout, workspace)}`);
  lines.push(`#SBATCH --error=${resolveOutputPath(output.stderr, workspace)}`);

  for (const option of slurm.extra_options) {
    lines.push(`#SBATCH ${option.trim()}`);
  }

  return lines;
}

/**
 * Render the batch script. Pure: the same config and workspace always
 * produce byte-identical text.
 */
export function renderJobScript(
  config: ResolvedConfig,
  workspace: string,
): string {
  const { execution } = config;
  const lines: string[] = ["#!/bin/bash"];

  lines.push(...renderDirectives(config, workspace));
  lines.push("");

  lines.push(`cd ${shellQuote(workspace)} || exit 1`);
  lines.push(`source ${shellQuote(PATHS.envScript(workspace))}`);

  if (execution.modules.length > 0) {
    lines.push(`module load ${execution.modules.map(shellQuote).join(" ")}`);
  }

  if (execution.working_dir) {
    lines.push(`cd ${shellQuote(execution.working_dir)} || exit 1`);
  }
  lines.push("");

  if (execution.setup) {
    lines.push(`# Setup`);
    lines.push(execution.setup);
    lines.push("");
  }

  lines.push(`# Run`);
  if (execution.script) {
    lines.push(`bash ${shellQuote(execution.script)}`);
  } else if (execution.command) {
    lines.push(execution.command);
  }
  lines.push(`${EXIT_VAR}=$?`);
  lines.push("");

  if (execution.teardown) {
    lines.push(`# Teardown`);
    lines.push(execution.teardown);
    lines.push("");
  }

  lines.push(`exit $${EXIT_VAR}`);
  return lines.join("\n") + "\n";
}
