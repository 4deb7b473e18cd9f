import type { Command } from "commander";
import ora from "ora";
import type { NodeSnapshot } from "@myjob/shared";
import { resolveConnection } from "@/core/config.ts";
import { LocalSession } from "@/core/local-session.ts";
import { createSshSession } from "@/core/ssh.ts";
import {
  filterAvailable,
  listNodes,
  summarizeInventory,
} from "@/core/nodes.ts";
import { withOpenSession } from "@/lib/setup.ts";
import { reportError } from "@/lib/report.ts";
import { renderTable } from "@/lib/table.ts";
import { ConfigError } from "@/lib/errors.ts";
import { formatSectionHeader, theme } from "@/lib/theme.ts";

interface NodesOptions {
  config?: string;
  host?: string;
  user?: string;
  local?: boolean;
  partition?: string;
  available?: boolean;
  minGpus?: string;
  gpuType?: string;
  json?: boolean;
}

export function registerNodesCommand(program: Command) {
  program
    .command("nodes")
    .description("Show cluster nodes with CPU, memory and GPU usage")
    .option("-c, --config <path>", "project config file")
    .option("-H, --host <host>", "cluster login host (overrides config)")
    .option("-u, --user <user>", "ssh user (overrides config)")
    .option("-l, --local", "query the scheduler on this machine, without ssh")
    .option("-p, --partition <name>", "only nodes in this partition")
    .option("-a, --available", "only nodes that can take work now")
    .option("--min-gpus <n>", "with --available: at least n free GPUs")
    .option("--gpu-type <type>", "with --available: only this GPU type")
    .option("--json", "output as JSON")
    .action(async (options: NodesOptions) => {
      try {
        await runNodes(options);
      } catch (error) {
        reportError(error, { json: options.json });
      }
    });
}

function parseMinGpus(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigError(
      `--min-gpus must be a non-negative integer, got "${value}"`,
    );
  }
  return n;
}

function formatGpu(node: NodeSnapshot): string {
  if (!node.gpu) return theme.muted("-");
  const text = `${node.gpu.type} ${node.gpu.free}/${node.gpu.total} free`;
  return node.gpu.free > 0 ? theme.success(text) : text;
}

function formatState(node: NodeSnapshot): string {
  switch (node.state) {
    case "idle":
      return theme.success(node.state);
    case "mixed":
    case "allocated":
      return theme.warning(node.state);
    case "down":
    case "drained":
    case "draining":
      return theme.error(node.state);
    default:
      return theme.muted(node.state);
  }
}

async function runNodes(options: NodesOptions) {
  const minGpus = parseMinGpus(options.minGpus);
  const session = options.local
    ? new LocalSession()
    : createSshSession(
        resolveConnection({
          configPath: options.config,
          overrides: { connection: { host: options.host, user: options.user } },
        }),
      );

  const spinner = options.json
    ? null
    : ora(`Querying nodes on ${session.host}...`).start();
  const all = await withOpenSession(session, (s) =>
    listNodes(s, { partition: options.partition }),
  ).finally(() => spinner?.stop());

  const nodes = options.available
    ? filterAvailable(all, { minGpus, gpuType: options.gpuType })
    : all;
  const summary = summarizeInventory(nodes);

  if (options.json) {
    console.log(JSON.stringify({ nodes, summary }, null, 2));
    return;
  }

  if (nodes.length === 0) {
    console.log(theme.muted("\nNo matching nodes."));
    return;
  }

  console.log();
  renderTable<NodeSnapshot>(
    [
      { header: "NODE", cell: (n) => n.name },
      { header: "PARTITION", cell: (n) => n.partition },
      { header: "STATE", cell: formatState },
      {
        header: "CPUS",
        cell: (n) => `${n.cpuUsed}/${n.cpuTotal}`,
        align: "right",
      },
      {
        header: "MEMORY",
        cell: (n) => `${Math.round(n.memoryTotalMB / 1024)}G`,
        align: "right",
      },
      { header: "GPUS", cell: formatGpu },
    ],
    nodes,
  );

  console.log(formatSectionHeader("Summary"));
  const states = Object.entries(summary.byState)
    .map(([state, count]) => `${count} ${state}`)
    .join(", ");
  console.log(theme.muted(`  ${summary.nodes} nodes: ${states}`));
  for (const [type, gpus] of Object.entries(summary.gpus)) {
    console.log(theme.muted(`  ${type}: ${gpus.free}/${gpus.total} free`));
  }
}
