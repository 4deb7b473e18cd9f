import type {
  GpuSnapshot,
  InventorySummary,
  NodeHealth,
  NodeSnapshot,
} from "@myjob/shared";
import type { RemoteSession } from "./session.ts";
import { parseNodeRows } from "@/parsers/sinfo.ts";
import { parseNodeGpu } from "@/parsers/scontrol.ts";
import { shellQuote } from "@/lib/shell-quote.ts";
import { SINFO_NODE_FORMAT } from "@/lib/constants.ts";
import { RemoteCommandError } from "@/lib/errors.ts";

const UNAVAILABLE: ReadonlySet<NodeHealth> = new Set([
  "down",
  "drained",
  "draining",
]);

async function queryNodeGpu(
  session: RemoteSession,
  node: string,
): Promise<GpuSnapshot | undefined> {
  const result = await session.run(`scontrol show node ${shellQuote(node)}`);
  // A failed query costs this node its GPU data, nothing more.
  if (result.exitCode !== 0) return undefined;
  return parseNodeGpu(result.stdout) ?? undefined;
}

/**
 * One sinfo listing for the base inventory, then one `scontrol show node`
 * per node for GPU detail. Detail queries are issued together and merged
 * back by node name.
 */
export async function listNodes(
  session: RemoteSession,
  options: { partition?: string } = {},
): Promise<NodeSnapshot[]> {
  const partitionArg = options.partition
    ? ` -p ${shellQuote(options.partition)}`
    : "";
  const command = `sinfo -N -h -o '${SINFO_NODE_FORMAT}'${partitionArg}`;
  const result = await session.run(command);
  if (result.exitCode !== 0) {
    throw new RemoteCommandError(
      command,
      result.exitCode,
      result.stderr.trim(),
      "nodes",
    );
  }

  const rows = parseNodeRows(result.stdout);
  const details = await Promise.all(
    rows.map(
      async (row) => [row.name, await queryNodeGpu(session, row.name)] as const,
    ),
  );
  const gpuByName = new Map(details);

  return rows.map((row) => {
    const gpu = gpuByName.get(row.name);
    return gpu ? { ...row, gpu } : { ...row };
  });
}

export interface AvailabilityFilter {
  minGpus?: number;
  gpuType?: string;
}

/** Nodes that could take work now: not down or draining, enough free GPUs. */
export function filterAvailable(
  nodes: NodeSnapshot[],
  filter: AvailabilityFilter = {},
): NodeSnapshot[] {
  const minGpus = filter.minGpus ?? 0;
  return nodes.filter((node) => {
    if (UNAVAILABLE.has(node.state) || node.state === "unknown") return false;
    if (filter.gpuType && node.gpu?.type !== filter.gpuType) return false;
    if (minGpus > 0 && (node.gpu?.free ?? 0) < minGpus) return false;
    if (minGpus === 0 && !filter.gpuType) return node.cpuUsed < node.cpuTotal;
    return true;
  });
}

export function summarizeInventory(nodes: NodeSnapshot[]): InventorySummary {
  const summary: InventorySummary = {
    nodes: nodes.length,
    byState: {},
    gpus: {},
  };
  for (const node of nodes) {
    summary.byState[node.state] = (summary.byState[node.state] ?? 0) + 1;
    if (!node.gpu) continue;
    const bucket = summary.gpus[node.gpu.type] ?? { total: 0, free: 0 };
    bucket.total += node.gpu.total;
    if (!UNAVAILABLE.has(node.state)) bucket.free += node.gpu.free;
    summary.gpus[node.gpu.type] = bucket;
  }
  return summary;
}
