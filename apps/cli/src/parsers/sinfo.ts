import type { NodeHealth } from "@myjob/shared";

const STATE_MAP: Record<string, NodeHealth> = {
  IDLE: "idle",
  MIXED: "mixed",
  ALLOCATED: "allocated",
  DRAINING: "draining",
  DRAINED: "drained",
  DRAIN: "drained",
  DOWN: "down",
  COMPLETING: "allocated",
  PLANNED: "allocated",
  INVAL: "down",
  RESERVED: "allocated",
  FAIL: "down",
  FAILING: "draining",
};

export function mapNodeState(raw: string): NodeHealth {
  // Strip suffixes like *, ~, #, $, @, - and compound states ("IDLE+DRAIN")
  const cleaned = raw.replace(/[*~#$@!%^-]+$/, "").toUpperCase();
  const [primary, ...flags] = cleaned.split("+");
  if (flags.includes("DRAIN")) return "drained";
  return STATE_MAP[primary ?? ""] ?? "unknown";
}

function parseCpus(cpuStr: string): { used: number; total: number } {
  // Format: A/I/O/T (allocated/idle/other/total)
  const parts = cpuStr.split("/");
  if (parts.length === 4) {
    return {
      used: Number(parts[0]) || 0,
      total: Number(parts[3]) || 0,
    };
  }
  return { used: 0, total: 0 };
}

export interface NodeRow {
  name: string;
  partition: string;
  state: NodeHealth;
  cpuUsed: number;
  cpuTotal: number;
  memoryTotalMB: number;
}

/**
 * Parse node-oriented sinfo output.
 * Expected format: `sinfo -N -h -o "%N|%P|%T|%C|%m"`
 * Fields: NODELIST|PARTITION|STATE|CPUS(A/I/O/T)|MEMORY
 *
 *   gpu-node-01|gpu*|mixed|16/48/0/64|515000
 *
 * A node in several partitions is listed once per partition; rows are
 * keyed by node name and its partitions joined with ",".
 */
export function parseNodeRows(output: string): NodeRow[] {
  const byName = new Map<string, NodeRow>();

  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    const parts = trimmed.split("|").map((p) => p.trim());
    if (parts.length < 5) continue;

    const [name, partitionRaw, stateRaw, cpuStr, memStr] = parts;
    if (!name) continue;
    const partition = (partitionRaw ?? "").replace(/\*$/, "");

    const existing = byName.get(name);
    if (existing) {
      if (partition && !existing.partition.split(",").includes(partition)) {
        existing.partition = existing.partition
          ? `${existing.partition},${partition}`
          : partition;
      }
      continue;
    }

    const cpus = parseCpus(cpuStr ?? "");
    byName.set(name, {
      name,
      partition,
      state: mapNodeState(stateRaw ?? ""),
      cpuUsed: cpus.used,
      cpuTotal: cpus.total,
      memoryTotalMB: parseInt(memStr ?? "", 10) || 0,
    });
  }

  return [...byName.values()];
}
