import type { GpuSnapshot } from "@myjob/shared";

export interface GresSpec {
  type: string;
  total: number;
}

/**
 * Parse a generic-resource string. Total: never throws.
 *
 *   gpu:a100:4            -> { type: "a100", total: 4 }
 *   gpu:4                 -> { type: "gpu", total: 4 }
 *   gpu:a100:4(IDX:0-3)   -> { type: "a100", total: 4 }
 *   "" / (null) / junk    -> { type: "unknown", total: 0 }
 *
 * Lists such as "gpu:a100:4(S:0-1),shard:8" use the first gpu entry.
 */
export function parseGres(spec: string): GresSpec {
  const cleaned = spec.replace(/\([^)]*\)/g, "").trim();

  for (const entry of cleaned.split(",")) {
    const parts = entry.trim().split(":");
    if (parts[0] !== "gpu") continue;

    if (parts.length === 3 && parts[1] && /^\d+$/.test(parts[2] ?? "")) {
      return { type: parts[1], total: Number(parts[2]) };
    }
    if (parts.length === 2 && /^\d+$/.test(parts[1] ?? "")) {
      return { type: "gpu", total: Number(parts[1]) };
    }
  }

  return { type: "unknown", total: 0 };
}

function readField(output: string, key: string): string | undefined {
  const match = output.match(new RegExp(`(?:^|\\s)${key}=(\\S*)`));
  return match?.[1];
}

/**
 * GPU occupancy from `scontrol show node <name>`, which prints
 * `Key=Value` tokens such as `Gres=gpu:a100:4(S:0-1)` and
 * `GresUsed=gpu:a100:2(IDX:0-1)`. Returns null when the node has no GPUs.
 */
export function parseNodeGpu(output: string): GpuSnapshot | null {
  const gres = readField(output, "Gres");
  if (gres === undefined) return null;

  const total = parseGres(gres);
  if (total.total === 0) return null;

  const used = parseGres(readField(output, "GresUsed") ?? "").total;
  return {
    type: total.type,
    total: total.total,
    used,
    free: Math.max(0, total.total - used),
  };
}
