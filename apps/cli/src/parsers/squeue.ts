/** One row of `squeue -h -j <id> -o "%T|%M|%N|%r"`. */
export interface QueueEntry {
  state: string;
  elapsed: string;
  node?: string;
  reason?: string;
}

function optionalField(value: string | undefined): string | undefined {
  const trimmed = (value ?? "").trim();
  if (!trimmed || trimmed === "None" || trimmed === "(null)") return undefined;
  return trimmed;
}

/**
 * Parse the first usable line of squeue output. Returns null when the job
 * is no longer in the live queue (empty output) or the line is malformed.
 *
 * Pipe-delimited so an empty NODELIST for pending jobs does not shift the
 * remaining columns.
 */
export function parseQueueEntry(output: string): QueueEntry | null {
  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    const parts = trimmed.split("|");
    if (parts.length < 4) continue;

    const [state, elapsed, node, reason] = parts;
    if (!state?.trim()) continue;

    return {
      state: state.trim(),
      elapsed: (elapsed ?? "").trim(),
      node: optionalField(node),
      reason: optionalField(reason),
    };
  }
  return null;
}
