import type { JobState } from "@myjob/shared";

const STATE_MAP: Record<string, JobState> = {
  PENDING: "PENDING",
  CONFIGURING: "PENDING",
  REQUEUED: "PENDING",
  REQUEUE_FED: "PENDING",
  REQUEUE_HOLD: "PENDING",
  RESV_DEL_HOLD: "PENDING",
  RUNNING: "RUNNING",
  COMPLETING: "RUNNING",
  SUSPENDED: "RUNNING",
  STOPPED: "RUNNING",
  SIGNALING: "RUNNING",
  STAGE_OUT: "RUNNING",
  RESIZING: "RUNNING",
  COMPLETED: "COMPLETED",
  FAILED: "FAILED",
  NODE_FAIL: "FAILED",
  BOOT_FAIL: "FAILED",
  OUT_OF_MEMORY: "FAILED",
  PREEMPTED: "FAILED",
  SPECIAL_EXIT: "FAILED",
  REVOKED: "FAILED",
  CANCELLED: "CANCELLED",
  TIMEOUT: "TIMEOUT",
  DEADLINE: "TIMEOUT",
};

/**
 * Map a raw Slurm state onto the normalized set. Accepts the long names
 * squeue %T and sacct print, including sacct's "CANCELLED by 1234" and
 * trailing "+" markers.
 */
export function normalizeJobState(raw: string): JobState {
  const head = raw.trim().split(/\s+/)[0] ?? "";
  const cleaned = head.replace(/\+$/, "").toUpperCase();
  return STATE_MAP[cleaned] ?? "UNKNOWN";
}
