import type { JobState } from "./types.ts";

/** States after which the scheduler will not change the job again. */
export const TERMINAL_STATES = new Set<JobState>([
  "COMPLETED",
  "FAILED",
  "CANCELLED",
  "TIMEOUT",
]);

/** Remote layout, relative to the login user's home directory. */
export const PATHS = {
  workspaces: (home: string) => `${home}/.myjob/workspaces`,
  workspace: (home: string, localId: string) =>
    `${home}/.myjob/workspaces/${localId}`,
  jobScript: (workspace: string) => `${workspace}/job.sh`,
  envScript: (workspace: string) => `${workspace}/env.sh`,
  logs: (workspace: string) => `${workspace}/logs`,
} as const;
