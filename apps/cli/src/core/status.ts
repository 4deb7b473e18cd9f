import type { JobRecord, JobStatus } from "@myjob/shared";
import { TERMINAL_STATES } from "@myjob/shared";
import type { RemoteSession, SessionFactory } from "./session.ts";
import type { JobRecordStore } from "./job-store.ts";
import { createSshSession } from "./ssh.ts";
import { cancelJob } from "./submission.ts";
import {
  cleanupWorkspace,
  collectOutputs,
  type FetchResult,
} from "./artifacts.ts";
import { parseQueueEntry } from "@/parsers/squeue.ts";
import { parseAccountingEntry } from "@/parsers/sacct.ts";
import { normalizeJobState } from "@/parsers/job-state.ts";
import { withSession } from "@/lib/setup.ts";
import { shellQuote } from "@/lib/shell-quote.ts";
import { SACCT_FIELDS, SQUEUE_FORMAT } from "@/lib/constants.ts";
import { MyjobError } from "@/lib/errors.ts";

const UNKNOWN_STATUS: JobStatus = {
  state: "UNKNOWN",
  elapsed: "",
  source: "none",
};

/**
 * Ask the live queue first, then accounting. A job neither knows about
 * (or output neither parser accepts) is UNKNOWN, not an error.
 */
export async function queryJobStatus(
  session: RemoteSession,
  schedulerJobId: string,
): Promise<JobStatus> {
  const id = shellQuote(schedulerJobId);

  const queue = await session.run(`squeue -h -j ${id} -o '${SQUEUE_FORMAT}'`);
  if (queue.exitCode === 0) {
    const entry = parseQueueEntry(queue.stdout);
    if (entry) {
      return {
        state: normalizeJobState(entry.state),
        elapsed: entry.elapsed,
        node: entry.node,
        reason: entry.reason,
        rawState: entry.state,
        source: "squeue",
      };
    }
  }

  const history = await session.run(
    `sacct -n -X -P -j ${id} -o ${SACCT_FIELDS}`,
  );
  if (history.exitCode === 0) {
    const entry = parseAccountingEntry(history.stdout);
    if (entry) {
      return {
        state: normalizeJobState(entry.state),
        elapsed: entry.elapsed,
        exitCode: entry.exitCode,
        rawState: entry.state,
        source: "sacct",
      };
    }
  }

  return { ...UNKNOWN_STATUS };
}

export interface StatusResult {
  record: JobRecord;
  status: JobStatus;
}

export interface FetchOutcome extends StatusResult {
  fetched: FetchResult[];
  /** The remote workspace was removed (`output.cleanup`). */
  cleaned: boolean;
}

/**
 * Resolves local ids against the record store and reconciles the cached
 * status with what the scheduler reports. Records are always looked up
 * before any remote contact.
 */
export class StatusReconciler {
  constructor(
    private readonly store: JobRecordStore,
    private readonly openSession: SessionFactory = createSshSession,
  ) {}

  async getStatus(ref: string): Promise<StatusResult> {
    const record = this.store.resolve(ref);
    return withSession(
      record.config.connection,
      (session) => this.refresh(session, record),
      this.openSession,
    );
  }

  /**
   * Refresh, then download `output.fetch` into `localDir` and run the
   * opted-in cleanup, all over one session. Cleanup is skipped when any
   * download failed.
   */
  async fetchOutputs(ref: string, localDir: string): Promise<FetchOutcome> {
    const record = this.store.resolve(ref);
    return withSession(
      record.config.connection,
      async (session) => {
        const result = await this.refresh(session, record);
        if (!TERMINAL_STATES.has(result.record.status)) {
          throw new MyjobError(
            `Job ${record.localId} is ${result.status.state}; outputs can be fetched once it has finished.`,
            "JOB_NOT_FINISHED",
            "fetch",
          );
        }
        const fetched = await collectOutputs(session, result.record, localDir);
        const failed = fetched.some((r) => r.error !== undefined);
        const cleaned = failed
          ? false
          : await cleanupWorkspace(session, result.record);
        return { ...result, fetched, cleaned };
      },
      this.openSession,
    );
  }

  /** Query over an already-open session and update the cache if it moved. */
  async refresh(
    session: RemoteSession,
    record: JobRecord,
  ): Promise<StatusResult> {
    const status = await queryJobStatus(session, record.schedulerJobId);
    if (status.state === "UNKNOWN" || status.state === record.status) {
      return { record, status };
    }
    return {
      record: this.store.updateStatus(record.localId, status.state),
      status,
    };
  }

  /**
   * Cancel through the scheduler and mark the record CANCELLED. Does not
   * wait for, or depend on, a status query.
   */
  async cancel(
    ref: string,
    options: { force?: boolean } = {},
  ): Promise<JobRecord> {
    const record = this.store.resolve(ref);
    await withSession(
      record.config.connection,
      (session) => cancelJob(session, record.schedulerJobId, options),
      this.openSession,
    );
    return this.store.updateStatus(record.localId, "CANCELLED");
  }
}
