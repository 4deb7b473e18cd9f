import type {
  CodeVersion,
  JobRecord,
  JobStatus,
  RemoteEnvironmentInfo,
  ResolvedConfig,
} from "@myjob/shared";
import { PATHS } from "@myjob/shared";
import { resolveConfig, type ResolveOptions } from "./config.ts";
import type { CodeSynchronizer } from "./code-sync.ts";
import type { JobRecordStore } from "./job-store.ts";
import type { SessionFactory } from "./session.ts";
import { createSshSession } from "./ssh.ts";
import {
  renderScripts,
  submitJob,
  type RenderedScripts,
} from "./submission.ts";
import { StatusReconciler } from "./status.ts";
import { generateLocalId } from "./job-id.ts";
import { DirtyTreeWarning, MyjobError } from "@/lib/errors.ts";

export type PipelinePhase =
  | "config"
  | "sync"
  | "connect"
  | "environment"
  | "stage"
  | "submit"
  | "record"
  | "status";

export interface SubmitRequest {
  configOptions?: ResolveOptions;
  /** Submit the last commit even if the tree has uncommitted changes. */
  force?: boolean;
  onPhase?: (phase: PipelinePhase) => void;
}

export interface SubmitOutcome {
  record: JobRecord;
  status: JobStatus;
  environment: RemoteEnvironmentInfo;
  /** Set when the initial status query failed; the submission stands. */
  statusError?: string;
}

export interface DryRunOutcome {
  config: ResolvedConfig;
  codeVersion: CodeVersion;
  localId: string;
  workspace: string;
  scripts: RenderedScripts;
}

export interface PipelineDeps {
  store: JobRecordStore;
  sync: CodeSynchronizer;
  openSession?: SessionFactory;
  resolve?: (options: ResolveOptions) => ResolvedConfig;
  newId?: () => string;
  now?: () => Date;
}

/**
 * config -> dirty check -> connect -> environment -> stage -> submit ->
 * record -> initial status. Everything before `connect` is local, so a
 * bad config or a dirty tree never reaches the cluster.
 */
export class SubmitPipeline {
  private readonly store: JobRecordStore;
  private readonly sync: CodeSynchronizer;
  private readonly openSession: SessionFactory;
  private readonly resolve: (options: ResolveOptions) => ResolvedConfig;
  private readonly newId: () => string;
  private readonly now: () => Date;

  constructor(deps: PipelineDeps) {
    this.store = deps.store;
    this.sync = deps.sync;
    this.openSession = deps.openSession ?? createSshSession;
    this.resolve = deps.resolve ?? resolveConfig;
    this.newId = deps.newId ?? generateLocalId;
    this.now = deps.now ?? (() => new Date());
  }

  private allocateId(): string {
    for (let attempt = 0; attempt < 10; attempt++) {
      const id = this.newId();
      if (!this.store.exists(id)) return id;
    }
    throw new MyjobError(
      "Could not allocate an unused local job id",
      "ID_EXHAUSTED",
      "record",
    );
  }

  private async prepare(
    request: SubmitRequest,
  ): Promise<{ config: ResolvedConfig; codeVersion: CodeVersion }> {
    request.onPhase?.("config");
    const config = this.resolve(request.configOptions ?? {});

    request.onPhase?.("sync");
    if (!request.force && !(await this.sync.isClean())) {
      throw new DirtyTreeWarning(await this.sync.uncommittedChanges());
    }
    const codeVersion = await this.sync.capture(config.git);
    return { config, codeVersion };
  }

  /** Resolve and render only. Nothing leaves the machine. */
  async dryRun(request: SubmitRequest): Promise<DryRunOutcome> {
    const { config, codeVersion } = await this.prepare(request);
    const localId = this.allocateId();
    const workspace = PATHS.workspace("~", localId);
    return {
      config,
      codeVersion,
      localId,
      workspace,
      scripts: renderScripts(config, workspace),
    };
  }

  async submit(request: SubmitRequest): Promise<SubmitOutcome> {
    const { config, codeVersion } = await this.prepare(request);
    const localId = this.allocateId();
    const session = this.openSession(config.connection);

    try {
      request.onPhase?.("connect");
      await session.connect();

      request.onPhase?.("environment");
      const environment = await session.checkEnvironment();
      const workspace = PATHS.workspace(environment.homeDir, localId);

      request.onPhase?.("stage");
      await this.sync.stage(session, workspace, codeVersion);

      request.onPhase?.("submit");
      const schedulerJobId = await submitJob(session, config, workspace);

      request.onPhase?.("record");
      const timestamp = this.now().toISOString();
      const record: JobRecord = {
        localId,
        schedulerJobId,
        name: config.name,
        host: config.connection.host,
        workspace,
        codeVersion,
        status: "PENDING",
        submittedAt: timestamp,
        updatedAt: timestamp,
        config,
      };
      this.store.create(record);

      request.onPhase?.("status");
      const reconciler = new StatusReconciler(this.store, this.openSession);
      try {
        const refreshed = await reconciler.refresh(session, record);
        return { ...refreshed, environment };
      } catch (error) {
        if (!(error instanceof MyjobError)) throw error;
        return {
          record,
          status: { state: "UNKNOWN", elapsed: "", source: "none" },
          environment,
          statusError: error.message,
        };
      }
    } finally {
      await session.close();
    }
  }
}
