// --------------- Configuration ---------------

export interface ConnectionConfig {
  host: string;
  port: number;
  user?: string;
  key_file?: string;
}

export interface SlurmOptions {
  partition?: string;
  account?: string;
  qos?: string;
  constraint?: string;
  array?: string;
  dependency?: string;
  /** Passed through as `#SBATCH <option>`, in order. */
  extra_options: string[];
}

export interface ResourceRequest {
  nodes: number;
  cpus_per_task: number;
  /** Canonical megabyte form, e.g. "4096M". */
  memory: string;
  gpus: number;
  gpu_type?: string;
  time: string;
}

export interface GitSelector {
  repo_url?: string;
  branch?: string;
  commit?: string;
}

export interface ExecutionSpec {
  command?: string;
  script?: string;
  working_dir?: string;
  env_vars: Record<string, string>;
  modules: string[];
  setup?: string;
  teardown?: string;
}

export interface OutputSpec {
  stdout: string;
  stderr: string;
  fetch: string[];
  cleanup: boolean;
}

export interface ResolvedConfig {
  name: string;
  tags: string[];
  connection: ConnectionConfig;
  slurm: SlurmOptions;
  resources: ResourceRequest;
  git: GitSelector;
  execution: ExecutionSpec;
  output: OutputSpec;
}

// --------------- Remote environment ---------------

export interface RemoteEnvironmentInfo {
  schedulerVersion: string;
  homeDir: string;
  workspaceBase: string;
  partitions: string[];
}

// --------------- Code version ---------------

export interface CodeVersion {
  repoUrl: string;
  branch: string;
  commit: string;
  message: string;
  dirty: boolean;
}

// --------------- Jobs ---------------

/** Normalized lifecycle state. */
export type JobState =
  | "PENDING"
  | "RUNNING"
  | "COMPLETED"
  | "FAILED"
  | "CANCELLED"
  | "TIMEOUT"
  | "UNKNOWN";

export type StatusSource = "squeue" | "sacct" | "none";

export interface JobStatus {
  state: JobState;
  /** Scheduler's elapsed time string, "" when unknown. */
  elapsed: string;
  node?: string;
  reason?: string;
  exitCode?: number;
  /** State string as the scheduler reported it. */
  rawState?: string;
  source: StatusSource;
}

export interface JobRecord {
  localId: string;
  schedulerJobId: string;
  name: string;
  host: string;
  workspace: string;
  codeVersion: CodeVersion;
  status: JobState;
  submittedAt: string;
  updatedAt: string;
  config: ResolvedConfig;
}

// --------------- Nodes ---------------

export type NodeHealth =
  | "idle"
  | "mixed"
  | "allocated"
  | "draining"
  | "drained"
  | "down"
  | "unknown";

export interface GpuSnapshot {
  type: string;
  total: number;
  used: number;
  free: number;
}

export interface NodeSnapshot {
  name: string;
  state: NodeHealth;
  partition: string;
  cpuUsed: number;
  cpuTotal: number;
  memoryTotalMB: number;
  gpu?: GpuSnapshot;
}

export interface InventorySummary {
  nodes: number;
  byState: Partial<Record<NodeHealth, number>>;
  gpus: Record<string, { total: number; free: number }>;
}
