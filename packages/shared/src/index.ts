export { TERMINAL_STATES, PATHS } from "./constants.ts";
export type {
  ConnectionConfig,
  SlurmOptions,
  ResourceRequest,
  GitSelector,
  ExecutionSpec,
  OutputSpec,
  ResolvedConfig,
  RemoteEnvironmentInfo,
  CodeVersion,
  JobState,
  StatusSource,
  JobStatus,
  JobRecord,
  NodeHealth,
  GpuSnapshot,
  NodeSnapshot,
  InventorySummary,
} from "./types.ts";
