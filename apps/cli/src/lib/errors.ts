/** Step a failure belongs to; printed with the message. */
export type Phase =
  | "config"
  | "connect"
  | "environment"
  | "sync"
  | "submit"
  | "record"
  | "status"
  | "cancel"
  | "logs"
  | "fetch"
  | "nodes";

export class MyjobError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly phase: Phase,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends MyjobError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR", "config");
  }
}

export class ConnectionError extends MyjobError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONNECTION_ERROR", "connect", { cause });
  }
}

export class EnvironmentError extends MyjobError {
  constructor(message: string) {
    super(message, "ENVIRONMENT_ERROR", "environment");
  }
}

export class DirtyTreeWarning extends MyjobError {
  constructor(public readonly changes: string[]) {
    super(
      `Working tree has ${changes.length} uncommitted change(s). Commit them or pass --force to submit the last commit.`,
      "DIRTY_TREE",
      "sync",
    );
  }
}

export class SyncError extends MyjobError {
  constructor(message: string) {
    super(message, "SYNC_ERROR", "sync");
  }
}

export class SubmitError extends MyjobError {
  constructor(message: string) {
    super(message, "SUBMIT_ERROR", "submit");
  }
}

export class RecordNotFoundError extends MyjobError {
  constructor(public readonly localId: string) {
    super(
      `No job record matches "${localId}". Run "myjob list" to see known jobs.`,
      "RECORD_NOT_FOUND",
      "record",
    );
  }
}

export class AmbiguousRecordError extends MyjobError {
  constructor(prefix: string, matches: string[]) {
    super(
      `"${prefix}" matches ${matches.length} jobs (${matches.join(", ")}). Use more characters.`,
      "AMBIGUOUS_ID",
      "record",
    );
  }
}

export class RecordStoreError extends MyjobError {
  constructor(message: string, cause?: unknown) {
    super(message, "RECORD_STORE_ERROR", "record", { cause });
  }
}

export class RemoteCommandError extends MyjobError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string,
    phase: Phase,
  ) {
    super(
      `Remote command failed (exit ${exitCode}): ${command}${stderr ? `\n${stderr}` : ""}`,
      "REMOTE_COMMAND_ERROR",
      phase,
    );
  }
}
