import { cpSync } from "fs";
import { hostname } from "os";
import { basename, join } from "path";
import {
  defaultCommandRunner,
  defaultStreamRunner,
  type CommandResult,
  type CommandRunner,
  type StreamOptions,
  type StreamRunner,
} from "./exec.ts";
import { RemoteSession, type RunOptions } from "./session.ts";
import { RemoteCommandError } from "@/lib/errors.ts";

export interface LocalSessionOptions {
  runner?: CommandRunner;
  streamRunner?: StreamRunner;
  /** Login shell that runs each command (default: bash). */
  shell?: string;
}

/**
 * Runs scheduler commands on this machine, for use from the cluster's
 * own login node. Commands go through a login shell so site modules and
 * PATH setup apply as they would over ssh.
 */
export class LocalSession extends RemoteSession {
  readonly host = hostname();
  private runner: CommandRunner;
  private streamRunner: StreamRunner;
  private shell: string;

  constructor(options: LocalSessionOptions = {}) {
    super();
    this.runner = options.runner ?? defaultCommandRunner;
    this.streamRunner = options.streamRunner ?? defaultStreamRunner;
    this.shell = options.shell ?? "bash";
  }

  async connect(): Promise<void> {}

  async close(): Promise<void> {}

  /** Copies into `localPath`, as `scp -r` does for a directory target. */
  async download(remotePath: string, localPath: string): Promise<void> {
    try {
      cpSync(remotePath, join(localPath, basename(remotePath)), {
        recursive: true,
      });
    } catch (error) {
      throw new RemoteCommandError(
        `cp -r ${remotePath} ${localPath}`,
        1,
        error instanceof Error ? error.message : String(error),
        "fetch",
      );
    }
  }

  protected execute(
    command: string,
    options: RunOptions,
  ): Promise<CommandResult> {
    return this.runner(this.shell, ["-lc", command], {
      input: options.input,
      timeoutMs: options.timeoutMs,
    });
  }

  protected executeStream(
    command: string,
    options: StreamOptions,
  ): Promise<CommandResult> {
    return this.streamRunner(this.shell, ["-lc", command], options);
  }
}
