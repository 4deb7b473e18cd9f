import type {
  ConnectionConfig,
  RemoteEnvironmentInfo,
} from "@myjob/shared";
import { PATHS } from "@myjob/shared";
import type { CommandResult, StreamOptions } from "./exec.ts";
import { shellQuote } from "@/lib/shell-quote.ts";
import {
  EnvironmentError,
  RemoteCommandError,
  type Phase,
} from "@/lib/errors.ts";

/** Everything submit, status and cancel run on the cluster. */
const SCHEDULER_COMMANDS = ["sbatch", "squeue", "sacct", "scancel"] as const;

export interface RunOptions {
  input?: string;
  timeoutMs?: number;
}

/**
 * One authenticated channel to the cluster's login node, scoped to a
 * single invocation. Commands issued through `run`/`stream` are executed
 * strictly one after another, in call order.
 */
export abstract class RemoteSession {
  private queue: Promise<unknown> = Promise.resolve();

  abstract readonly host: string;

  abstract connect(): Promise<void>;

  /** Safe to call more than once, and on a session that never connected. */
  abstract close(): Promise<void>;

  abstract download(remotePath: string, localPath: string): Promise<void>;

  protected abstract execute(
    command: string,
    options: RunOptions,
  ): Promise<CommandResult>;

  protected abstract executeStream(
    command: string,
    options: StreamOptions,
  ): Promise<CommandResult>;

  run(command: string, options: RunOptions = {}): Promise<CommandResult> {
    return this.enqueue(() => this.execute(command, options));
  }

  /** Streaming read; holds the channel until the command ends or is aborted. */
  stream(command: string, options: StreamOptions): Promise<CommandResult> {
    return this.enqueue(() => this.executeStream(command, options));
  }

  /** Run and return trimmed stdout, or throw RemoteCommandError. */
  async runChecked(command: string, phase: Phase): Promise<string> {
    const result = await this.run(command);
    if (result.exitCode !== 0) {
      throw new RemoteCommandError(
        command,
        result.exitCode,
        result.stderr.trim(),
        phase,
      );
    }
    return result.stdout.trim();
  }

  async writeFile(
    remotePath: string,
    content: string,
    phase: Phase = "submit",
  ): Promise<void> {
    const command = `cat > ${shellQuote(remotePath)}`;
    const result = await this.run(command, { input: content });
    if (result.exitCode !== 0) {
      throw new RemoteCommandError(
        command,
        result.exitCode,
        result.stderr.trim(),
        phase,
      );
    }
  }

  /**
   * Check scheduler version, the submit/query/cancel commands, home
   * directory and partitions, in that order. The first failing check
   * aborts.
   */
  async checkEnvironment(): Promise<RemoteEnvironmentInfo> {
    const schedulerVersion = await this.query(
      "sinfo --version",
      "Slurm tools are not available on the remote host",
    );
    await this.requireCommands(SCHEDULER_COMMANDS);
    const homeDir = await this.query(
      "echo $HOME",
      "Could not determine the remote home directory",
    );
    if (!homeDir.startsWith("/")) {
      throw new EnvironmentError(
        `Remote home directory looks invalid: "${homeDir}"`,
      );
    }
    const partitionOutput = await this.query(
      "sinfo -h -o '%P'",
      "Could not list Slurm partitions",
    );

    return {
      schedulerVersion,
      homeDir,
      workspaceBase: PATHS.workspaces(homeDir),
      partitions: parsePartitions(partitionOutput),
    };
  }

  private async requireCommands(names: readonly string[]): Promise<void> {
    const result = await this.run(`command -v ${names.join(" ")}`);
    if (result.exitCode === 0) return;
    const found = result.stdout.split("\n").map((line) => line.trim());
    const missing = names.filter(
      (name) => !found.some((p) => p === name || p.endsWith(`/${name}`)),
    );
    const listed = missing.length > 0 ? missing : names;
    throw new EnvironmentError(
      `Slurm commands missing on the remote host: ${listed.join(", ")}`,
    );
  }

  private async query(command: string, failure: string): Promise<string> {
    const result = await this.run(command);
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
      throw new EnvironmentError(`${failure} (${command}: ${detail})`);
    }
    return result.stdout.trim();
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const next = this.queue.then(task);
    // The queue only orders work; callers see failures through `next`.
    this.queue = next.catch((error: unknown) => error);
    return next;
  }
}

/** One partition per line; the default partition carries a trailing `*`. */
export function parsePartitions(output: string): string[] {
  const partitions: string[] = [];
  for (const line of output.split("\n")) {
    const name = line.trim().replace(/\*$/, "");
    if (name && !partitions.includes(name)) partitions.push(name);
  }
  return partitions;
}

export type SessionFactory = (connection: ConnectionConfig) => RemoteSession;
