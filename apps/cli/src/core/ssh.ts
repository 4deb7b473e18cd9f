import { spawn } from "node:child_process";
import { mkdirSync } from "fs";
import { join } from "path";
import { randomBytes } from "crypto";
import { setTimeout as sleep } from "node:timers/promises";
import type { ConnectionConfig } from "@myjob/shared";
import {
  defaultCommandRunner,
  defaultStreamRunner,
  type CommandResult,
  type CommandRunner,
  type StreamOptions,
  type StreamRunner,
} from "./exec.ts";
import { RemoteSession, type RunOptions } from "./session.ts";
import {
  SOCKETS_DIR,
  SSH_COMMAND_TIMEOUT_MS,
  SSH_CONNECT_ATTEMPTS,
  SSH_CONNECT_TIMEOUT_MS,
} from "@/lib/constants.ts";
import { ConnectionError, RemoteCommandError } from "@/lib/errors.ts";

/** A running `ssh -M` control master. */
export interface MasterProcess {
  /** Resolves with the exit code once the process is gone. Never rejects. */
  readonly exited: Promise<number>;
  stderr(): string;
  kill(): void;
}

export type MasterLauncher = (args: string[]) => MasterProcess;

export interface SSHSessionOptions {
  host: string;
  port?: number;
  user?: string;
  keyFile?: string;
  runner?: CommandRunner;
  streamRunner?: StreamRunner;
  launchMaster?: MasterLauncher;
  socketDir?: string;
  connectAttempts?: number;
  connectTimeoutMs?: number;
  pollIntervalMs?: number;
  commandTimeoutMs?: number;
}

export const launchSshMaster: MasterLauncher = (args) => {
  const child = spawn("ssh", args, { stdio: ["ignore", "ignore", "pipe"] });
  let stderr = "";
  child.stderr.on("data", (chunk) => {
    stderr += String(chunk);
  });
  const exited = new Promise<number>((resolve) => {
    child.on("error", (err) => {
      stderr += err.message;
      resolve(255);
    });
    child.on("close", (code) => resolve(code ?? 255));
  });
  return {
    exited,
    stderr: () => stderr,
    kill: () => {
      if (child.exitCode === null) child.kill("SIGTERM");
    },
  };
};

/** Turn ssh's stderr into something a user can act on. */
export function describeSshFailure(stderr: string): string {
  const message = stderr.trim();
  if (message.includes("Permission denied")) {
    return "SSH authentication failed. Check connection.user and connection.key_file.";
  }
  if (message.includes("Could not resolve hostname")) {
    return `Cannot resolve host. ${message}`;
  }
  if (
    message.includes("Connection refused") ||
    message.includes("Connection timed out") ||
    message.includes("No route to host")
  ) {
    return `Cannot reach host (check VPN or firewall). ${message}`;
  }
  return message || "ssh exited without an error message";
}

/**
 * RemoteSession over OpenSSH. `connect()` starts one control master per
 * invocation; every later command multiplexes over its socket, so the
 * user authenticates once.
 */
export class SSHSession extends RemoteSession {
  readonly host: string;
  private port: number | undefined;
  private user: string | undefined;
  private keyFile: string | undefined;
  private runner: CommandRunner;
  private streamRunner: StreamRunner;
  private launchMaster: MasterLauncher;
  private socketDir: string;
  private socketPath: string;
  private connectAttempts: number;
  private connectTimeoutMs: number;
  private pollIntervalMs: number;
  private commandTimeoutMs: number;
  private master: MasterProcess | null = null;

  constructor(options: SSHSessionOptions) {
    super();
    this.host = options.host;
    this.port = options.port;
    this.user = options.user;
    this.keyFile = options.keyFile;
    this.runner = options.runner ?? defaultCommandRunner;
    this.streamRunner = options.streamRunner ?? defaultStreamRunner;
    this.launchMaster = options.launchMaster ?? launchSshMaster;
    this.socketDir = options.socketDir ?? SOCKETS_DIR;
    this.socketPath = join(
      this.socketDir,
      `${process.pid}-${randomBytes(4).toString("hex")}`,
    );
    this.connectAttempts = options.connectAttempts ?? SSH_CONNECT_ATTEMPTS;
    this.connectTimeoutMs = options.connectTimeoutMs ?? SSH_CONNECT_TIMEOUT_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? 250;
    this.commandTimeoutMs = options.commandTimeoutMs ?? SSH_COMMAND_TIMEOUT_MS;
  }

  static fromConfig(
    connection: ConnectionConfig,
    options: Partial<SSHSessionOptions> = {},
  ): SSHSession {
    return new SSHSession({
      ...options,
      host: connection.host,
      port: connection.port,
      user: connection.user,
      keyFile: connection.key_file,
    });
  }

  get target(): string {
    return this.user ? `${this.user}@${this.host}` : this.host;
  }

  private get authArgs(): string[] {
    const args = ["-o", "BatchMode=yes"];
    if (this.port !== undefined && this.port !== 22) {
      args.push("-p", String(this.port));
    }
    if (this.keyFile) args.push("-i", this.keyFile);
    return args;
  }

  async connect(): Promise<void> {
    if (this.master) return;
    mkdirSync(this.socketDir, { recursive: true, mode: 0o700 });

    let lastError: unknown;
    for (let attempt = 1; attempt <= this.connectAttempts; attempt++) {
      try {
        this.master = await this.openMaster();
        return;
      } catch (error) {
        lastError = error;
      }
    }

    const reason =
      lastError instanceof Error ? lastError.message : String(lastError);
    throw new ConnectionError(
      `Could not connect to ${this.target} after ${this.connectAttempts} attempts: ${reason}`,
      lastError,
    );
  }

  private async openMaster(): Promise<MasterProcess> {
    const seconds = Math.ceil(this.connectTimeoutMs / 1000);
    const master = this.launchMaster([
      "-M",
      "-N",
      "-S",
      this.socketPath,
      ...this.authArgs,
      "-o",
      `ConnectTimeout=${seconds}`,
      "-o",
      "ServerAliveInterval=30",
      this.target,
    ]);

    const exit: { code: number | null } = { code: null };
    void master.exited.then((code) => {
      exit.code = code;
    });

    const deadline = Date.now() + this.connectTimeoutMs;
    while (Date.now() < deadline) {
      if (exit.code !== null) {
        throw new Error(describeSshFailure(master.stderr()));
      }
      const check = await this.runner(
        "ssh",
        ["-S", this.socketPath, "-O", "check", this.target],
        { timeoutMs: 5_000 },
      );
      if (check.exitCode === 0) return master;
      await sleep(this.pollIntervalMs);
    }

    master.kill();
    throw new Error(`timed out after ${seconds}s`);
  }

  protected async execute(
    command: string,
    options: RunOptions,
  ): Promise<CommandResult> {
    this.assertConnected();
    const result = await this.runner(
      "ssh",
      ["-S", this.socketPath, ...this.authArgs, this.target, command],
      {
        input: options.input,
        timeoutMs: options.timeoutMs ?? this.commandTimeoutMs,
      },
    );
    this.assertChannelAlive(result);
    return result;
  }

  protected async executeStream(
    command: string,
    options: StreamOptions,
  ): Promise<CommandResult> {
    this.assertConnected();
    const result = await this.streamRunner(
      "ssh",
      ["-S", this.socketPath, ...this.authArgs, this.target, command],
      options,
    );
    this.assertChannelAlive(result);
    return result;
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    this.assertConnected();
    const args = [
      "-r",
      "-o",
      `ControlPath=${this.socketPath}`,
      "-o",
      "BatchMode=yes",
    ];
    if (this.port !== undefined && this.port !== 22) {
      args.push("-P", String(this.port));
    }
    if (this.keyFile) args.push("-i", this.keyFile);
    args.push(`${this.target}:${remotePath}`, localPath);

    const result = await this.runner("scp", args, {
      timeoutMs: this.commandTimeoutMs,
    });
    if (result.exitCode !== 0) {
      throw new RemoteCommandError(
        `scp ${remotePath}`,
        result.exitCode,
        result.stderr.trim(),
        "fetch",
      );
    }
  }

  async close(): Promise<void> {
    const master = this.master;
    if (!master) return;
    this.master = null;

    const result = await this.runner(
      "ssh",
      ["-S", this.socketPath, "-O", "exit", this.target],
      { timeoutMs: 5_000 },
    ).catch((error: unknown) => ({
      exitCode: 255,
      stdout: "",
      stderr: String(error),
    }));
    if (result.exitCode !== 0) master.kill();
    await master.exited;
  }

  private assertConnected(): void {
    if (!this.master) {
      throw new ConnectionError(
        `Session to ${this.target} is not connected. Call connect() first.`,
      );
    }
  }

  /** ssh reserves exit status 255 for its own failures. */
  private assertChannelAlive(result: CommandResult): void {
    if (result.exitCode === 255) {
      throw new ConnectionError(
        `Lost connection to ${this.target}: ${describeSshFailure(result.stderr)}`,
      );
    }
  }
}

export function createSshSession(connection: ConnectionConfig): SSHSession {
  return SSHSession.fromConfig(connection);
}
