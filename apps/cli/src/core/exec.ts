import { spawn } from "node:child_process";

/** Outcome of any local or remote command. */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  cwd?: string;
  timeoutMs?: number;
  /** Written to stdin, which is then closed. */
  input?: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

export interface StreamOptions {
  onData: (chunk: string) => void;
  signal?: AbortSignal;
}

/** Long-running command whose stdout is delivered as it arrives. */
export type StreamRunner = (
  command: string,
  args: string[],
  options: StreamOptions,
) => Promise<CommandResult>;

export const defaultCommandRunner: CommandRunner = async (
  command,
  args,
  options = {},
) => {
  const timeoutMs = options.timeoutMs ?? 0;
  return await new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: [options.input === undefined ? "ignore" : "pipe", "pipe", "pipe"],
      env: process.env,
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let timer: NodeJS.Timeout | null = null;

    child.stdout?.on("data", (chunk) => {
      stdout += String(chunk);
    });

    child.stderr?.on("data", (chunk) => {
      stderr += String(chunk);
    });

    child.on("error", (err) => {
      if (timer) {
        clearTimeout(timer);
      }
      reject(err);
    });

    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGTERM");
      }, timeoutMs);
    }

    if (options.input !== undefined) {
      // EPIPE when the child exits before reading all of its input; the
      // exit code then reports the failure.
      child.stdin?.on("error", (err) => {
        stderr += `\n${command}: stdin: ${err.message}`;
      });
      child.stdin?.end(options.input);
    }

    child.on("close", (code) => {
      if (timer) {
        clearTimeout(timer);
      }
      if (timedOut) {
        stderr += `\n${command} timed out after ${timeoutMs}ms`;
      }
      resolve({
        exitCode: code ?? 1,
        stdout,
        stderr,
      });
    });
  });
};

/** How long an aborted stream may take to exit after its stdin closes. */
const ABORT_GRACE_MS = 3_000;

/**
 * stdin stays open for the life of the stream and is closed on abort, so a
 * remote command can watch it for EOF and stop. SIGTERM follows if the
 * child has not exited within the grace period.
 */
export const defaultStreamRunner: StreamRunner = async (
  command,
  args,
  options,
) => {
  return await new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ["pipe", "pipe", "pipe"],
      env: process.env,
    });

    let stderr = "";
    let killTimer: NodeJS.Timeout | null = null;
    const onAbort = () => {
      child.stdin.end();
      killTimer = setTimeout(() => child.kill("SIGTERM"), ABORT_GRACE_MS);
    };

    child.stdin.on("error", (err) => {
      stderr += `\n${command}: stdin: ${err.message}`;
    });

    if (options.signal?.aborted) {
      onAbort();
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }

    child.stdout.on("data", (chunk) => {
      options.onData(String(chunk));
    });

    child.stderr.on("data", (chunk) => {
      stderr += String(chunk);
    });

    const finish = () => {
      options.signal?.removeEventListener("abort", onAbort);
      if (killTimer) clearTimeout(killTimer);
    };

    child.on("error", (err) => {
      finish();
      reject(err);
    });

    child.on("close", (code) => {
      finish();
      // An abort is the caller ending the read, not a failure.
      const exitCode = options.signal?.aborted ? 0 : (code ?? 1);
      resolve({ exitCode, stdout: "", stderr });
    });
  });
};
