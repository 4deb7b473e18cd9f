import type { CommandResult, StreamOptions } from "@/core/exec.ts";
import { RemoteSession, type RunOptions } from "@/core/session.ts";
import { RemoteCommandError } from "@/lib/errors.ts";

type Matcher = string | RegExp;

function matches(match: Matcher, command: string): boolean {
  return typeof match === "string"
    ? command.startsWith(match)
    : match.test(command);
}

interface Response {
  match: Matcher;
  result: CommandResult;
  once: boolean;
}

/**
 * In-process RemoteSession. Commands are answered by the first matching
 * response (string = prefix, RegExp = test); unmatched commands succeed
 * with empty output.
 */
export class FakeSession extends RemoteSession {
  readonly host = "login.example.org";
  readonly commands: string[] = [];
  readonly inputs = new Map<string, string>();
  readonly downloads: Array<{ remotePath: string; localPath: string }> = [];
  readonly failingDownloads = new Set<string>();
  streamChunks: string[] = [];
  readonly streamSignals: Array<AbortSignal | undefined> = [];
  connectCalls = 0;
  closeCalls = 0;
  private responses: Response[] = [];
  private failures: Array<{ match: Matcher; error: Error }> = [];

  on(
    match: Matcher,
    result: Partial<CommandResult>,
    options: { once?: boolean } = {},
  ): this {
    this.responses.push({
      match,
      result: { exitCode: 0, stdout: "", stderr: "", ...result },
      once: options.once ?? false,
    });
    return this;
  }

  /** Make matching commands reject instead of returning a result. */
  fail(match: Matcher, error: Error): this {
    this.failures.push({ match, error });
    return this;
  }

  async connect(): Promise<void> {
    this.connectCalls++;
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    this.downloads.push({ remotePath, localPath });
    if (this.failingDownloads.has(remotePath)) {
      throw new RemoteCommandError(
        `scp ${remotePath}`,
        1,
        "No such file or directory",
        "fetch",
      );
    }
  }

  protected async execute(
    command: string,
    options: RunOptions,
  ): Promise<CommandResult> {
    this.commands.push(command);
    if (options.input !== undefined) this.inputs.set(command, options.input);
    const failure = this.failures.find(({ match }) => matches(match, command));
    if (failure) throw failure.error;
    return this.respond(command);
  }

  protected async executeStream(
    command: string,
    options: StreamOptions,
  ): Promise<CommandResult> {
    this.commands.push(command);
    this.streamSignals.push(options.signal);
    for (const chunk of this.streamChunks) options.onData(chunk);
    return this.respond(command);
  }

  private respond(command: string): CommandResult {
    const index = this.responses.findIndex(({ match }) =>
      matches(match, command),
    );
    const response = this.responses[index];
    if (!response) return { exitCode: 0, stdout: "", stderr: "" };
    if (response.once) this.responses.splice(index, 1);
    return { ...response.result };
  }
}
