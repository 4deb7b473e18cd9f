import { defaultCommandRunner, type CommandRunner } from "./exec.ts";
import { SyncError } from "@/lib/errors.ts";

/** Read-only queries against the local working copy. */
export class LocalGit {
  constructor(
    private readonly cwd: string,
    private readonly runner: CommandRunner = defaultCommandRunner,
  ) {}

  private async git(args: string[]): Promise<string> {
    const result = await this.runner("git", args, { cwd: this.cwd });
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
      throw new SyncError(`git ${args.join(" ")} failed: ${detail}`);
    }
    return result.stdout.trim();
  }

  async isRepository(): Promise<boolean> {
    const result = await this.runner(
      "git",
      ["rev-parse", "--is-inside-work-tree"],
      { cwd: this.cwd },
    );
    return result.exitCode === 0 && result.stdout.trim() === "true";
  }

  /** Current branch name, or "HEAD" when detached. */
  async currentBranch(): Promise<string> {
    return this.git(["rev-parse", "--abbrev-ref", "HEAD"]);
  }

  /** Full hash of `ref`, which must name a commit known locally. */
  async resolveCommit(ref: string): Promise<string> {
    return this.git(["rev-parse", "--verify", `${ref}^{commit}`]);
  }

  async commitMessage(commit: string): Promise<string> {
    return this.git(["log", "-1", "--format=%s", commit]);
  }

  async remoteUrl(remote: string = "origin"): Promise<string> {
    return this.git(["remote", "get-url", remote]);
  }

  /** `git status --porcelain` entries; empty when the tree is clean. */
  async uncommittedChanges(): Promise<string[]> {
    const output = await this.git(["status", "--porcelain"]);
    return output ? output.split("\n").map((line) => line.trim()) : [];
  }
}
