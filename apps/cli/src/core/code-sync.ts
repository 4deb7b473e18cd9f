import type { CodeVersion, GitSelector } from "@myjob/shared";
import type { LocalGit } from "./git.ts";
import type { RemoteSession } from "./session.ts";
import { shellQuote } from "@/lib/shell-quote.ts";
import { SyncError } from "@/lib/errors.ts";

const FULL_HASH = /^[0-9a-f]{40}$/;

/**
 * Ships committed code only: captures the exact commit locally, then
 * reproduces it in a fresh remote workspace with a shallow clone.
 */
export class CodeSynchronizer {
  constructor(private readonly git: LocalGit) {}

  /** Uncommitted paths in the local tree; empty outside a repository. */
  async uncommittedChanges(): Promise<string[]> {
    if (!(await this.git.isRepository())) return [];
    return this.git.uncommittedChanges();
  }

  /** No uncommitted changes; the pipeline refuses to stage otherwise. */
  async isClean(): Promise<boolean> {
    return (await this.uncommittedChanges()).length === 0;
  }

  /**
   * Pin the code version to submit. Configured values win; anything left
   * unset is detected from the local working copy.
   */
  async capture(selector: GitSelector): Promise<CodeVersion> {
    const inRepo = await this.git.isRepository();
    if (!inRepo) {
      const { repo_url, branch, commit } = selector;
      if (repo_url && branch && commit && FULL_HASH.test(commit)) {
        return { repoUrl: repo_url, branch, commit, message: "", dirty: false };
      }
      throw new SyncError(
        "Not inside a git repository. Run from your project checkout, or set git.repo_url, git.branch and a full git.commit.",
      );
    }

    const repoUrl =
      selector.repo_url ??
      (await this.git.remoteUrl().catch((error: unknown) => {
        throw new SyncError(
          `Cannot detect the repository URL (${error instanceof Error ? error.message : String(error)}). Set git.repo_url.`,
        );
      }));

    const branch = selector.branch ?? (await this.git.currentBranch());
    if (branch === "HEAD") {
      throw new SyncError(
        "HEAD is detached. Check out a branch or set git.branch.",
      );
    }

    const commit = await this.pinCommit(selector.commit);
    const message = await this.git.commitMessage(commit).catch(() => "");
    const dirty = (await this.git.uncommittedChanges()).length > 0;

    return { repoUrl, branch, commit, message, dirty };
  }

  private async pinCommit(configured: string | undefined): Promise<string> {
    if (!configured) return this.git.resolveCommit("HEAD");
    try {
      return await this.git.resolveCommit(configured);
    } catch {
      const lower = configured.toLowerCase();
      if (FULL_HASH.test(lower)) return lower;
      throw new SyncError(
        `Commit "${configured}" is not known locally. Fetch it or give the full hash.`,
      );
    }
  }

  /**
   * Create `workspace`, shallow-clone the branch into it and check out the
   * captured commit. Fails with SyncError if the checked-out HEAD is not
   * exactly `version.commit`; the workspace is left for inspection.
   */
  async stage(
    session: RemoteSession,
    workspace: string,
    version: CodeVersion,
  ): Promise<void> {
    const ws = shellQuote(workspace);
    const commit = shellQuote(version.commit);

    await this.step(
      session,
      `mkdir -p ${ws}`,
      "Creating the workspace",
      workspace,
    );
    await this.step(
      session,
      `GIT_TERMINAL_PROMPT=0 git clone --quiet --depth 1 --branch ${shellQuote(version.branch)} ${shellQuote(version.repoUrl)} ${ws}`,
      `Cloning ${version.repoUrl} (${version.branch})`,
      workspace,
    );

    const tip = await this.step(
      session,
      `git -C ${ws} rev-parse HEAD`,
      "Reading HEAD",
      workspace,
    );
    if (tip !== version.commit) {
      await this.step(
        session,
        `GIT_TERMINAL_PROMPT=0 git -C ${ws} fetch --quiet --depth 1 origin ${commit}`,
        `Fetching commit ${version.commit.slice(0, 8)} (is it pushed?)`,
        workspace,
      );
      await this.step(
        session,
        `git -C ${ws} checkout --quiet --detach ${commit}`,
        `Checking out ${version.commit.slice(0, 8)}`,
        workspace,
      );
    }

    const head = await this.step(
      session,
      `git -C ${ws} rev-parse HEAD`,
      "Verifying HEAD",
      workspace,
    );
    if (head !== version.commit) {
      throw new SyncError(
        `Remote checkout is at ${head}, expected ${version.commit}. Workspace left at ${workspace}.`,
      );
    }
  }

  private async step(
    session: RemoteSession,
    command: string,
    what: string,
    workspace: string,
  ): Promise<string> {
    const result = await session.run(command);
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
      throw new SyncError(
        `${what} failed: ${detail}\nWorkspace left at ${workspace}.`,
      );
    }
    return result.stdout.trim();
  }
}
