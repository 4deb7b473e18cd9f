import { mkdirSync } from "fs";
import { join } from "path";
import type { JobRecord } from "@myjob/shared";
import { TERMINAL_STATES } from "@myjob/shared";
import type { RemoteSession } from "./session.ts";
import { expandOutputTemplate } from "./log-tailer.ts";
import { resolveOutputPath } from "@/templates/job-script.ts";
import { shellQuote } from "@/lib/shell-quote.ts";
import { RemoteCommandError } from "@/lib/errors.ts";

export interface FetchResult {
  remotePath: string;
  localPath: string;
  error?: string;
}

/**
 * Download every `output.fetch` entry into `<localDir>/<localId>/`.
 * A path that fails to download is reported in its result and does not
 * stop the others.
 */
export async function collectOutputs(
  session: RemoteSession,
  record: JobRecord,
  localDir: string,
): Promise<FetchResult[]> {
  const target = join(localDir, record.localId);
  mkdirSync(target, { recursive: true });

  const results: FetchResult[] = [];
  for (const entry of record.config.output.fetch) {
    const remotePath = resolveOutputPath(
      expandOutputTemplate(entry, record),
      record.workspace,
    );
    try {
      await session.download(remotePath, target);
      results.push({ remotePath, localPath: target });
    } catch (error) {
      if (!(error instanceof RemoteCommandError)) throw error;
      results.push({
        remotePath,
        localPath: target,
        error: error.stderr || error.message,
      });
    }
  }
  return results;
}

/**
 * Remove the remote workspace when the job opted in (`output.cleanup`)
 * and its cached status is terminal. Returns whether anything was removed.
 */
export async function cleanupWorkspace(
  session: RemoteSession,
  record: JobRecord,
): Promise<boolean> {
  if (!record.config.output.cleanup) return false;
  if (!TERMINAL_STATES.has(record.status)) return false;
  if (!record.workspace.includes("/.myjob/workspaces/")) {
    throw new RemoteCommandError(
      `rm -rf ${record.workspace}`,
      1,
      "refusing to remove a directory outside the workspace root",
      "fetch",
    );
  }
  await session.runChecked(`rm -rf ${shellQuote(record.workspace)}`, "fetch");
  return true;
}
