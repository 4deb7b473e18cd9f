import type { JobRecord } from "@myjob/shared";
import type { RemoteSession } from "./session.ts";
import { resolveOutputPath } from "@/templates/job-script.ts";
import { shellQuote } from "@/lib/shell-quote.ts";
import { RemoteCommandError } from "@/lib/errors.ts";

export type LogStream = "stdout" | "stderr";

/** Exit status the read command uses to report a missing file. */
const MISSING_EXIT = 44;

export interface LogContent {
  stream: LogStream;
  path: string;
  content: string;
  /** The file does not exist yet (job pending, or never wrote to it). */
  missing: boolean;
}

/**
 * Expand the filename patterns Slurm fills in for --output/--error that
 * can be known locally: %j (job id), %x (job name), %A (array master id),
 * %a (array task index) and %%. For an array job the recorded id is the
 * master id, so logs should be named with `%A_%a`; %a is left as-is unless
 * a task index is given.
 */
export function expandOutputTemplate(
  template: string,
  record: Pick<JobRecord, "schedulerJobId" | "name">,
  task?: number,
): string {
  return template.replace(/%([%jxAa])/g, (match, code: string) => {
    switch (code) {
      case "j":
      case "A":
        return record.schedulerJobId;
      case "x":
        return record.name;
      case "a":
        return task === undefined ? match : String(task);
      default:
        return "%";
    }
  });
}

export function resolveLogPaths(
  record: JobRecord,
  task?: number,
): Record<LogStream, string> {
  const { output } = record.config;
  return {
    stdout: expandOutputTemplate(
      resolveOutputPath(output.stdout, record.workspace),
      record,
      task,
    ),
    stderr: expandOutputTemplate(
      resolveOutputPath(output.stderr, record.workspace),
      record,
      task,
    ),
  };
}

/** Whole file, or its last `lines` lines. */
export async function readLogFile(
  session: RemoteSession,
  path: string,
  options: { lines?: number } = {},
): Promise<{ content: string; missing: boolean }> {
  const file = shellQuote(path);
  const read =
    options.lines !== undefined
      ? `tail -n ${options.lines} ${file}`
      : `cat ${file}`;
  const command = `[ -f ${file} ] || exit ${MISSING_EXIT}; ${read}`;

  const result = await session.run(command);
  if (result.exitCode === MISSING_EXIT) return { content: "", missing: true };
  if (result.exitCode !== 0) {
    throw new RemoteCommandError(
      command,
      result.exitCode,
      result.stderr.trim(),
      "logs",
    );
  }
  return { content: result.stdout, missing: false };
}

export async function readLogs(
  session: RemoteSession,
  record: JobRecord,
  options: { streams?: LogStream[]; lines?: number; task?: number } = {},
): Promise<LogContent[]> {
  const paths = resolveLogPaths(record, options.task);
  const streams = options.streams ?? ["stdout", "stderr"];
  const contents: LogContent[] = [];
  for (const stream of streams) {
    const path = paths[stream];
    const { content, missing } = await readLogFile(session, path, options);
    contents.push({ stream, path, content, missing });
  }
  return contents;
}

/**
 * Remote command for following `path`. `tail` runs in the background while
 * the shell waits for EOF on stdin; when the local reader goes away the
 * channel's stdin closes and `tail` is killed with it.
 */
export function followCommand(path: string, lines: number): string {
  return (
    `tail -n ${lines} -F ${shellQuote(path)} 2>/dev/null & pid=$!; ` +
    `cat >/dev/null; kill $pid 2>/dev/null`
  );
}

/**
 * Stream a log as it grows (`tail -F`, so a file that does not exist yet
 * is picked up once created). Runs until `signal` aborts, then resolves.
 */
export async function followLog(
  session: RemoteSession,
  path: string,
  options: {
    lines: number;
    signal: AbortSignal;
    onData: (chunk: string) => void;
  },
): Promise<void> {
  const command = followCommand(path, options.lines);
  const result = await session.stream(command, {
    onData: options.onData,
    signal: options.signal,
  });
  if (result.exitCode !== 0 && !options.signal.aborted) {
    throw new RemoteCommandError(
      command,
      result.exitCode,
      result.stderr.trim(),
      "logs",
    );
  }
}
