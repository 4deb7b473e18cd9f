import type { Command } from "commander";
import ora from "ora";
import { JobRecordStore } from "@/core/job-store.ts";
import {
  followLog,
  readLogs,
  resolveLogPaths,
  type LogStream,
} from "@/core/log-tailer.ts";
import { withSession } from "@/lib/setup.ts";
import { reportError } from "@/lib/report.ts";
import { DEFAULT_LOG_LINES } from "@/lib/constants.ts";
import { ConfigError } from "@/lib/errors.ts";
import { theme } from "@/lib/theme.ts";

interface LogsOptions {
  out?: boolean;
  err?: boolean;
  lines?: string;
  all?: boolean;
  follow?: boolean;
  task?: string;
  json?: boolean;
}

export function registerLogsCommand(program: Command) {
  program
    .command("logs")
    .description("View a job's stdout/stderr")
    .argument("<jobId>", "local id, unique prefix, or Slurm job id")
    .option("--out", "show stdout only")
    .option("--err", "show stderr only")
    .option(
      "-n, --lines <n>",
      "lines from the end of each file",
      String(DEFAULT_LOG_LINES),
    )
    .option("-a, --all", "print whole files")
    .option("-f, --follow", "keep streaming new output (Ctrl+C to stop)")
    .option("-t, --task <index>", "array task index for %a in log names")
    .option("--json", "output as JSON")
    .action(async (jobId: string, options: LogsOptions) => {
      try {
        await runLogs(jobId, options);
      } catch (error) {
        reportError(error, { json: options.json });
      }
    });
}

function parseLines(value: string | undefined): number {
  const lines = Number(value ?? DEFAULT_LOG_LINES);
  if (!Number.isInteger(lines) || lines < 0) {
    throw new ConfigError(
      `--lines must be a non-negative integer, got "${value}"`,
    );
  }
  return lines;
}

function parseTask(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const task = Number(value);
  if (!Number.isInteger(task) || task < 0) {
    throw new ConfigError(
      `--task must be a non-negative integer, got "${value}"`,
    );
  }
  return task;
}

async function runLogs(jobId: string, options: LogsOptions) {
  const store = new JobRecordStore();
  const record = store.resolve(jobId);
  const lines = parseLines(options.lines);
  const task = parseTask(options.task);
  const streams: LogStream[] = options.err
    ? ["stderr"]
    : options.out
      ? ["stdout"]
      : ["stdout", "stderr"];

  if (options.follow) {
    // tail -F follows one file; stdout unless --err was given.
    const stream: LogStream = options.err ? "stderr" : "stdout";
    const path = resolveLogPaths(record, task)[stream];
    const controller = new AbortController();
    const onInterrupt = () => controller.abort();
    process.once("SIGINT", onInterrupt);

    console.log(theme.muted(`\n  Following ${path} (Ctrl+C to stop)\n`));
    try {
      await withSession(record.config.connection, (session) =>
        followLog(session, path, {
          lines,
          signal: controller.signal,
          onData: (chunk) => process.stdout.write(chunk),
        }),
      );
    } finally {
      process.removeListener("SIGINT", onInterrupt);
    }
    return;
  }

  const spinner = options.json ? null : ora("Reading logs...").start();
  const contents = await withSession(record.config.connection, (session) =>
    readLogs(session, record, {
      streams,
      lines: options.all ? undefined : lines,
      task,
    }),
  ).finally(() => spinner?.stop());

  if (options.json) {
    console.log(
      JSON.stringify({ localId: record.localId, logs: contents }, null, 2),
    );
    return;
  }

  for (const log of contents) {
    if (streams.length > 1) {
      console.log(theme.info(`\n==> ${log.stream}: ${log.path} <==`));
    }
    if (log.missing) {
      console.log(
        theme.muted(
          `  (not created yet; job is ${record.status.toLowerCase()})`,
        ),
      );
      continue;
    }
    const text =
      log.stream === "stderr" && streams.length > 1
        ? log.content
            .split("\n")
            .map((line) => (line ? theme.error("[stderr] ") + line : line))
            .join("\n")
        : log.content;
    process.stdout.write(text.endsWith("\n") || !text ? text : `${text}\n`);
  }
}
