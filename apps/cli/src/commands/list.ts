import type { Command } from "commander";
import type { JobRecord } from "@myjob/shared";
import { JobRecordStore } from "@/core/job-store.ts";
import { reportError, formatAge } from "@/lib/report.ts";
import { renderTable } from "@/lib/table.ts";
import { ConfigError } from "@/lib/errors.ts";
import { stateColor, theme } from "@/lib/theme.ts";

interface ListOptions {
  tag?: string;
  name?: string;
  limit?: string;
  json?: boolean;
}

export function registerListCommand(program: Command) {
  program
    .command("list")
    .alias("ls")
    .description("List submitted jobs (cached status, no cluster contact)")
    .option("--tag <tag>", "only jobs carrying this tag")
    .option("--name <name>", "only jobs with this name")
    .option("-n, --limit <n>", "show at most n jobs")
    .option("--json", "output as JSON")
    .action(async (options: ListOptions) => {
      try {
        runList(options);
      } catch (error) {
        reportError(error, { json: options.json });
      }
    });
}

export function selectRecords(
  records: JobRecord[],
  filter: { tag?: string; name?: string; limit?: number },
): JobRecord[] {
  const selected = records.filter(
    (record) =>
      (!filter.tag || record.config.tags.includes(filter.tag)) &&
      (!filter.name || record.name === filter.name),
  );
  return filter.limit === undefined
    ? selected
    : selected.slice(0, filter.limit);
}

function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ConfigError(`--limit must be a positive integer, got "${value}"`);
  }
  return limit;
}

function runList(options: ListOptions) {
  const records = selectRecords(new JobRecordStore().list(), {
    tag: options.tag,
    name: options.name,
    limit: parseLimit(options.limit),
  });

  if (options.json) {
    console.log(JSON.stringify(records, null, 2));
    return;
  }

  if (records.length === 0) {
    console.log(theme.muted("\nNo jobs found. Submit one with: myjob submit"));
    return;
  }

  console.log();
  renderTable<JobRecord>(
    [
      { header: "ID", cell: (r) => theme.emphasis(r.localId) },
      { header: "SLURM ID", cell: (r) => r.schedulerJobId, align: "right" },
      { header: "NAME", cell: (r) => r.name },
      { header: "STATUS", cell: (r) => stateColor(r.status)(r.status) },
      { header: "HOST", cell: (r) => r.host },
      { header: "SUBMITTED", cell: (r) => formatAge(r.submittedAt) },
      {
        header: "COMMIT",
        cell: (r) =>
          r.codeVersion.commit.slice(0, 8) +
          (r.codeVersion.dirty ? theme.warning("*") : ""),
      },
    ],
    records,
  );
  console.log(
    theme.muted(
      "\n  Cached status; run myjob status <id> to refresh from the scheduler.",
    ),
  );
}
