import {
  existsSync,
  linkSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  renameSync,
  unlinkSync,
  writeFileSync,
} from "fs";
import { join } from "path";
import { randomBytes } from "crypto";
import { z } from "zod";
import type { JobRecord, JobState } from "@myjob/shared";
import { ConfigSchema } from "./config.ts";
import { JOBS_DIR, MIN_ID_PREFIX } from "@/lib/constants.ts";
import {
  AmbiguousRecordError,
  RecordNotFoundError,
  RecordStoreError,
} from "@/lib/errors.ts";

export const JOB_STATES = [
  "PENDING",
  "RUNNING",
  "COMPLETED",
  "FAILED",
  "CANCELLED",
  "TIMEOUT",
  "UNKNOWN",
] as const satisfies readonly JobState[];

const CodeVersionSchema = z.object({
  repoUrl: z.string(),
  branch: z.string(),
  commit: z.string(),
  message: z.string(),
  dirty: z.boolean(),
});

export const JobRecordSchema = z.object({
  localId: z.string().min(1),
  schedulerJobId: z.string().regex(/^\d+$/),
  name: z.string(),
  host: z.string(),
  workspace: z.string(),
  codeVersion: CodeVersionSchema,
  status: z.enum(JOB_STATES),
  submittedAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  config: ConfigSchema,
});

const SAFE_ID = /^[a-z0-9]+$/;

/**
 * One JSON file per job, named by local id. Every write replaces the whole
 * record through a temp file in the same directory, so readers never see a
 * partial record.
 */
export class JobRecordStore {
  constructor(private readonly dir: string = JOBS_DIR) {}

  private pathFor(localId: string): string {
    return join(this.dir, `${localId}.json`);
  }

  private ensureDir(): void {
    if (!existsSync(this.dir)) {
      mkdirSync(this.dir, { recursive: true, mode: 0o700 });
    }
  }

  private writeTemp(record: JobRecord): string {
    const validated: JobRecord = JobRecordSchema.parse(record);
    this.ensureDir();
    const tmp = join(
      this.dir,
      `.${validated.localId}.${randomBytes(4).toString("hex")}.tmp`,
    );
    writeFileSync(tmp, JSON.stringify(validated, null, 2) + "\n", {
      mode: 0o600,
    });
    return tmp;
  }

  private readFile(path: string): JobRecord {
    let data: unknown;
    try {
      data = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
      throw new RecordStoreError(`Cannot read job record ${path}`, error);
    }
    const parsed = JobRecordSchema.safeParse(data);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ");
      throw new RecordStoreError(`Corrupt job record ${path}: ${detail}`);
    }
    return parsed.data;
  }

  exists(localId: string): boolean {
    return SAFE_ID.test(localId) && existsSync(this.pathFor(localId));
  }

  /** Persist a new record. Fails if the id is already taken. */
  create(record: JobRecord): void {
    const tmp = this.writeTemp(record);
    try {
      linkSync(tmp, this.pathFor(record.localId));
    } catch (error) {
      throw new RecordStoreError(
        `Job record ${record.localId} already exists`,
        error,
      );
    } finally {
      unlinkSync(tmp);
    }
  }

  find(localId: string): JobRecord | null {
    if (!this.exists(localId)) return null;
    return this.readFile(this.pathFor(localId));
  }

  get(localId: string): JobRecord {
    const record = this.find(localId);
    if (!record) throw new RecordNotFoundError(localId);
    return record;
  }

  /**
   * Resolve what a user typed: an exact local id, a unique prefix of at
   * least two characters, or a scheduler job id.
   */
  resolve(ref: string): JobRecord {
    const exact = this.find(ref);
    if (exact) return exact;

    const records = this.list();
    if (ref.length >= MIN_ID_PREFIX) {
      const matches = records.filter((r) => r.localId.startsWith(ref));
      if (matches.length > 1) {
        throw new AmbiguousRecordError(
          ref,
          matches.map((r) => r.localId),
        );
      }
      if (matches[0]) return matches[0];
    }

    const bySchedulerId = records.find((r) => r.schedulerJobId === ref);
    if (bySchedulerId) return bySchedulerId;

    throw new RecordNotFoundError(ref);
  }

  /** All readable records, newest first. Unreadable files are skipped. */
  list(): JobRecord[] {
    if (!existsSync(this.dir)) return [];
    const records: JobRecord[] = [];
    for (const entry of readdirSync(this.dir)) {
      if (!entry.endsWith(".json") || entry.startsWith(".")) continue;
      try {
        records.push(this.readFile(join(this.dir, entry)));
      } catch (error) {
        if (!(error instanceof RecordStoreError)) throw error;
      }
    }
    return records.sort((a, b) => b.submittedAt.localeCompare(a.submittedAt));
  }

  /** Replace the cached status. Returns the updated record. */
  updateStatus(localId: string, status: JobState): JobRecord {
    const current = this.get(localId);
    const updated: JobRecord = {
      ...current,
      status,
      updatedAt: new Date().toISOString(),
    };
    const tmp = this.writeTemp(updated);
    renameSync(tmp, this.pathFor(localId));
    return updated;
  }
}
