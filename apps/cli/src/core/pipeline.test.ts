import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CodeSynchronizer } from "./code-sync.ts";
import { LocalGit } from "./git.ts";
import { JobRecordStore } from "./job-store.ts";
import { SubmitPipeline, type PipelinePhase } from "./pipeline.ts";
import { FakeSession } from "@/testing/fake-session.ts";
import { CLEAN_REPO, fakeGitRunner } from "@/testing/fake-git.ts";
import {
  COMMIT,
  HOME,
  WORKSPACE,
  makeConfig,
  makeRecord,
} from "@/testing/fixtures.ts";
import {
  ConfigError,
  ConnectionError,
  DirtyTreeWarning,
  EnvironmentError,
} from "@/lib/errors.ts";

let dir: string;
let store: JobRecordStore;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "myjob-pipeline-"));
  store = new JobRecordStore(dir);
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function clusterSession(): FakeSession {
  return new FakeSession()
    .on("sinfo --version", { stdout: "slurm 23.11.4\n" })
    .on("echo $HOME", { stdout: `${HOME}\n` })
    .on("sinfo -h -o '%P'", { stdout: "gpu*\nstandard\n" })
    .on(`git -C ${WORKSPACE} rev-parse HEAD`, { stdout: `${COMMIT}\n` })
    .on(`cd ${WORKSPACE} && chmod +x job.sh && sbatch job.sh`, {
      stdout: "Submitted batch job 12345678\n",
    })
    .on("squeue", { stdout: "PENDING|0:00||Priority\n" });
}

function makePipeline(
  session: FakeSession,
  options: { git?: typeof CLEAN_REPO; ids?: string[] } = {},
) {
  const ids = [...(options.ids ?? ["k7m2xq"])];
  const openSession = vi.fn(() => session);
  const pipeline = new SubmitPipeline({
    store,
    sync: new CodeSynchronizer(
      new LocalGit("/project", fakeGitRunner(options.git ?? CLEAN_REPO)),
    ),
    openSession,
    resolve: () => makeConfig({ execution: { env_vars: { EPOCHS: "3" } } }),
    newId: () => ids.shift() ?? "zzzzzz",
    now: () => new Date("2026-03-01T10:00:00.000Z"),
  });
  return { pipeline, openSession };
}

describe("SubmitPipeline.submit", () => {
  it("stages, submits, records and queries the job", async () => {
    const session = clusterSession();
    const { pipeline } = makePipeline(session);
    const phases: PipelinePhase[] = [];

    const outcome = await pipeline.submit({
      onPhase: (phase) => phases.push(phase),
    });

    expect(phases).toEqual([
      "config",
      "sync",
      "connect",
      "environment",
      "stage",
      "submit",
      "record",
      "status",
    ]);
    expect(outcome.record.schedulerJobId).toBe("12345678");
    expect(outcome.record.workspace).toBe(WORKSPACE);
    expect(outcome.status.state).toBe("PENDING");
    expect(outcome.status.reason).toBe("Priority");
    expect(outcome.environment.partitions).toEqual(["gpu", "standard"]);
    expect(store.get("k7m2xq")).toEqual(outcome.record);
    expect(outcome.record.submittedAt).toBe("2026-03-01T10:00:00.000Z");

    expect(session.commands).toEqual([
      "sinfo --version",
      "command -v sbatch squeue sacct scancel",
      "echo $HOME",
      "sinfo -h -o '%P'",
      `mkdir -p ${WORKSPACE}`,
      "GIT_TERMINAL_PROMPT=0 git clone --quiet --depth 1 --branch main " +
        `git@example.org:team/model.git ${WORKSPACE}`,
      `git -C ${WORKSPACE} rev-parse HEAD`,
      `git -C ${WORKSPACE} rev-parse HEAD`,
      `mkdir -p ${WORKSPACE}/logs`,
      `cat > ${WORKSPACE}/job.sh`,
      `cat > ${WORKSPACE}/env.sh`,
      `cd ${WORKSPACE} && chmod +x job.sh && sbatch job.sh`,
      "squeue -h -j 12345678 -o '%T|%M|%N|%r'",
    ]);
    expect(session.inputs.get(`cat > ${WORKSPACE}/env.sh`)).toBe(
      '#!/bin/bash\nexport EPOCHS="3"\n',
    );
    expect(session.connectCalls).toBe(1);
    expect(session.closeCalls).toBe(1);
  });

  it("halts on a dirty tree before any remote command", async () => {
    const session = clusterSession();
    const { pipeline, openSession } = makePipeline(session, {
      git: { ...CLEAN_REPO, "status --porcelain": { stdout: " M train.py\n" } },
    });

    await expect(pipeline.submit({})).rejects.toThrow(DirtyTreeWarning);
    expect(openSession).not.toHaveBeenCalled();
    expect(session.commands).toEqual([]);
    expect(store.list()).toEqual([]);
  });

  it("submits the last commit of a dirty tree when forced", async () => {
    const session = clusterSession();
    const { pipeline } = makePipeline(session, {
      git: { ...CLEAN_REPO, "status --porcelain": { stdout: " M train.py\n" } },
    });

    const outcome = await pipeline.submit({ force: true });

    expect(outcome.record.codeVersion.dirty).toBe(true);
    expect(outcome.record.codeVersion.commit).toBe(COMMIT);
  });

  it("never contacts the cluster when the config is invalid", async () => {
    const session = clusterSession();
    const openSession = vi.fn(() => session);
    const pipeline = new SubmitPipeline({
      store,
      sync: new CodeSynchronizer(
        new LocalGit("/project", fakeGitRunner(CLEAN_REPO)),
      ),
      openSession,
      resolve: () => {
        throw new ConfigError("connection.host: Required");
      },
    });

    await expect(pipeline.submit({})).rejects.toThrow(ConfigError);
    expect(openSession).not.toHaveBeenCalled();
  });

  it("stops at the environment check and closes the session", async () => {
    const session = new FakeSession().on("sinfo --version", {
      exitCode: 127,
      stderr: "bash: sinfo: command not found\n",
    });
    const { pipeline } = makePipeline(session);

    await expect(pipeline.submit({})).rejects.toThrow(EnvironmentError);
    expect(session.commands).toEqual(["sinfo --version"]);
    expect(session.closeCalls).toBe(1);
    expect(store.list()).toEqual([]);
  });

  it("keeps the submission when the first status query fails", async () => {
    const session = clusterSession().fail(
      "squeue",
      new ConnectionError("Lost connection to login.example.org"),
    );
    const { pipeline } = makePipeline(session);

    const outcome = await pipeline.submit({});

    expect(outcome.status).toEqual({
      state: "UNKNOWN",
      elapsed: "",
      source: "none",
    });
    expect(outcome.statusError).toBe("Lost connection to login.example.org");
    expect(store.get("k7m2xq").status).toBe("PENDING");
  });

  it("draws a new local id when the first one is taken", async () => {
    store.create(makeRecord({ localId: "k7m2xq" }));
    const session = clusterSession();
    const { pipeline } = makePipeline(session, { ids: ["k7m2xq", "w3x4yz"] });

    const outcome = await pipeline.dryRun({});

    expect(outcome.localId).toBe("w3x4yz");
    expect(outcome.workspace).toBe("~/.myjob/workspaces/w3x4yz");
    expect(session.commands).toEqual([]);
  });
});

describe("SubmitPipeline.dryRun", () => {
  it("renders both scripts without opening a session", async () => {
    const session = clusterSession();
    const { pipeline, openSession } = makePipeline(session);

    const outcome = await pipeline.dryRun({});

    expect(openSession).not.toHaveBeenCalled();
    expect(outcome.codeVersion.commit).toBe(COMMIT);
    expect(outcome.scripts.envScript).toBe('#!/bin/bash\nexport EPOCHS="3"\n');
    expect(outcome.scripts.jobScript).toContain(
      "#SBATCH --output=~/.myjob/workspaces/k7m2xq/logs/stdout_%j.log",
    );
  });
});
