import type { JobRecord, ResolvedConfig } from "@myjob/shared";
import { ConfigSchema, deepMerge, type ConfigTree } from "@/core/config.ts";

export const COMMIT = "0123456789abcdef0123456789abcdef01234567";
export const HOME = "/home/tester";
export const WORKSPACE = `${HOME}/.myjob/workspaces/k7m2xq`;

/** A validated config; `overrides` merge over a minimal valid base. */
export function makeConfig(overrides: ConfigTree = {}): ResolvedConfig {
  const base: ConfigTree = {
    name: "train",
    connection: { host: "login.example.org", user: "tester" },
    execution: { command: "python train.py" },
  };
  const config: ResolvedConfig = ConfigSchema.parse(
    deepMerge(base, overrides),
  );
  return config;
}

export function makeRecord(overrides: Partial<JobRecord> = {}): JobRecord {
  return {
    localId: "k7m2xq",
    schedulerJobId: "4242",
    name: "train",
    host: "login.example.org",
    workspace: WORKSPACE,
    codeVersion: {
      repoUrl: "git@example.org:team/model.git",
      branch: "main",
      commit: COMMIT,
      message: "Tune learning rate",
      dirty: false,
    },
    status: "PENDING",
    submittedAt: "2026-03-01T10:00:00.000Z",
    updatedAt: "2026-03-01T10:00:00.000Z",
    config: makeConfig(),
    ...overrides,
  };
}
