import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  configOverridesFromFlags,
  deepMerge,
  mergeLayers,
  normalizeMemory,
  resolveConfig,
  resolveConnection,
} from "./config.ts";
import { ConfigError } from "@/lib/errors.ts";

const tmpDirs: string[] = [];

afterEach(() => {
  for (const dir of tmpDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function makeProject(files: Record<string, string>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "myjob-config-"));
  tmpDirs.push(dir);
  for (const [name, content] of Object.entries(files)) {
    fs.writeFileSync(path.join(dir, name), content);
  }
  return dir;
}

function resolveIn(dir: string, overrides?: Record<string, unknown>) {
  return resolveConfig({
    cwd: dir,
    globalSecretPath: path.join(dir, "global-secret.yaml"),
    overrides,
  });
}

const MINIMAL = [
  "connection:",
  "  host: login.example.org",
  "execution:",
  "  command: python train.py",
  "",
].join("\n");

describe("deepMerge", () => {
  it("merges mappings and replaces scalars and sequences", () => {
    const merged = deepMerge(
      { slurm: { partition: "cpu", extra_options: ["--a"] }, name: "x" },
      { slurm: { extra_options: ["--b"] }, name: "y" },
    );
    expect(merged).toEqual({
      slurm: { partition: "cpu", extra_options: ["--b"] },
      name: "y",
    });
  });

  it("deletes keys overridden with null and ignores undefined", () => {
    const merged = deepMerge(
      { execution: { command: "run", script: "a.sh" }, name: "x" },
      { execution: { script: null }, name: undefined },
    );
    expect(merged).toEqual({ execution: { command: "run" }, name: "x" });
  });

  it("is associative over layers", () => {
    const a = { resources: { gpus: 1, time: "1:00:00" }, tags: ["a"] };
    const b = { resources: { gpus: 2 }, slurm: { qos: "normal" } };
    const c = { resources: { time: "2:00:00" }, tags: ["c"] };
    const left = deepMerge(deepMerge(a, b), c);
    const right = deepMerge(a, deepMerge(b, c));
    expect(left).toEqual(right);
    expect(mergeLayers([a, b, c])).toEqual(left);
  });
});

describe("normalizeMemory", () => {
  it.each([
    ["4G", "4096M"],
    ["512", "512M"],
    ["2048M", "2048M"],
    ["1500K", "2M"],
  ])("normalizes %s to %s", (input, expected) => {
    expect(normalizeMemory(input)).toBe(expected);
  });

  it("rejects unknown units", () => {
    expect(() => normalizeMemory("4GB")).toThrow(ConfigError);
  });
});

describe("resolveConfig", () => {
  it("applies global secret < project secret < project config < overrides", () => {
    const dir = makeProject({
      "global-secret.yaml": [
        "connection:",
        "  user: global-user",
        "slurm:",
        "  account: global-acct",
        "",
      ].join("\n"),
      "secret.yaml": "connection:\n  user: project-user\n",
      "myjob.yaml": MINIMAL + "resources:\n  memory: 16G\n  gpus: 1\n",
    });

    const config = resolveIn(dir, { resources: { memory: "32G" } });

    expect(config.connection).toEqual({
      host: "login.example.org",
      port: 22,
      user: "project-user",
    });
    expect(config.slurm.account).toBe("global-acct");
    expect(config.resources.memory).toBe("32768M");
    expect(config.resources.gpus).toBe(1);
  });

  it("fills defaults for omitted sections", () => {
    const config = resolveIn(makeProject({ "myjob.yaml": MINIMAL }));
    expect(config.name).toBe("myjob");
    expect(config.resources).toEqual({
      nodes: 1,
      cpus_per_task: 1,
      memory: "4096M",
      gpus: 0,
      time: "1:00:00",
    });
    expect(config.output).toEqual({
      stdout: "logs/stdout_%j.log",
      stderr: "logs/stderr_%j.log",
      fetch: [],
      cleanup: false,
    });
  });

  it("returns a frozen config", () => {
    const config = resolveIn(makeProject({ "myjob.yaml": MINIMAL }));
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.resources)).toBe(true);
  });

  it("reads myjob.yml when there is no myjob.yaml", () => {
    const config = resolveIn(makeProject({ "myjob.yml": MINIMAL }));
    expect(config.connection.host).toBe("login.example.org");
  });

  it("reports YAML syntax errors with file and position", () => {
    const dir = makeProject({
      "myjob.yaml": "connection:\n  host: [unclosed\n",
    });
    expect(() => resolveIn(dir)).toThrow(/myjob\.yaml:\d+:\d+: /);
  });

  it("rejects a top level that is not a mapping", () => {
    const dir = makeProject({ "myjob.yaml": "- one\n- two\n" });
    expect(() => resolveIn(dir)).toThrow("top level must be a mapping");
  });

  it("points at init when no config file exists", () => {
    const dir = makeProject({});
    expect(() => resolveIn(dir)).toThrow(/connection: Required/);
    expect(() => resolveIn(dir)).toThrow(/Run "myjob init"/);
  });

  it("rejects invalid memory with the offending path", () => {
    const dir = makeProject({
      "myjob.yaml": MINIMAL + "resources:\n  memory: 16GB\n",
    });
    expect(() => resolveIn(dir)).toThrow(/resources\.memory: must look like/);
  });

  it("requires exactly one of command and script", () => {
    const both = makeProject({
      "myjob.yaml": MINIMAL + "  script: run.sh\n",
    });
    expect(() => resolveIn(both)).toThrow(
      "execution: command and script are mutually exclusive",
    );

    const neither = makeProject({
      "myjob.yaml": "connection:\n  host: login.example.org\n",
    });
    expect(() => resolveIn(neither)).toThrow(
      "execution: one of command or script is required",
    );
  });

  it("fails when an explicit config path does not exist", () => {
    const dir = makeProject({});
    expect(() =>
      resolveConfig({ cwd: dir, configPath: "other.yaml" }),
    ).toThrow(`Config file not found: ${path.join(dir, "other.yaml")}`);
  });
});

describe("configOverridesFromFlags", () => {
  it("replaces a configured command when --script is given", () => {
    const dir = makeProject({ "myjob.yaml": MINIMAL });
    const config = resolveIn(
      dir,
      configOverridesFromFlags({ script: "scripts/run.sh", gpus: "2" }),
    );
    expect(config.execution.command).toBeUndefined();
    expect(config.execution.script).toBe("scripts/run.sh");
    expect(config.resources.gpus).toBe(2);
  });

  it("overrides the connection host and user", () => {
    const dir = makeProject({ "myjob.yaml": MINIMAL });
    const config = resolveIn(
      dir,
      configOverridesFromFlags({ host: "gpu.example.org", user: "alice" }),
    );
    expect(config.connection.host).toBe("gpu.example.org");
    expect(config.connection.user).toBe("alice");
  });

  it("leaves the connection alone without host or user flags", () => {
    const dir = makeProject({ "myjob.yaml": MINIMAL });
    const config = resolveIn(dir, configOverridesFromFlags({}));
    expect(config.connection.host).toBe("login.example.org");
    expect(config.connection.user).toBeUndefined();
  });

  it("rejects non-integer counts", () => {
    expect(() => configOverridesFromFlags({ gpus: "two" })).toThrow(
      '--gpus must be an integer, got "two"',
    );
  });
});

describe("resolveConnection", () => {
  it("validates only the connection section", () => {
    const dir = makeProject({
      "myjob.yaml": "connection:\n  host: login.example.org\n  port: 2222\n",
    });
    expect(
      resolveConnection({
        cwd: dir,
        globalSecretPath: path.join(dir, "none.yaml"),
      }),
    ).toEqual({ host: "login.example.org", port: 2222 });
  });

  it("takes the user from the command line", () => {
    const dir = makeProject({
      "myjob.yaml": "connection:\n  host: login.example.org\n",
      "secret.yaml": "connection:\n  user: tester\n",
    });
    expect(
      resolveConnection({
        cwd: dir,
        globalSecretPath: path.join(dir, "none.yaml"),
        overrides: { connection: { host: undefined, user: "alice" } },
      }),
    ).toEqual({ host: "login.example.org", port: 22, user: "alice" });
  });
});
