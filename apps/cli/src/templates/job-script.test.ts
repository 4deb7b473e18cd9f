import { describe, expect, it } from "vitest";
import {
  formatGres,
  renderJobScript,
  resolveOutputPath,
} from "./job-script.ts";
import { makeConfig, WORKSPACE } from "@/testing/fixtures.ts";

describe("formatGres", () => {
  it("includes the type when one is given", () => {
    expect(formatGres(2, "a100")).toBe("gpu:a100:2");
    expect(formatGres(1)).toBe("gpu:1");
    expect(formatGres(0, "a100")).toBeNull();
  });
});

describe("resolveOutputPath", () => {
  it("anchors relative paths at the workspace", () => {
    expect(resolveOutputPath("logs/out.log", "/ws")).toBe("/ws/logs/out.log");
    expect(resolveOutputPath("./out.log", "/ws")).toBe("/ws/out.log");
    expect(resolveOutputPath("/scratch/out.log", "/ws")).toBe(
      "/scratch/out.log",
    );
  });
});

describe("renderJobScript", () => {
  it("renders a minimal job", () => {
    expect(renderJobScript(makeConfig(), WORKSPACE)).toBe(
      [
        "#!/bin/bash",
        "#SBATCH --job-name=train",
        "#SBATCH --nodes=1",
        "#SBATCH --cpus-per-task=1",
        "#SBATCH --mem=4096M",
        "#SBATCH --time=1:00:00",
        `#SBATCH --output=${WORKSPACE}/logs/stdout_%j.log`,
        `#SBATCH --error=${WORKSPACE}/logs/stderr_%j.log`,
        "",
        `cd ${WORKSPACE} || exit 1`,
        `source ${WORKSPACE}/env.sh`,
        "",
        "# Run",
        "python train.py",
        "_myjob_exit=$?",
        "",
        "exit $_myjob_exit",
        "",
      ].join("\n"),
    );
  });

  it("renders every section in order", () => {
    const config = makeConfig({
      resources: {
        cpus_per_task: 8,
        memory: "16G",
        time: "2:00:00",
        gpus: 2,
        gpu_type: "a100",
      },
      slurm: {
        partition: "gpu",
        account: "lab",
        extra_options: ["--exclusive "],
      },
      execution: {
        command: "python train.py --epochs 3",
        modules: ["cuda/12.1", "python/3.11"],
        working_dir: "src",
        setup: "source .venv/bin/activate",
        teardown: "echo done",
      },
    });

    expect(renderJobScript(config, WORKSPACE)).toBe(
      [
        "#!/bin/bash",
        "#SBATCH --job-name=train",
        "#SBATCH --nodes=1",
        "#SBATCH --cpus-per-task=8",
        "#SBATCH --mem=16384M",
        "#SBATCH --time=2:00:00",
        "#SBATCH --gres=gpu:a100:2",
        "#SBATCH --partition=gpu",
        "#SBATCH --account=lab",
        `#SBATCH --output=${WORKSPACE}/logs/stdout_%j.log`,
        `#SBATCH --error=${WORKSPACE}/logs/stderr_%j.log`,
        "#SBATCH --exclusive",
        "",
        `cd ${WORKSPACE} || exit 1`,
        `source ${WORKSPACE}/env.sh`,
        "module load cuda/12.1 python/3.11",
        "cd src || exit 1",
        "",
        "# Setup",
        "source .venv/bin/activate",
        "",
        "# Run",
        "python train.py --epochs 3",
        "_myjob_exit=$?",
        "",
        "# Teardown",
        "echo done",
        "",
        "exit $_myjob_exit",
        "",
      ].join("\n"),
    );
  });

  it("runs a script through bash with quoting", () => {
    const config = makeConfig({
      execution: { command: null, script: "jobs/my run.sh" },
    });
    const lines = renderJobScript(config, WORKSPACE).split("\n");
    expect(lines).toContain("bash 'jobs/my run.sh'");
    expect(lines).not.toContain("python train.py");
  });

  it("is deterministic", () => {
    const config = makeConfig({ resources: { gpus: 1 } });
    expect(renderJobScript(config, WORKSPACE)).toBe(
      renderJobScript(config, WORKSPACE),
    );
  });
});
