import { describe, expect, it } from "vitest";
import { filterAvailable, listNodes, summarizeInventory } from "./nodes.ts";
import { FakeSession } from "@/testing/fake-session.ts";
import { RemoteCommandError } from "@/lib/errors.ts";

const SINFO = "sinfo -N -h -o '%N|%P|%T|%C|%m'";

function cluster(): FakeSession {
  return new FakeSession()
    .on(SINFO, {
      stdout: [
        "gpu-a|gpu*|mixed|16/48/0/64|515000",
        "gpu-a|interactive|mixed|16/48/0/64|515000",
        "gpu-b|gpu|idle|0/64/0/64|515000",
        "gpu-c|gpu|drained|0/64/0/64|515000",
        "cpu-d|standard|allocated|40/0/0/40|192000",
        "",
      ].join("\n"),
    })
    .on("scontrol show node gpu-a", {
      stdout: "NodeName=gpu-a Gres=gpu:a100:4(S:0-1) GresUsed=gpu:a100:3(IDX:0-2)\n",
    })
    .on("scontrol show node gpu-b", {
      exitCode: 1,
      stderr: "Node gpu-b not found",
    })
    .on("scontrol show node gpu-c", {
      stdout: "NodeName=gpu-c Gres=gpu:a100:4 GresUsed=gpu:a100:0\n",
    })
    .on("scontrol show node cpu-d", {
      stdout: "NodeName=cpu-d Gres=(null)\n",
    });
}

describe("listNodes", () => {
  it("merges one sinfo listing with per-node GPU detail", async () => {
    const session = cluster();
    const nodes = await listNodes(session);

    expect(nodes).toEqual([
      {
        name: "gpu-a",
        partition: "gpu,interactive",
        state: "mixed",
        cpuUsed: 16,
        cpuTotal: 64,
        memoryTotalMB: 515000,
        gpu: { type: "a100", total: 4, used: 3, free: 1 },
      },
      {
        name: "gpu-b",
        partition: "gpu",
        state: "idle",
        cpuUsed: 0,
        cpuTotal: 64,
        memoryTotalMB: 515000,
      },
      {
        name: "gpu-c",
        partition: "gpu",
        state: "drained",
        cpuUsed: 0,
        cpuTotal: 64,
        memoryTotalMB: 515000,
        gpu: { type: "a100", total: 4, used: 0, free: 4 },
      },
      {
        name: "cpu-d",
        partition: "standard",
        state: "allocated",
        cpuUsed: 40,
        cpuTotal: 40,
        memoryTotalMB: 192000,
      },
    ]);
    expect(session.commands).toEqual([
      SINFO,
      "scontrol show node gpu-a",
      "scontrol show node gpu-b",
      "scontrol show node gpu-c",
      "scontrol show node cpu-d",
    ]);
  });

  it("limits the listing to a partition", async () => {
    const session = new FakeSession();
    await listNodes(session, { partition: "gpu" });
    expect(session.commands).toEqual([`${SINFO} -p gpu`]);
  });

  it("fails when sinfo fails", async () => {
    const session = new FakeSession().on(SINFO, {
      exitCode: 1,
      stderr: "sinfo: error: Unable to contact slurm controller",
    });
    await expect(listNodes(session)).rejects.toThrow(RemoteCommandError);
  });
});

describe("filterAvailable", () => {
  it("drops unavailable and full nodes", async () => {
    const nodes = await listNodes(cluster());

    expect(filterAvailable(nodes).map((n) => n.name)).toEqual([
      "gpu-a",
      "gpu-b",
    ]);
    expect(filterAvailable(nodes, { minGpus: 1 }).map((n) => n.name)).toEqual(
      ["gpu-a"],
    );
    expect(filterAvailable(nodes, { minGpus: 2 })).toEqual([]);
    expect(
      filterAvailable(nodes, { gpuType: "a100" }).map((n) => n.name),
    ).toEqual(["gpu-a"]);
  });
});

describe("summarizeInventory", () => {
  it("counts states and GPUs, free only on usable nodes", async () => {
    const nodes = await listNodes(cluster());

    expect(summarizeInventory(nodes)).toEqual({
      nodes: 4,
      byState: { mixed: 1, idle: 1, drained: 1, allocated: 1 },
      gpus: { a100: { total: 8, free: 1 } },
    });
  });
});
