import { describe, expect, it } from "vitest";
import { normalizeJobState } from "./job-state.ts";

describe("normalizeJobState", () => {
  it.each([
    ["PENDING", "PENDING"],
    ["CONFIGURING", "PENDING"],
    ["RUNNING", "RUNNING"],
    ["COMPLETING", "RUNNING"],
    ["COMPLETED", "COMPLETED"],
    ["FAILED", "FAILED"],
    ["NODE_FAIL", "FAILED"],
    ["OUT_OF_MEMORY", "FAILED"],
    ["PREEMPTED", "FAILED"],
    ["CANCELLED by 51234", "CANCELLED"],
    ["CANCELLED+", "CANCELLED"],
    ["TIMEOUT", "TIMEOUT"],
    ["DEADLINE", "TIMEOUT"],
    ["running", "RUNNING"],
  ])("maps %s to %s", (raw, expected) => {
    expect(normalizeJobState(raw)).toBe(expected);
  });

  it("maps anything unrecognized to UNKNOWN", () => {
    expect(normalizeJobState("")).toBe("UNKNOWN");
    expect(normalizeJobState("WHATEVER")).toBe("UNKNOWN");
  });
});
