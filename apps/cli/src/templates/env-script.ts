import { doubleQuote } from "@/lib/shell-quote.ts";

/**
 * One `export KEY="value"` line per variable, in insertion order.
 * Values stay double-quoted so `$OTHER` still expands on the node.
 */
export function renderEnvScript(envVars: Record<string, string>): string {
  const lines = ["#!/bin/bash"];
  for (const [key, value] of Object.entries(envVars)) {
    lines.push(`export ${key}=${doubleQuote(value)}`);
  }
  return lines.join("\n") + "\n";
}
