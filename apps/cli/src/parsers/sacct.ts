/** Allocation-level row of `sacct -n -X -P -j <id> -o State,ExitCode,Elapsed`. */
export interface AccountingEntry {
  state: string;
  exitCode?: number;
  elapsed: string;
}

/**
 * Parse sacct output. `-P` gives `|` delimiters without a trailing one;
 * `-X` limits output to the allocation, but step rows are tolerated and
 * the first row wins. ExitCode is "<code>:<signal>"; only the code is kept.
 */
export function parseAccountingEntry(output: string): AccountingEntry | null {
  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    const parts = trimmed.split("|");
    if (parts.length < 3) continue;

    const [state, exitCode, elapsed] = parts;
    if (!state?.trim()) continue;

    const code = (exitCode ?? "").split(":")[0]?.trim() ?? "";
    return {
      state: state.trim(),
      exitCode: /^\d+$/.test(code) ? Number(code) : undefined,
      elapsed: (elapsed ?? "").trim(),
    };
  }
  return null;
}
