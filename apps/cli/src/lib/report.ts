import { theme } from "./theme.ts";
import { DirtyTreeWarning, MyjobError } from "./errors.ts";

/**
 * Print a command failure and exit 1. Known errors are prefixed with the
 * phase they came from so the user knows which step to fix and re-run.
 */
export function reportError(
  error: unknown,
  options: { json?: boolean } = {},
): never {
  const message = error instanceof Error ? error.message : String(error);

  if (options.json) {
    console.log(
      JSON.stringify({
        error: message,
        code: error instanceof MyjobError ? error.code : "UNEXPECTED",
        phase: error instanceof MyjobError ? error.phase : undefined,
      }),
    );
  } else if (error instanceof DirtyTreeWarning) {
    console.error(theme.warning(`\n[${error.phase}] ${message}`));
    for (const change of error.changes.slice(0, 10)) {
      console.error(theme.muted(`  ${change}`));
    }
    if (error.changes.length > 10) {
      console.error(theme.muted(`  ... and ${error.changes.length - 10} more`));
    }
  } else if (error instanceof MyjobError) {
    console.error(theme.error(`\n[${error.phase}] ${message}`));
  } else {
    console.error(theme.error(`\nError: ${message}`));
  }
  process.exit(1);
}

export function formatAge(iso: string, now: Date = new Date()): string {
  const seconds = Math.max(0, (now.getTime() - new Date(iso).getTime()) / 1000);
  if (seconds < 60) return `${Math.floor(seconds)}s ago`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m ago`;
  if (seconds < 86400) return `${Math.floor(seconds / 3600)}h ago`;
  return `${Math.floor(seconds / 86400)}d ago`;
}
