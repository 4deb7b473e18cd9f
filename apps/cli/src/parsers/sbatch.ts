/**
 * Extract the job id from sbatch output: the last whitespace-delimited
 * token, which must be all digits ("Submitted batch job 12345678").
 * Returns null for any other shape.
 */
export function parseSubmittedJobId(output: string): string | null {
  const tokens = output.trim().split(/\s+/);
  const last = tokens[tokens.length - 1] ?? "";
  return /^\d+$/.test(last) ? last : null;
}
